/**
 * Ticket domain model.
 *
 * A Ticket is the normalized, strongly-typed view of one Jira issue. Every
 * field always holds a value: anything the source payload did not carry (or
 * carried in the wrong shape) is represented by its zero value rather than
 * `undefined`. The only exceptions are `assignee` and `component.lead`, where
 * absence is meaningful and distinct from a present-but-empty user.
 */

/** `{id, name}` value object shared by status, issue type and priority. */
export interface NamedValue {
  readonly id: string;
  readonly name: string;
}

export type Status = NamedValue;
export type IssueType = NamedValue;
export type Priority = NamedValue;

export interface User {
  readonly accountId: string;
  readonly displayName: string;
  readonly emailAddress: string;
}

export interface Component {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly self: string;
  readonly lead?: User;
}

export interface Project {
  readonly id: string;
  readonly key: string;
  readonly name: string;
}

export interface Ticket {
  readonly id: string;
  readonly key: string;
  readonly summary: string;
  readonly description: string;
  readonly status: Status;
  readonly issueType: IssueType;
  readonly priority: Priority;
  /** Absent when the issue is unassigned. */
  readonly assignee?: User;
  readonly reporter: User;
  readonly created: Date;
  readonly updated: Date;
  readonly labels: readonly string[];
  readonly components: readonly Component[];
  readonly project: Project;
}

/** Outer identity carried by the response envelope, not the field map. */
export interface TicketIdentity {
  readonly id: string;
  readonly key: string;
}

/** Untyped issue field map as returned by the REST API. */
export type RawFieldMap = Readonly<Record<string, unknown>>;

/** Validated response envelope. */
export interface RawRecord extends TicketIdentity {
  readonly fields: RawFieldMap;
}

// ---------------------------------------------------------------------------
// Zero values
// ---------------------------------------------------------------------------

/** 0001-01-01T00:00:00.000Z in epoch milliseconds. */
export const ZERO_TIMESTAMP_MS = -62135596800000;

/**
 * A fresh zero timestamp. Dates are mutable, so callers never share one.
 */
export function zeroTimestamp(): Date {
  return new Date(ZERO_TIMESTAMP_MS);
}

export function isZeroTimestamp(date: Date): boolean {
  return date.getTime() === ZERO_TIMESTAMP_MS;
}

export function zeroNamedValue(): NamedValue {
  return { id: "", name: "" };
}

export function zeroUser(): User {
  return { accountId: "", displayName: "", emailAddress: "" };
}

export function zeroProject(): Project {
  return { id: "", key: "", name: "" };
}
