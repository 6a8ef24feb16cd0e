/**
 * Record normalizer.
 *
 * Converts the untyped `fields` map of a Jira issue into a typed Ticket.
 *
 * LENIENT POLICY:
 *
 *   Field-level problems never raise. A key that is missing, null, or holds
 *   a value of the wrong shape leaves the corresponding Ticket field at its
 *   zero value. Malformed array elements are skipped individually. The only
 *   failures on the way to a Ticket belong to the transport layer (a
 *   response that cannot be read, or a malformed envelope); see
 *   `jira/envelope.ts`.
 *
 *   There is no warnings channel: a partially-populated payload and a
 *   malformed one normalize the same way.
 */

import {
  getArray,
  getRecord,
  getString,
  getStringArray,
  getStringOrEmpty,
  asRecord,
} from "./extract.js";
import {
  zeroNamedValue,
  zeroProject,
  zeroTimestamp,
  zeroUser,
  type Component,
  type NamedValue,
  type Project,
  type RawFieldMap,
  type Ticket,
  type TicketIdentity,
  type User,
} from "./schema.js";

// ---------------------------------------------------------------------------
// Timestamps
// ---------------------------------------------------------------------------

/**
 * The single accepted timestamp layout, e.g. `2024-03-01T10:15:30.000+0000`.
 * Milliseconds and a colon-less numeric offset are mandatory.
 */
const TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})\.(\d{3})([+-])(\d{2})(\d{2})$/;

/**
 * Parse a timestamp in the fixed issue-tracker layout.
 *
 * Returns undefined for any other layout and for out-of-range values
 * (month 13, February 30th, hour 24, offset minutes 60, ...). Callers treat
 * undefined as "absent" and fall back to the zero timestamp.
 */
export function parseTimestamp(text: string): Date | undefined {
  const match = TIMESTAMP_RE.exec(text);
  if (!match) return undefined;

  const [, y, mo, d, h, mi, s, ms, sign, offH, offM] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const offsetHours = Number(offH);
  const offsetMinutes = Number(offM);

  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;
  if (offsetHours > 23 || offsetMinutes > 59) return undefined;

  const utc = new Date(0);
  utc.setUTCFullYear(year, month - 1, day);
  utc.setUTCHours(hour, minute, second, Number(ms));

  const offsetMs = (offsetHours * 60 + offsetMinutes) * 60_000;
  return new Date(utc.getTime() - (sign === "+" ? offsetMs : -offsetMs));
}

function daysInMonth(year: number, month: number): number {
  const probe = new Date(0);
  probe.setUTCFullYear(year, month, 0);
  return probe.getUTCDate();
}

function timestampField(fields: RawFieldMap, key: string): Date {
  const text = getString(fields, key);
  return (text !== undefined ? parseTimestamp(text) : undefined) ?? zeroTimestamp();
}

// ---------------------------------------------------------------------------
// Nested objects
// ---------------------------------------------------------------------------

function namedValue(map: RawFieldMap | undefined): NamedValue {
  if (!map) return zeroNamedValue();
  return {
    id: getStringOrEmpty(map, "id"),
    name: getStringOrEmpty(map, "name"),
  };
}

function user(map: RawFieldMap): User {
  return {
    accountId: getStringOrEmpty(map, "accountId"),
    displayName: getStringOrEmpty(map, "displayName"),
    emailAddress: getStringOrEmpty(map, "emailAddress"),
  };
}

function optionalUser(map: RawFieldMap | undefined): User | undefined {
  return map ? user(map) : undefined;
}

function component(map: RawFieldMap): Component {
  const lead = optionalUser(getRecord(map, "lead"));
  const base = {
    id: getStringOrEmpty(map, "id"),
    name: getStringOrEmpty(map, "name"),
    description: getStringOrEmpty(map, "description"),
    self: getStringOrEmpty(map, "self"),
  };
  return lead ? { ...base, lead } : base;
}

function components(fields: RawFieldMap): Component[] {
  const result: Component[] = [];
  for (const item of getArray(fields, "components") ?? []) {
    const map = asRecord(item);
    if (map) result.push(component(map));
  }
  return result;
}

function project(map: RawFieldMap | undefined): Project {
  if (!map) return zeroProject();
  return {
    id: getStringOrEmpty(map, "id"),
    key: getStringOrEmpty(map, "key"),
    name: getStringOrEmpty(map, "name"),
  };
}

// ---------------------------------------------------------------------------
// Normalizer
// ---------------------------------------------------------------------------

const NO_IDENTITY: TicketIdentity = { id: "", key: "" };

/**
 * Normalize an issue field map into a Ticket.
 *
 * @param fields   - The raw `fields` object of the issue response
 * @param identity - Outer `id` / `key` from the envelope; defaults to empty
 *                   strings so nothing is invented when they are unknown
 */
export function normalizeTicket(
  fields: RawFieldMap,
  identity: TicketIdentity = NO_IDENTITY
): Ticket {
  const reporter = getRecord(fields, "reporter");
  const assignee = optionalUser(getRecord(fields, "assignee"));

  const ticket: Ticket = {
    id: identity.id,
    key: identity.key,
    summary: getString(fields, "summary") ?? "",
    description: getString(fields, "description") ?? "",
    status: namedValue(getRecord(fields, "status")),
    issueType: namedValue(getRecord(fields, "issuetype")),
    priority: namedValue(getRecord(fields, "priority")),
    reporter: reporter ? user(reporter) : zeroUser(),
    created: timestampField(fields, "created"),
    updated: timestampField(fields, "updated"),
    labels: getStringArray(fields, "labels"),
    components: components(fields),
    project: project(getRecord(fields, "project")),
  };

  return assignee ? { ...ticket, assignee } : ticket;
}
