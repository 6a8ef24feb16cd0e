/**
 * Ticket domain model and normalization.
 */

export {
  ZERO_TIMESTAMP_MS,
  zeroTimestamp,
  isZeroTimestamp,
  zeroNamedValue,
  zeroUser,
  zeroProject,
  type NamedValue,
  type Status,
  type IssueType,
  type Priority,
  type User,
  type Component,
  type Project,
  type Ticket,
  type TicketIdentity,
  type RawFieldMap,
  type RawRecord,
} from "./schema.js";

export {
  getString,
  getStringOrEmpty,
  getRecord,
  getArray,
  getStringArray,
  asRecord,
} from "./extract.js";

export { normalizeTicket, parseTimestamp } from "./normalizer.js";

export {
  formatComponent,
  formatComponentList,
  assigneeName,
  formatTicketSummary,
} from "./summary.js";
