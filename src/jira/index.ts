/**
 * Jira ticket source.
 */

export {
  JiraClient,
  DEFAULT_JIRA_BASE_URL,
  DEFAULT_TIMEOUT_MS,
  type JiraClientOptions,
  type FetchFn,
} from "./client.js";

export { parseRawRecord, IssueEnvelopeSchema, type IssueEnvelope } from "./envelope.js";

export {
  TicketNotFoundError,
  JiraApiError,
  TransportError,
  AuthenticationError,
  isTicketNotFound,
} from "./errors.js";
