/**
 * Jira transport errors.
 */

export class TicketNotFoundError extends Error {
  constructor(public readonly ticketId: string) {
    super(`Ticket ${ticketId} not found`);
    this.name = "TicketNotFoundError";
  }
}

/** Non-success HTTP status other than 404. */
export class JiraApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly body: string
  ) {
    super(`Jira API error ${statusCode}: ${body}`);
    this.name = "JiraApiError";
  }
}

/**
 * The request could not be completed, or the response could not be read as
 * an issue envelope. Field-level problems inside the envelope are not
 * transport errors; the normalizer absorbs those.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/** Authentication check failed. */
export class AuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthenticationError";
  }
}

export function isTicketNotFound(err: unknown): err is TicketNotFoundError {
  return err instanceof TicketNotFoundError;
}
