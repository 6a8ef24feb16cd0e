/**
 * Issue response envelope.
 *
 * The envelope is the only part of a Jira issue response validated strictly:
 * `id` and `key` must be strings when present and `fields` must be an
 * object. Everything inside `fields` is left untyped for the normalizer.
 */

import { z, type ZodIssue } from "zod";
import type { RawRecord } from "../tickets/schema.js";
import { TransportError } from "./errors.js";

export const IssueEnvelopeSchema = z.object({
  id: z.string().optional().default(""),
  key: z.string().optional().default(""),
  fields: z
    .record(z.unknown())
    .nullable()
    .optional()
    .transform((fields) => fields ?? {}),
});

export type IssueEnvelope = z.infer<typeof IssueEnvelopeSchema>;

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Validate a decoded issue response.
 *
 * @throws TransportError if the envelope is malformed
 */
export function parseRawRecord(payload: unknown): RawRecord {
  const result = IssueEnvelopeSchema.safeParse(payload);
  if (!result.success) {
    throw new TransportError(
      `Malformed issue response: ${formatIssues(result.error.issues)}`
    );
  }
  return result.data;
}
