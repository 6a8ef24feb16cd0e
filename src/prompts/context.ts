/**
 * Rendering context projector.
 *
 * Flattens a Ticket into the fixed set of string values that prompt
 * templates may reference. Both template dialects render against this same
 * context, so a variable means the same thing in a `.md` template and in a
 * `.poml` template.
 *
 *   ticket.summary      → ticket.summary
 *   ticket.description  → ticket.description
 *   ticket.status       → ticket.status.name
 *   ticket.issueType    → ticket.issueType.name
 *   ticket.priority     → ticket.priority.name
 *   ticket.components   → "Auth (Lead: Dana Ruiz), UI"
 *   ticket.labels       → "backend, urgent"
 *   ticket.assignee     → assignee display name, or "Unassigned"
 *   ticket.reporter     → reporter display name (may be "")
 *
 * Empty lists project to "" rather than being omitted; templates decide
 * whether to show them with `{{#if …}}` blocks.
 *
 * Adding a variable requires two changes: the key in PromptContextMap and
 * its projection in projectTicket(). PROMPT_VARIABLES is derived from the
 * same keys and is what template validation checks against.
 */

import type { Ticket } from "../tickets/schema.js";
import { assigneeName, formatComponentList } from "../tickets/summary.js";

/**
 * Every variable available inside prompt templates, keyed exactly as it
 * appears in `{{…}}` placeholders.
 */
export interface PromptContextMap {
  "ticket.summary": string;
  "ticket.description": string;
  "ticket.status": string;
  "ticket.issueType": string;
  "ticket.priority": string;
  "ticket.components": string;
  "ticket.labels": string;
  "ticket.assignee": string;
  "ticket.reporter": string;
}

/** A legal prompt variable name. */
export type PromptVariable = keyof PromptContextMap;

/** The concrete context object passed to the renderers. */
export type PromptContext = Readonly<PromptContextMap>;

/** Projection of a ticket, in declaration order. */
export function projectTicket(ticket: Ticket): PromptContext {
  return Object.freeze({
    "ticket.summary": ticket.summary,
    "ticket.description": ticket.description,
    "ticket.status": ticket.status.name,
    "ticket.issueType": ticket.issueType.name,
    "ticket.priority": ticket.priority.name,
    "ticket.components": formatComponentList(ticket.components),
    "ticket.labels": ticket.labels.join(", "),
    "ticket.assignee": assigneeName(ticket),
    "ticket.reporter": ticket.reporter.displayName,
  });
}

/**
 * Complete list of legal variable names, in PromptContextMap order.
 * This list MUST stay in sync with PromptContextMap.
 */
export const PROMPT_VARIABLES = [
  "ticket.summary",
  "ticket.description",
  "ticket.status",
  "ticket.issueType",
  "ticket.priority",
  "ticket.components",
  "ticket.labels",
  "ticket.assignee",
  "ticket.reporter",
] as const satisfies readonly PromptVariable[];
