/**
 * Human-readable ticket summaries for terminal output and plan headers.
 */

import type { Component, Ticket } from "./schema.js";

/**
 * Format one component, with its lead when present:
 * `"Auth (Lead: Dana Ruiz)"`.
 */
export function formatComponent(component: Component): string {
  return component.lead
    ? `${component.name} (Lead: ${component.lead.displayName})`
    : component.name;
}

/** Comma-separated component list; empty string for no components. */
export function formatComponentList(components: readonly Component[]): string {
  return components.map(formatComponent).join(", ");
}

/** Assignee display name, or "Unassigned". */
export function assigneeName(ticket: Ticket): string {
  return ticket.assignee ? ticket.assignee.displayName : "Unassigned";
}

/**
 * Multi-line summary:
 *
 *   Ticket: LOGIN-1 - Fix login bug
 *   Status: Open | Type: Bug | Priority: High
 *   Assignee: Unassigned
 *   Reporter: Sam Lee
 *   Components: Auth (Lead: Dana Ruiz)
 *   Labels: backend, urgent
 *
 * Components and Labels lines appear only when non-empty.
 */
export function formatTicketSummary(ticket: Ticket): string {
  const lines = [
    `Ticket: ${ticket.key} - ${ticket.summary}`,
    `Status: ${ticket.status.name} | Type: ${ticket.issueType.name} | Priority: ${ticket.priority.name}`,
    `Assignee: ${assigneeName(ticket)}`,
    `Reporter: ${ticket.reporter.displayName}`,
  ];

  if (ticket.components.length > 0) {
    lines.push(`Components: ${formatComponentList(ticket.components)}`);
  }
  if (ticket.labels.length > 0) {
    lines.push(`Labels: ${ticket.labels.join(", ")}`);
  }

  return lines.join("\n") + "\n";
}
