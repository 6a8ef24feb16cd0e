/**
 * Implementation plan files.
 *
 * A saved plan is a Markdown document: a metadata header describing the
 * ticket, a horizontal rule, then the generated plan verbatim.
 *
 *   # Implementation Plan: Fix login bug
 *
 *   **Ticket ID:** LOGIN-1
 *   **Generated:** 2026-01-02 03:04:05
 *   **Status:** Open
 *   ...
 *
 *   ---
 *
 *   <plan>
 *
 * Timestamps use local time and come from the caller, so output is
 * reproducible in tests.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import type { Ticket } from "../tickets/schema.js";
import { assigneeName } from "../tickets/summary.js";

export const DEFAULT_OUTPUT_DIR = "implementation-plans";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD HH:mm:ss` in local time. */
export function formatGeneratedAt(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** `<ticketId>_YYYYMMDD_HHmmss.md` in local time. */
export function planFileName(ticketId: string, date: Date): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${ticketId}_${stamp}.md`;
}

/**
 * Markdown document for a generated plan.
 * Only component names are listed here, without leads.
 */
export function formatPlanDocument(
  ticketId: string,
  ticket: Ticket,
  plan: string,
  generatedAt: Date
): string {
  const lines = [
    `# Implementation Plan: ${ticket.summary}`,
    "",
    `**Ticket ID:** ${ticketId}`,
    `**Generated:** ${formatGeneratedAt(generatedAt)}`,
    `**Status:** ${ticket.status.name}`,
    `**Type:** ${ticket.issueType.name}`,
    `**Priority:** ${ticket.priority.name}`,
    `**Assignee:** ${assigneeName(ticket)}`,
    `**Reporter:** ${ticket.reporter.displayName}`,
  ];

  if (ticket.components.length > 0) {
    lines.push(`**Components:** ${ticket.components.map((c) => c.name).join(", ")}`);
  }
  if (ticket.labels.length > 0) {
    lines.push(`**Labels:** ${ticket.labels.join(", ")}`);
  }

  return lines.join("\n") + "\n\n---\n\n" + plan;
}

export interface SavePlanInput {
  ticketId: string;
  ticket: Ticket;
  plan: string;
  /** Output directory; created when missing. */
  dir?: string;
  /** Generation time; defaults to now. */
  now?: Date;
}

/**
 * Write a plan document and return its path.
 */
export async function savePlan(input: SavePlanInput): Promise<string> {
  const dir = input.dir ?? DEFAULT_OUTPUT_DIR;
  const now = input.now ?? new Date();

  await mkdir(dir, { recursive: true });

  const filePath = join(dir, planFileName(input.ticketId, now));
  await writeFile(
    filePath,
    formatPlanDocument(input.ticketId, input.ticket, input.plan, now),
    "utf-8"
  );
  return filePath;
}
