/**
 * Structured document → plain prompt text.
 *
 * Output is a sequence of blocks in a fixed order (role, task, context,
 * instructions, output format, style). Each block ends with a newline and
 * blocks are separated by one blank line. A block with nothing to say is
 * left out entirely, heading included.
 *
 *   Task: Plan the fix
 *
 *   Context:
 *
 *   Ticket: LOGIN-1
 *   Status: Open
 *
 *   Instructions:
 *   - Identify the failing code path
 *
 * Every value is trimmed before it is tested for emptiness. Collections are
 * walked in document order; nothing here depends on time, randomness or
 * object key order.
 */

import {
  METADATA_FIELDS,
  type ContextSection,
  type OutputSection,
  type StructuredDocument,
} from "./document.js";

const OUTPUT_FORMAT_HEADING = "Please provide your response in the following format:";

function line(label: string, value: string): string {
  return `${label}: ${value}\n`;
}

function contextEntry(section: ContextSection): string {
  let entry = "";
  const title = section.title.trim();
  const description = section.description.trim();

  if (title) entry += line("Ticket", title);
  if (description) entry += line("Description", description);

  for (const [field, label] of METADATA_FIELDS) {
    const value = section.metadata[field].trim();
    if (value) entry += line(label, value);
  }

  return entry;
}

function outputEntry(section: OutputSection): string {
  let entry = "";
  const title = section.title.trim();
  const content = section.content.trim();

  if (title) entry += `## ${title}\n`;
  if (content) entry += `${content}\n`;

  return entry;
}

/** Heading followed by entries, each entry introduced by a blank line. */
function spacedBlock(heading: string, entries: readonly string[]): string | undefined {
  const nonEmpty = entries.filter((entry) => entry !== "");
  if (nonEmpty.length === 0) return undefined;
  return `${heading}\n` + nonEmpty.map((entry) => `\n${entry}`).join("");
}

function instructionsBlock(instructions: readonly string[]): string | undefined {
  const items = instructions.map((item) => item.trim()).filter((item) => item !== "");
  if (items.length === 0) return undefined;
  return "Instructions:\n" + items.map((item) => `- ${item}\n`).join("");
}

function labelled(label: string, value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed ? line(label, trimmed) : undefined;
}

function formattingBlock(formatting: string): string | undefined {
  const trimmed = formatting.trim();
  return trimmed ? `Formatting Guidelines:\n${trimmed}\n` : undefined;
}

/**
 * Flatten a parsed structured document into prompt text.
 * The same document always yields byte-identical output.
 */
export function flattenStructuredDocument(doc: StructuredDocument): string {
  const blocks = [
    labelled("Role", doc.role),
    labelled("Task", doc.task),
    spacedBlock("Context:", doc.context.sections.map(contextEntry)),
    instructionsBlock(doc.instructions),
    spacedBlock(OUTPUT_FORMAT_HEADING, doc.outputFormat.sections.map(outputEntry)),
    formattingBlock(doc.style.formatting),
  ];

  return blocks.filter((block): block is string => block !== undefined).join("\n");
}
