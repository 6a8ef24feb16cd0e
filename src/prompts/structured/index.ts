/**
 * Structured (.poml) template dialect.
 *
 * Two phases with distinct failure modes, then a deterministic flatten:
 *
 *   1. substituteStructured()    — {{…}} substitution → markup text
 *                                  (SubstitutionError)
 *   2. parseStructuredDocument() — markup → StructuredDocument
 *                                  (StructuralParseError)
 *   3. flattenStructuredDocument() — StructuredDocument → prompt text
 *
 * Phase 1 is the flat renderer with substituted values XML-escaped, so a
 * ticket description containing `<` or `&` cannot change the markup.
 */

import type { PromptContext } from "../context.js";
import { renderTemplate } from "../renderer.js";
import { parseTemplate } from "../template.js";
import { parseStructuredDocument } from "./parser.js";
import { flattenStructuredDocument } from "./flatten.js";

const XML_ESCAPES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

/** Escape the five XML special characters. */
export function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

/**
 * Phase 1: substitute context values into structured template source.
 *
 * @throws SubstitutionError on unknown variables or malformed syntax
 */
export function substituteStructured(
  source: string,
  context: PromptContext,
  name?: string
): string {
  return renderTemplate(parseTemplate(source, name), context, { escape: escapeXml });
}

/**
 * Run all structured phases and return prompt text.
 *
 * @throws SubstitutionError    if phase 1 fails (phase 2 is not attempted)
 * @throws StructuralParseError if the substituted markup is malformed
 */
export function renderStructured(
  source: string,
  context: PromptContext,
  name?: string
): string {
  const markup = substituteStructured(source, context, name);
  return flattenStructuredDocument(parseStructuredDocument(markup));
}

export { parseStructuredDocument } from "./parser.js";
export { flattenStructuredDocument } from "./flatten.js";
export {
  ROOT_ELEMENT,
  METADATA_FIELDS,
  type StructuredDocument,
  type ContextSection,
  type OutputSection,
  type SectionMetadata,
} from "./document.js";
