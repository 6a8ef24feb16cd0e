/**
 * Flat template renderer.
 *
 * Takes a template and a PromptContext and produces prompt text. This is
 * also the substitution routine behind phase 1 of the structured dialect,
 * which calls renderTemplate() with an XML escaper.
 *
 * Processing pipeline:
 *
 *   1. Conditional blocks are resolved first — each `{{#if …}}…{{/if}}`
 *      block is either included or excluded based on context values.
 *   2. Every remaining {{variable}} is replaced by its context value,
 *      passed through the optional escape function.
 *   3. Text outside placeholders and tags passes through verbatim.
 *
 * The renderer does NOT perform any content generation — it is purely
 * mechanical text substitution and conditional evaluation.
 */

import type { PromptContext } from "./context.js";
import { resolveConditionals } from "./conditional.js";
import {
  isValidVariable,
  parseTemplate,
  PLACEHOLDER_RE,
  type ParsedTemplate,
} from "./template.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface RenderOptions {
  /**
   * Applied to every substituted value (not to literal template text).
   * Defaults to the identity.
   */
  escape?: (value: string) => string;
}

// ---------------------------------------------------------------------------
// Renderer
// ---------------------------------------------------------------------------

/**
 * Render a parsed template against a projected ticket context.
 *
 * @param template - A previously parsed (and validated) template
 * @param context  - A PromptContext built via projectTicket()
 * @param options  - Rendering options
 * @returns The template text with conditionals and placeholders resolved
 */
export function renderTemplate(
  template: ParsedTemplate,
  context: PromptContext,
  options: RenderOptions = {}
): string {
  const { escape = (value: string) => value } = options;

  // --- 1. Resolve conditional blocks ---
  const resolvedSource =
    template.conditionals.length > 0
      ? resolveConditionals(template.source, context)
      : template.source;

  // --- 2. Perform substitution on the resolved text ---
  PLACEHOLDER_RE.lastIndex = 0;
  return resolvedSource.replace(PLACEHOLDER_RE, (match: string, name: string) =>
    isValidVariable(name) ? escape(context[name]) : match
  );
}

/**
 * Parse and render a flat template in one step.
 *
 * @param templateText - Raw template source
 * @param context      - Projected ticket context
 * @param name         - Template name for error messages
 * @throws SubstitutionError on unknown variables or malformed syntax
 */
export function renderFlat(
  templateText: string,
  context: PromptContext,
  name?: string
): string {
  return renderTemplate(parseTemplate(templateText, name), context);
}
