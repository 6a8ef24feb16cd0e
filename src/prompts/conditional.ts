/**
 * Conditional block parsing, validation, and evaluation.
 *
 * Extends the template syntax with `{{#if …}}…{{/if}}` blocks that include
 * or exclude a literal block of text depending on a context value.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * SUPPORTED SYNTAX
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   NON-EMPTY check — include block when the value is not "":
 *
 *     {{#if ticket.components}}
 *     Components: {{ticket.components}}
 *     {{/if}}
 *
 *   EQUALITY check — include block when value matches a literal:
 *
 *     {{#if ticket.issueType == "Bug"}}
 *     Start by reproducing the failure.
 *     {{/if}}
 *
 *   INEQUALITY check — include block when value does NOT match:
 *
 *     {{#if ticket.assignee != "Unassigned"}}
 *     Coordinate with {{ticket.assignee}}.
 *     {{/if}}
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CONSTRAINTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   - No nesting — `{{#if}}` blocks cannot contain other `{{#if}}` blocks
 *   - No `{{#else}}` — use a separate `{{#if}}` with `!=` instead
 *   - No arbitrary expressions — only variable references and string literals
 *   - Variable names validated at parse time against PromptContextMap
 *
 * STANDALONE TAGS:
 *
 *   A tag that is the only thing on its line takes the whole line with it,
 *   indentation and line break included. An excluded block therefore leaves
 *   no blank line behind, and an included one does not gain one.
 */

import type { PromptContext, PromptVariable } from "./context.js";
import { SubstitutionError } from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Supported conditional operators. */
export type ConditionalOperator = "==" | "!=" | "truthy";

/**
 * A parsed conditional block from a template.
 */
export interface ConditionalBlock {
  /** The context variable being tested. */
  variable: PromptVariable;
  /** The comparison operator. */
  operator: ConditionalOperator;
  /** The literal value for == / != comparisons (undefined for truthy). */
  value?: string;
  /** The body text inside the block (may contain {{var}} placeholders). */
  body: string;
  /** The full raw text of the block including opening/closing tags. */
  raw: string;
}

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Matches `{{#if variable}}`, `{{#if variable == "value"}}`, or
 * `{{#if variable != "value"}}` followed by body and `{{/if}}`.
 *
 * Groups:
 *   1: variable name
 *   2: operator (== or !=), optional
 *   3: comparison value (inside quotes), optional
 *   4: body content
 */
const CONDITIONAL_RE =
  /\{\{#if\s+([a-zA-Z][a-zA-Z0-9_.]*)\s*(?:(==|!=)\s*"([^"]*)")?\s*\}\}([\s\S]*?)\{\{\/if\}\}/g;

/** A well-formed opening tag on its own. */
export const OPEN_TAG_RE =
  /\{\{#if\s+[a-zA-Z][a-zA-Z0-9_.]*\s*(?:(?:==|!=)\s*"[^"]*")?\s*\}\}/g;

/** A closing tag. */
export const CLOSE_TAG_RE = /\{\{\/if\}\}/g;

/** An opening or closing tag alone on its line, with the line break. */
const STANDALONE_TAG_RE =
  /^[ \t]*(\{\{#if\s[^}\n]*\}\}|\{\{\/if\}\})[ \t]*(?:\r?\n|$)/gm;

/**
 * Detects nested conditionals (invalid).
 */
const NESTED_IF_RE = /\{\{#if\s/;

function toOperator(op: string | undefined): ConditionalOperator {
  return op === "==" || op === "!=" ? op : "truthy";
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Extract all conditional blocks from a template source string.
 *
 * @param source       - The raw template text
 * @param templateName - Template name for error messages
 * @param isValidVar   - Variable name validator function
 * @returns Array of parsed conditional blocks
 * @throws SubstitutionError if blocks reference invalid variables, nest,
 *         or have unbalanced tags
 */
export function parseConditionalBlocks(
  source: string,
  templateName: string,
  isValidVar: (name: string) => name is PromptVariable
): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  const issues: string[] = [];

  CONDITIONAL_RE.lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = CONDITIONAL_RE.exec(source)) !== null) {
    const [raw, variable, operator, value, body] = match;

    if (!isValidVar(variable)) {
      issues.push(`Unknown variable "${variable}" in conditional`);
      continue;
    }

    if (NESTED_IF_RE.test(body)) {
      issues.push(
        `Nested conditionals are not supported (found {{#if inside {{#if ${variable}…}})`
      );
      continue;
    }

    const op = toOperator(operator);
    blocks.push({
      variable,
      operator: op,
      value: op !== "truthy" ? value : undefined,
      body,
      raw,
    });
  }

  // Check for unmatched {{#if}} or {{/if}} tags
  const openTags = source.match(/\{\{#if\s/g) ?? [];
  const closeTags = source.match(CLOSE_TAG_RE) ?? [];
  if (openTags.length !== closeTags.length) {
    issues.push(
      `Mismatched conditional tags: ${openTags.length} opening {{#if}}, ${closeTags.length} closing {{/if}}`
    );
  }

  if (issues.length > 0) {
    throw new SubstitutionError(templateName, issues);
  }

  return blocks;
}

// ---------------------------------------------------------------------------
// Evaluation
// ---------------------------------------------------------------------------

/**
 * Evaluate a single conditional block against a context value.
 *
 * Rules:
 *   - truthy: value is not the empty string
 *   - ==: exact string match
 *   - !=: not an exact string match
 */
export function evaluateCondition(
  block: Pick<ConditionalBlock, "operator" | "value">,
  contextValue: string
): boolean {
  switch (block.operator) {
    case "truthy":
      return contextValue !== "";

    case "==":
      return contextValue === block.value;

    case "!=":
      return contextValue !== block.value;
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Remove the indentation and line break around tags that sit alone on a
 * line, leaving inline tags untouched.
 */
export function stripStandaloneTags(source: string): string {
  STANDALONE_TAG_RE.lastIndex = 0;
  return source.replace(STANDALONE_TAG_RE, "$1");
}

/**
 * Resolve all conditional blocks in a template source string.
 *
 * Evaluates each `{{#if …}}…{{/if}}` block and replaces it with either
 * the body content (if condition is true) or an empty string (if false).
 * Blocks naming a variable outside the context are left as they are;
 * parseConditionalBlocks() rejects those before rendering.
 *
 * @param source  - The raw template text with conditional blocks
 * @param context - Projected ticket context
 * @returns The template text with all conditionals resolved
 */
export function resolveConditionals(source: string, context: PromptContext): string {
  const stripped = stripStandaloneTags(source);
  CONDITIONAL_RE.lastIndex = 0;

  return stripped.replace(
    CONDITIONAL_RE,
    (raw: string, variable: string, op: string | undefined, value: string | undefined, body: string) => {
      if (!isContextKey(context, variable)) return raw;
      const operator = toOperator(op);
      return evaluateCondition({ operator, value }, context[variable]) ? body : "";
    }
  );
}

function isContextKey(context: PromptContext, name: string): name is PromptVariable {
  return Object.prototype.hasOwnProperty.call(context, name);
}
