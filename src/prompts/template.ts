/**
 * Prompt template parsing and variable extraction.
 *
 * A prompt template is a plain-text string (a .md/.txt file, or the raw
 * source of a .poml file before its markup is parsed) containing
 * `{{variable.path}}` placeholders and optional `{{#if …}}…{{/if}}`
 * conditional blocks. This module extracts those constructs and validates
 * them against the typed PromptContextMap so that invalid references are
 * caught before anything is rendered.
 *
 * TEMPLATE FORMAT:
 *
 *   VARIABLE SUBSTITUTION:
 *     {{ticket.summary}}          — simple variable substitution
 *     {{ ticket.assignee }}       — inner whitespace is trimmed
 *
 *   CONDITIONAL BLOCKS:
 *     {{#if ticket.labels}}
 *     Labels: {{ticket.labels}}
 *     {{/if}}
 *
 * Rules:
 *   - Placeholders use double-brace syntax: {{ and }}
 *   - Variable names are dotted alphanumeric paths
 *   - Unrecognized variable names are rejected, never rendered as ""
 *   - Duplicate placeholders in a template are fine (same value rendered)
 *   - Any other `{{` or `}}` is malformed syntax and rejected
 *   - No nested conditionals
 */

import { PROMPT_VARIABLES, type PromptVariable } from "./context.js";
import {
  parseConditionalBlocks,
  OPEN_TAG_RE,
  CLOSE_TAG_RE,
  type ConditionalBlock,
} from "./conditional.js";
import { SubstitutionError } from "./errors.js";

// ---------------------------------------------------------------------------
// Regex
// ---------------------------------------------------------------------------

/**
 * Matches `{{variable.name}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z][a-zA-Z0-9_.]*)\s*\}\}/g;

/** Leftover delimiters once every recognised construct is removed. */
const STRAY_DELIMITER_RE = /\{\{|\}\}/g;

// ---------------------------------------------------------------------------
// Parsed template
// ---------------------------------------------------------------------------

/**
 * A parsed and validated prompt template.
 */
export interface ParsedTemplate {
  /** The raw template source string (with placeholders intact). */
  source: string;
  /** Unique variable names found in {{…}} placeholders, sorted. */
  variables: PromptVariable[];
  /** Parsed conditional blocks ({{#if …}}…{{/if}}). */
  conditionals: ConditionalBlock[];
  /** Optional name/id for error messages. */
  name?: string;
}

// ---------------------------------------------------------------------------
// Variable names
// ---------------------------------------------------------------------------

const VALID_VARIABLES: ReadonlySet<string> = new Set<string>(PROMPT_VARIABLES);

/**
 * Check whether a string is a valid prompt variable name.
 */
export function isValidVariable(name: string): name is PromptVariable {
  return VALID_VARIABLES.has(name);
}

/**
 * Return all valid variable names (sorted).
 */
export function getValidVariables(): PromptVariable[] {
  return [...PROMPT_VARIABLES].sort();
}

// ---------------------------------------------------------------------------
// Extraction
// ---------------------------------------------------------------------------

/**
 * Extract all `{{…}}` placeholder names from a template string.
 * Returns deduplicated, sorted variable names.
 */
export function extractVariables(source: string): string[] {
  const found = new Set<string>();
  let match: RegExpExecArray | null;
  PLACEHOLDER_RE.lastIndex = 0;
  while ((match = PLACEHOLDER_RE.exec(source)) !== null) {
    found.add(match[1]);
  }
  return [...found].sort();
}

/**
 * Locate `{{` / `}}` that do not belong to a placeholder or conditional tag.
 * Returns one issue per occurrence, with its 1-based line number.
 */
export function findStrayDelimiters(source: string): string[] {
  const blank = (text: string) => text.replace(/[^\n]/g, " ");
  const masked = source
    .replace(OPEN_TAG_RE, blank)
    .replace(CLOSE_TAG_RE, blank)
    .replace(PLACEHOLDER_RE, blank);

  const issues: string[] = [];
  let match: RegExpExecArray | null;
  STRAY_DELIMITER_RE.lastIndex = 0;
  while ((match = STRAY_DELIMITER_RE.exec(masked)) !== null) {
    const line = masked.slice(0, match.index).split("\n").length;
    issues.push(`Malformed "${match[0]}" at line ${line}`);
  }
  return issues;
}

// ---------------------------------------------------------------------------
// Parsing + validation
// ---------------------------------------------------------------------------

/**
 * Parse a template string, extracting and validating all variables
 * and conditional blocks.
 *
 * @param source - The raw template text
 * @param name   - Optional template name for error messages
 * @throws SubstitutionError if a conditional is invalid, a placeholder names
 *         an unknown variable, or delimiters are malformed
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const templateName = name ?? "(anonymous)";

  // 1. Parse conditional blocks (validates variable names + nesting)
  const conditionals = parseConditionalBlocks(source, templateName, isValidVariable);

  // 2. Extract {{variable}} placeholders
  const rawVariables = extractVariables(source);
  const variables = rawVariables.filter(isValidVariable);
  const invalid = rawVariables.filter((v) => !isValidVariable(v));

  const issues = [
    ...invalid.map((v) => `Unknown variable "${v}"`),
    ...findStrayDelimiters(source),
  ];

  if (issues.length > 0) {
    throw new SubstitutionError(templateName, issues);
  }

  return { source, variables, conditionals, name };
}
