/**
 * Prompt template system.
 *
 * Turns a normalized Ticket plus a template into prompt text. Templates use
 * `{{variable}}` placeholders and `{{#if …}}…{{/if}}` conditional blocks
 * validated against a typed context projected from the ticket.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ```typescript
 * import { TemplateSourceLoader, renderPrompt } from "./prompts/index.js";
 *
 * const template = new TemplateSourceLoader().load("prompts/implementation-plan.poml");
 * const prompt = renderPrompt(ticket, template);
 * ```
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DIALECTS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Flat (.md, .txt, …)  — substitution only; the result is the prompt.
 *   Structured (.poml)   — substitution produces XML markup, which is
 *                          parsed and flattened into labelled blocks.
 *
 * See conditional.ts for the full conditional syntax.
 */

// Context
export {
  projectTicket,
  PROMPT_VARIABLES,
  type PromptContext,
  type PromptContextMap,
  type PromptVariable,
} from "./context.js";

// Errors
export {
  PromptStageError,
  SubstitutionError,
  StructuralParseError,
  type RenderStage,
} from "./errors.js";

// Template parsing
export {
  parseTemplate,
  extractVariables,
  findStrayDelimiters,
  isValidVariable,
  getValidVariables,
  type ParsedTemplate,
} from "./template.js";

// Conditionals
export {
  parseConditionalBlocks,
  evaluateCondition,
  resolveConditionals,
  stripStandaloneTags,
  type ConditionalBlock,
  type ConditionalOperator,
} from "./conditional.js";

// Flat rendering
export { renderTemplate, renderFlat, type RenderOptions } from "./renderer.js";

// Structured rendering
export {
  escapeXml,
  substituteStructured,
  parseStructuredDocument,
  flattenStructuredDocument,
  renderStructured,
  type StructuredDocument,
  type ContextSection,
  type OutputSection,
  type SectionMetadata,
} from "./structured/index.js";

// Assembly
export {
  renderPrompt,
  resolveTemplateKind,
  toTemplateKind,
  type TemplateKind,
  type TemplateSource,
} from "./assembler.js";

// Loader
export {
  TemplateSourceLoader,
  TemplateReadError,
  DEFAULT_TEMPLATE_PATH,
  type LoadedTemplate,
  type ReadSource,
} from "./loader.js";
