/**
 * Prompt assembler.
 *
 * Single entry point from a Ticket and a template source to prompt text.
 * The dialect is chosen once, from the kind carried alongside the source
 * (never by sniffing the content):
 *
 *   "structured" → substitute → parse → flatten
 *   anything else → flat substitution
 *
 * Failures surface as PromptStageError tagged with the stage that produced
 * them. SubstitutionError and StructuralParseError pass through unchanged;
 * any other error is wrapped, keeping the original as `cause`.
 */

import { extname } from "node:path";

import type { Ticket } from "../tickets/schema.js";
import { projectTicket } from "./context.js";
import { PromptStageError, type RenderStage } from "./errors.js";
import { renderFlat } from "./renderer.js";
import {
  flattenStructuredDocument,
  parseStructuredDocument,
  substituteStructured,
} from "./structured/index.js";

export type TemplateKind = "flat" | "structured";

/** Template text plus the kind it was declared as. */
export interface TemplateSource {
  /** Declared kind; unrecognized or missing values mean "flat". */
  kind?: string;
  text: string;
  /** Name used in error messages. */
  name?: string;
}

/** File extensions that declare the structured dialect. */
const STRUCTURED_EXTENSIONS: ReadonlySet<string> = new Set([".poml"]);

export function toTemplateKind(kind: string | undefined): TemplateKind {
  return kind === "structured" ? "structured" : "flat";
}

/** Kind declared by a template path's extension. */
export function resolveTemplateKind(path: string): TemplateKind {
  return STRUCTURED_EXTENSIONS.has(extname(path).toLowerCase()) ? "structured" : "flat";
}

function runStage<T>(stage: RenderStage, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof PromptStageError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new PromptStageError(stage, `Prompt ${stage} failed: ${reason}`, { cause: err });
  }
}

/**
 * Render a ticket through a template.
 *
 * @throws SubstitutionError    on unknown variables or malformed {{…}} syntax
 * @throws StructuralParseError on malformed structured markup
 * @throws PromptStageError     for any other failure, tagged with its stage
 */
export function renderPrompt(ticket: Ticket, source: TemplateSource): string {
  const context = runStage("projection", () => projectTicket(ticket));

  if (toTemplateKind(source.kind) === "flat") {
    return runStage("substitution", () => renderFlat(source.text, context, source.name));
  }

  const markup = runStage("substitution", () =>
    substituteStructured(source.text, context, source.name)
  );
  const document = runStage("parse", () => parseStructuredDocument(markup));
  return runStage("flatten", () => flattenStructuredDocument(document));
}
