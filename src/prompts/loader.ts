/**
 * Prompt template loader.
 *
 * Reads a template from disk and tags it with the dialect its extension
 * declares (`.poml` → structured, everything else → flat).
 *
 * USAGE:
 *
 *   const loader = new TemplateSourceLoader();
 *   const template = loader.load("prompts/implementation-plan.poml");
 *   const prompt = renderPrompt(ticket, template);
 *
 * The byte source is injectable so the rest of the pipeline can be
 * exercised without a filesystem.
 */

import { readFileSync } from "node:fs";
import { basename, extname } from "node:path";

import { resolveTemplateKind, type TemplateKind, type TemplateSource } from "./assembler.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class TemplateReadError extends Error {
  constructor(
    public readonly filePath: string,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? `Failed to read template: ${filePath}`, options);
    this.name = "TemplateReadError";
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Template used when none is given on the command line. */
export const DEFAULT_TEMPLATE_PATH = "prompts/implementation-plan.md";

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/** A template read from disk. */
export interface LoadedTemplate extends TemplateSource {
  kind: TemplateKind;
  name: string;
  path: string;
}

export type ReadSource = (path: string) => string;

const readUtf8: ReadSource = (path) => readFileSync(path, "utf-8");

export class TemplateSourceLoader {
  constructor(private readonly readSource: ReadSource = readUtf8) {}

  /**
   * @param path - Template file path
   * @throws TemplateReadError if the file cannot be read
   */
  load(path: string): LoadedTemplate {
    let text: string;
    try {
      text = this.readSource(path);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TemplateReadError(path, `Failed to read template ${path}: ${reason}`, {
        cause: err,
      });
    }

    return {
      kind: resolveTemplateKind(path),
      text,
      name: basename(path, extname(path)),
      path,
    };
  }
}
