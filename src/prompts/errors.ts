/**
 * Prompt rendering errors.
 *
 * Every failure while turning a ticket and a template into prompt text is a
 * PromptStageError tagged with the stage that raised it, so callers can tell
 * a bad placeholder (substitution) from broken markup (parse) without
 * inspecting messages.
 */

export type RenderStage = "projection" | "substitution" | "parse" | "flatten";

export class PromptStageError extends Error {
  constructor(
    public readonly stage: RenderStage,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PromptStageError";
  }
}

/**
 * Unknown variable or malformed `{{…}}` syntax in a template.
 * Raised by the flat renderer and by structured phase 1.
 */
export class SubstitutionError extends PromptStageError {
  constructor(
    public readonly templateName: string,
    public readonly issues: string[],
    message?: string
  ) {
    super(
      "substitution",
      message ??
        `Template "${templateName}" has invalid substitution syntax:\n  - ${issues.join("\n  - ")}`
    );
    this.name = "SubstitutionError";
  }
}

/**
 * Structurally malformed markup in structured phase 2.
 * Line and column are 1-based and present when the validator reports them.
 */
export class StructuralParseError extends PromptStageError {
  constructor(
    public readonly detail: string,
    public readonly line?: number,
    public readonly column?: number
  ) {
    super(
      "parse",
      line !== undefined
        ? `Malformed structured template at line ${line}, column ${column ?? 0}: ${detail}`
        : `Malformed structured template: ${detail}`
    );
    this.name = "StructuralParseError";
  }
}
