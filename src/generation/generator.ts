/**
 * Plan generation.
 *
 * The prompt text rendered by the assembler is sent, unmodified, as the only
 * user message of a single request. The generator's text blocks are joined
 * into the implementation plan.
 */

import Anthropic from "@anthropic-ai/sdk";

export const DEFAULT_MODEL = "claude-sonnet-4-20250514";
export const DEFAULT_MAX_TOKENS = 4096;

/** Turns prompt text into generated text. */
export interface PlanGenerator {
  generate(prompt: string): Promise<string>;
}

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

/** Minimal view of a response content block. */
export interface ContentBlockLike {
  type: string;
  text?: string;
}

/**
 * Join the text blocks of a response, each followed by a newline.
 * Non-text blocks (tool use, thinking) are skipped.
 */
export function collectText(blocks: readonly ContentBlockLike[]): string {
  let text = "";
  for (const block of blocks) {
    if (block.type === "text" && typeof block.text === "string") {
      text += `${block.text}\n`;
    }
  }
  return text;
}

export interface AnthropicPlanGeneratorOptions {
  apiKey?: string;
  model?: string;
  maxTokens?: number;
}

export class AnthropicPlanGenerator implements PlanGenerator {
  private readonly client: Anthropic;
  readonly model: string;
  readonly maxTokens: number;

  constructor(options: AnthropicPlanGeneratorOptions = {}) {
    this.client = new Anthropic(options.apiKey ? { apiKey: options.apiKey } : {});
    this.model = options.model ?? DEFAULT_MODEL;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async generate(prompt: string): Promise<string> {
    try {
      const message = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: "user", content: prompt }],
      });
      return collectText(message.content);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new GenerationError(`Failed to generate implementation plan: ${reason}`, {
        cause: err,
      });
    }
  }
}
