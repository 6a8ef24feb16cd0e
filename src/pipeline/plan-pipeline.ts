/**
 * Plan pipeline.
 *
 * Sequences the collaborators around the prompt core:
 *
 *   ticket source → template loader → renderPrompt → plan generator → savePlan
 *
 * Every collaborator is injected, so the whole run can be exercised with
 * in-process fakes. Errors from fetching, loading, rendering and generating
 * propagate unchanged; only a failure to save the finished plan is
 * downgraded to a warning, since the plan has already been produced.
 */

import type { Logger } from "../logging/logger.js";
import type { Ticket } from "../tickets/schema.js";
import { renderPrompt } from "../prompts/assembler.js";
import type { LoadedTemplate } from "../prompts/loader.js";
import type { PlanGenerator } from "../generation/generator.js";
import type { SavePlanInput } from "../plans/writer.js";

export interface TicketSource {
  getTicket(ticketId: string): Promise<Ticket>;
}

export interface TemplateSourceReader {
  load(path: string): LoadedTemplate;
}

export interface PromptDeps {
  tickets: TicketSource;
  templates: TemplateSourceReader;
  logger: Logger;
}

export interface PlanDeps extends PromptDeps {
  generator: PlanGenerator;
  savePlan: (input: SavePlanInput) => Promise<string>;
}

export interface PromptResult {
  ticket: Ticket;
  template: LoadedTemplate;
  prompt: string;
}

export interface PlanRequest {
  ticketId: string;
  templatePath: string;
  outputDir?: string;
  now?: Date;
}

export interface PlanResult extends PromptResult {
  plan: string;
  /** Path of the saved plan, or undefined if saving failed. */
  savedTo?: string;
}

/**
 * Fetch a ticket and render it through a template.
 */
export async function buildPrompt(
  ticketId: string,
  templatePath: string,
  deps: PromptDeps
): Promise<PromptResult> {
  const { tickets, templates, logger } = deps;

  logger.info("Fetching ticket", { ticketId });
  const ticket = await tickets.getTicket(ticketId);
  logger.debug("Ticket fetched", { key: ticket.key, summary: ticket.summary });

  const template = templates.load(templatePath);
  logger.info("Loaded prompt template", { path: template.path, kind: template.kind });

  const prompt = renderPrompt(ticket, template);
  logger.debug("Rendered prompt", { chars: prompt.length });

  return { ticket, template, prompt };
}

/**
 * Build the prompt, generate a plan from it, and save the plan.
 */
export async function generatePlan(
  request: PlanRequest,
  deps: PlanDeps
): Promise<PlanResult> {
  const { logger } = deps;
  const built = await buildPrompt(request.ticketId, request.templatePath, deps);

  logger.info("Generating implementation plan");
  const plan = await deps.generator.generate(built.prompt);
  logger.info("Implementation plan generated", { chars: plan.length });

  let savedTo: string | undefined;
  try {
    savedTo = await deps.savePlan({
      ticketId: request.ticketId,
      ticket: built.ticket,
      plan,
      dir: request.outputDir,
      now: request.now,
    });
    logger.info("Implementation plan saved", { path: savedTo });
  } catch (err) {
    logger.warn("Failed to save implementation plan", {
      error: err instanceof Error ? err.message : String(err),
    });
  }

  return { ...built, plan, savedTo };
}
