/**
 * Ticket plan prompt builder.
 *
 * Library entry point. The command line tool lives in cli/generate-plan.ts.
 */

export * from "./tickets/index.js";
export * from "./prompts/index.js";
export * from "./jira/index.js";
export * from "./generation/index.js";
export {
  formatPlanDocument,
  formatGeneratedAt,
  planFileName,
  savePlan,
  DEFAULT_OUTPUT_DIR,
  type SavePlanInput,
} from "./plans/writer.js";
export {
  buildPrompt,
  generatePlan,
  type TicketSource,
  type TemplateSourceReader,
  type PromptDeps,
  type PlanDeps,
  type PromptResult,
  type PlanRequest,
  type PlanResult,
} from "./pipeline/plan-pipeline.js";
export { loadConfig, ConfigError, type AppConfig, type Environment } from "./config/index.js";
export { createLogger, type Logger, type LogLevel } from "./logging/index.js";
