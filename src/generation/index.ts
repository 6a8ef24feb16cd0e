export {
  AnthropicPlanGenerator,
  GenerationError,
  collectText,
  DEFAULT_MODEL,
  DEFAULT_MAX_TOKENS,
  type PlanGenerator,
  type ContentBlockLike,
  type AnthropicPlanGeneratorOptions,
} from "./generator.js";
