/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 *
 *   NODE_ENV              development | production | test
 *   LOG_LEVEL             debug | info | warn | error
 *   LOG_TO_FILE           write logs/generate-plan.log as well
 *   JIRA_BASE_URL         Jira instance root
 *   JIRA_TOKEN            Personal Access Token (optional)
 *   JIRA_TIMEOUT_MS       request timeout
 *   ANTHROPIC_API_KEY     read by the SDK when unset here
 *   ANTHROPIC_MODEL       model id for plan generation
 *   PLAN_MAX_TOKENS       generation token limit
 *   PLAN_OUTPUT_DIR       where plan files are written
 *   PROMPT_TEMPLATE       default template path
 */

import {
  ConfigError,
  maybeEnv,
  optionalEnv,
  optionalEnvBool,
  optionalEnvInt,
  optionalEnvUrl,
  type EnvSource,
} from "./env.js";
import { DEFAULT_JIRA_BASE_URL, DEFAULT_TIMEOUT_MS } from "../jira/client.js";
import { DEFAULT_MAX_TOKENS, DEFAULT_MODEL } from "../generation/generator.js";
import { DEFAULT_TEMPLATE_PATH } from "../prompts/loader.js";
import { DEFAULT_OUTPUT_DIR } from "../plans/writer.js";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "../logging/logger.js";

export { ConfigError, type EnvSource } from "./env.js";

const ENVIRONMENTS = ["development", "production", "test"] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export interface AppConfig {
  readonly env: Environment;
  readonly logLevel: LogLevel;
  readonly logToFile: boolean;
  readonly jiraBaseUrl: string;
  readonly jiraToken?: string;
  readonly requestTimeoutMs: number;
  readonly anthropicApiKey?: string;
  readonly model: string;
  readonly maxTokens: number;
  readonly outputDir: string;
  readonly templatePath: string;
}

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((env) => env === value);
}

/**
 * Load and validate configuration.
 * Fails fast on values that cannot be used.
 *
 * @throws ConfigError
 */
export function loadConfig(source: EnvSource = process.env): AppConfig {
  const env = optionalEnv("NODE_ENV", "development", source);
  if (!isEnvironment(env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${env}. Must be ${ENVIRONMENTS.join(", ")}.`
    );
  }

  const logLevel = optionalEnv("LOG_LEVEL", "info", source);
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${logLevel}. Must be ${LOG_LEVELS.join(", ")}.`
    );
  }

  return Object.freeze({
    env,
    logLevel,
    logToFile: optionalEnvBool("LOG_TO_FILE", false, source),
    jiraBaseUrl: optionalEnvUrl("JIRA_BASE_URL", DEFAULT_JIRA_BASE_URL, source),
    jiraToken: maybeEnv("JIRA_TOKEN", source),
    requestTimeoutMs: optionalEnvInt("JIRA_TIMEOUT_MS", DEFAULT_TIMEOUT_MS, source),
    anthropicApiKey: maybeEnv("ANTHROPIC_API_KEY", source),
    model: optionalEnv("ANTHROPIC_MODEL", DEFAULT_MODEL, source),
    maxTokens: optionalEnvInt("PLAN_MAX_TOKENS", DEFAULT_MAX_TOKENS, source),
    outputDir: optionalEnv("PLAN_OUTPUT_DIR", DEFAULT_OUTPUT_DIR, source),
    templatePath: optionalEnv("PROMPT_TEMPLATE", DEFAULT_TEMPLATE_PATH, source),
  });
}
