/**
 * Configuration tests.
 *
 * Run: node --import tsx src/config/config.test.ts
 *
 * Every case passes an explicit environment map; process.env is not read.
 */

import { strict as assert } from "node:assert";

import { loadConfig, ConfigError } from "./index.js";
import { DEFAULT_MODEL } from "../generation/generator.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function configError(env: Record<string, string>): string {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.message;
    throw err;
  }
  throw new Error("Expected ConfigError");
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════════════════

section("Defaults");

test("empty environment yields defaults", () => {
  assert.deepEqual(loadConfig({}), {
    env: "development",
    logLevel: "info",
    logToFile: false,
    jiraBaseUrl: "https://issues.redhat.com",
    jiraToken: undefined,
    requestTimeoutMs: 30_000,
    anthropicApiKey: undefined,
    model: DEFAULT_MODEL,
    maxTokens: 4096,
    outputDir: "implementation-plans",
    templatePath: "prompts/implementation-plan.md",
  });
});

test("empty strings count as unset", () => {
  const config = loadConfig({ JIRA_TOKEN: "", LOG_LEVEL: "", PLAN_MAX_TOKENS: "" });
  assert.equal(config.jiraToken, undefined);
  assert.equal(config.logLevel, "info");
  assert.equal(config.maxTokens, 4096);
});

test("config is frozen", () => {
  assert.ok(Object.isFrozen(loadConfig({})));
});

// ═══════════════════════════════════════════════════════════════════════════
// OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════

section("Overrides");

test("every variable is read", () => {
  const config = loadConfig({
    NODE_ENV: "test",
    LOG_LEVEL: "debug",
    LOG_TO_FILE: "yes",
    JIRA_BASE_URL: "https://jira.example.com",
    JIRA_TOKEN: "test-token",
    JIRA_TIMEOUT_MS: "5000",
    ANTHROPIC_API_KEY: "test-secret",
    ANTHROPIC_MODEL: "test-model",
    PLAN_MAX_TOKENS: "2048",
    PLAN_OUTPUT_DIR: "out",
    PROMPT_TEMPLATE: "prompts/implementation-plan.poml",
  });
  assert.deepEqual(config, {
    env: "test",
    logLevel: "debug",
    logToFile: true,
    jiraBaseUrl: "https://jira.example.com",
    jiraToken: "test-token",
    requestTimeoutMs: 5000,
    anthropicApiKey: "test-secret",
    model: "test-model",
    maxTokens: 2048,
    outputDir: "out",
    templatePath: "prompts/implementation-plan.poml",
  });
});

test("booleans accept 0 and false", () => {
  assert.equal(loadConfig({ LOG_TO_FILE: "0" }).logToFile, false);
  assert.equal(loadConfig({ LOG_TO_FILE: "FALSE" }).logToFile, false);
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

section("Validation");

test("rejects unknown NODE_ENV", () => {
  assert.equal(
    configError({ NODE_ENV: "staging" }),
    "Invalid NODE_ENV: staging. Must be development, production, test."
  );
});

test("rejects unknown LOG_LEVEL", () => {
  assert.equal(
    configError({ LOG_LEVEL: "verbose" }),
    "Invalid LOG_LEVEL: verbose. Must be debug, info, warn, error."
  );
});

test("rejects non-positive timeouts", () => {
  assert.equal(
    configError({ JIRA_TIMEOUT_MS: "0" }),
    "Environment variable JIRA_TIMEOUT_MS must be a positive integer, got: 0"
  );
  assert.equal(
    configError({ PLAN_MAX_TOKENS: "1.5" }),
    "Environment variable PLAN_MAX_TOKENS must be a positive integer, got: 1.5"
  );
});

test("rejects unrecognized booleans", () => {
  assert.equal(
    configError({ LOG_TO_FILE: "maybe" }),
    "Environment variable LOG_TO_FILE must be a boolean (true/false/1/0/yes/no), got: maybe"
  );
});

test("rejects base URLs that are not http(s)", () => {
  assert.equal(
    configError({ JIRA_BASE_URL: "ftp://jira.example.com" }),
    "Environment variable JIRA_BASE_URL must use http or https, got: ftp://jira.example.com"
  );
  assert.equal(
    configError({ JIRA_BASE_URL: "jira.example.com" }),
    "Environment variable JIRA_BASE_URL must be a URL, got: jira.example.com"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
