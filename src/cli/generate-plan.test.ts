/**
 * generate-plan argument parsing tests.
 *
 * Run: node --import tsx src/cli/generate-plan.test.ts
 */

import { strict as assert } from "node:assert";

import { parseCliArgs, USAGE, type CliOptions } from "./generate-plan.js";

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

const DEFAULTS: CliOptions = {
  ticketId: "LOGIN-1",
  token: undefined,
  jiraBaseUrl: undefined,
  template: undefined,
  model: undefined,
  outputDir: undefined,
  preview: false,
  color: true,
};

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Argument Parsing");

test("ticket id alone uses defaults", () => {
  assert.deepEqual(parseCliArgs(["LOGIN-1"]), { kind: "run", options: DEFAULTS });
});

test("all options are read", () => {
  assert.deepEqual(
    parseCliArgs([
      "-t",
      "test-token",
      "--jira-base-url",
      "https://jira.example.com",
      "--template",
      "prompts/implementation-plan.poml",
      "--model",
      "test-model",
      "--output-dir",
      "out",
      "--preview",
      "--no-color",
      "OPS-2",
    ]),
    {
      kind: "run",
      options: {
        ticketId: "OPS-2",
        token: "test-token",
        jiraBaseUrl: "https://jira.example.com",
        template: "prompts/implementation-plan.poml",
        model: "test-model",
        outputDir: "out",
        preview: true,
        color: false,
      },
    }
  );
});

test("options may follow the ticket id", () => {
  assert.deepEqual(parseCliArgs(["LOGIN-1", "--token", "test-token"]), {
    kind: "run",
    options: { ...DEFAULTS, token: "test-token" },
  });
});

test("help wins over everything else", () => {
  assert.deepEqual(parseCliArgs(["-h"]), { kind: "help" });
  assert.deepEqual(parseCliArgs(["--help", "LOGIN-1"]), { kind: "help" });
});

test("missing ticket id is an error", () => {
  assert.deepEqual(parseCliArgs([]), {
    kind: "error",
    message: "Expected exactly one ticket id, got 0",
  });
});

test("more than one ticket id is an error", () => {
  assert.deepEqual(parseCliArgs(["LOGIN-1", "LOGIN-2"]), {
    kind: "error",
    message: "Expected exactly one ticket id, got 2",
  });
});

test("unknown options are errors", () => {
  assert.equal(parseCliArgs(["--bogus", "LOGIN-1"]).kind, "error");
});

test("option without its value is an error", () => {
  assert.equal(parseCliArgs(["LOGIN-1", "--template"]).kind, "error");
});

test("usage lists every option", () => {
  for (const flag of ["--token", "--jira-base-url", "--template", "--model", "--output-dir", "--preview", "--no-color", "--help"]) {
    assert.ok(USAGE.includes(flag), `${flag} missing from usage`);
  }
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
