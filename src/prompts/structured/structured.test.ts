/**
 * Structured template dialect tests.
 *
 * Run: node --import tsx src/prompts/structured/structured.test.ts
 *
 * Tests cover:
 *   1. Phase 1 — substitution with XML escaping
 *   2. Phase 2 — markup parsing and malformed input
 *   3. Flatten — block order, omission rules, determinism
 */

import { strict as assert } from "node:assert";

import { normalizeTicket } from "../../tickets/normalizer.js";
import { projectTicket } from "../context.js";
import { StructuralParseError, SubstitutionError } from "../errors.js";
import {
  escapeXml,
  substituteStructured,
  renderStructured,
  parseStructuredDocument,
  flattenStructuredDocument,
  type StructuredDocument,
  type SectionMetadata,
} from "./index.js";

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

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const EMPTY_METADATA: SectionMetadata = {
  status: "",
  type: "",
  priority: "",
  assignee: "",
  reporter: "",
  components: "",
  labels: "",
};

function document(overrides: Partial<StructuredDocument>): StructuredDocument {
  return {
    role: "",
    task: "",
    context: { sections: [] },
    instructions: [],
    outputFormat: { sections: [] },
    style: { formatting: "" },
    ...overrides,
  };
}

const CONTEXT = projectTicket(
  normalizeTicket(
    {
      summary: "Fix <login> & logout",
      status: { id: "1", name: "Open" },
      assignee: { displayName: "Dana O'Neil" },
    },
    { id: "10001", key: "LOGIN-1" }
  )
);

// ═══════════════════════════════════════════════════════════════════════════
// PHASE 1
// ═══════════════════════════════════════════════════════════════════════════

section("Phase 1 — Substitution");

test("escapeXml escapes the five special characters", () => {
  assert.equal(escapeXml(`a<b>&"c'`), "a&lt;b&gt;&amp;&quot;c&apos;");
  assert.equal(escapeXml("plain"), "plain");
});

test("substituted values are escaped, literal markup is not", () => {
  assert.equal(
    substituteStructured("<poml><task>{{ticket.summary}}</task></poml>", CONTEXT),
    "<poml><task>Fix &lt;login&gt; &amp; logout</task></poml>"
  );
});

test("substitution resolves conditionals before parsing", () => {
  const source =
    '<poml>\n{{#if ticket.status == "Open"}}\n<task>open</task>\n{{/if}}\n{{#if ticket.labels}}\n<task>labelled</task>\n{{/if}}\n</poml>';
  assert.equal(substituteStructured(source, CONTEXT), "<poml>\n<task>open</task>\n</poml>");
});

test("unknown variables fail in phase 1", () => {
  assert.throws(
    () => substituteStructured("<poml>{{ticket.key}}</poml>", CONTEXT, "plan"),
    (err: unknown) =>
      err instanceof SubstitutionError &&
      err.templateName === "plan" &&
      err.issues.length === 1 &&
      err.issues[0] === 'Unknown variable "ticket.key"'
  );
});

test("a phase 1 failure is reported even when the markup is also malformed", () => {
  assert.throws(
    () => renderStructured("<poml><task>{{ticket.key}}", CONTEXT),
    SubstitutionError
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// PHASE 2
// ═══════════════════════════════════════════════════════════════════════════

section("Phase 2 — Parsing");

test("parses every element into the document", () => {
  const doc = parseStructuredDocument(`
    <poml>
      <role>Engineer</role>
      <task>Plan</task>
      <context>
        <section name="ticket">
          <title>LOGIN-1</title>
          <description>Broken</description>
          <metadata><status>Open</status><labels>a, b</labels></metadata>
        </section>
      </context>
      <instructions><requirement>One</requirement><requirement>Two</requirement></instructions>
      <output-format>
        <section name="overview"><title>Overview</title><content>Summary</content></section>
      </output-format>
      <style><formatting>Markdown</formatting></style>
    </poml>`);

  assert.deepEqual(doc, {
    role: "Engineer",
    task: "Plan",
    context: {
      sections: [
        {
          name: "ticket",
          title: "LOGIN-1",
          description: "Broken",
          metadata: { ...EMPTY_METADATA, status: "Open", labels: "a, b" },
        },
      ],
    },
    instructions: ["One", "Two"],
    outputFormat: { sections: [{ name: "overview", title: "Overview", content: "Summary" }] },
    style: { formatting: "Markdown" },
  });
});

test("single entries still parse as lists", () => {
  const doc = parseStructuredDocument(
    "<poml><instructions><requirement>Only</requirement></instructions></poml>"
  );
  assert.deepEqual(doc.instructions, ["Only"]);
});

test("missing elements default to empty", () => {
  const doc = parseStructuredDocument("<poml></poml>");
  assert.deepEqual(doc, document({}));
});

test("entities decode back to the original value", () => {
  const doc = parseStructuredDocument("<poml><task>Fix &lt;login&gt; &amp; logout</task></poml>");
  assert.equal(doc.task, "Fix <login> & logout");
});

test("decimal and hex character references decode", () => {
  const doc = parseStructuredDocument("<poml><task>a&#38;b &#x41;</task></poml>");
  assert.equal(doc.task, "a&b A");
});

test("the first of duplicate scalar elements wins", () => {
  const doc = parseStructuredDocument("<poml><task>first</task><task>second</task></poml>");
  assert.equal(doc.task, "first");
});

test("unknown elements are ignored", () => {
  const doc = parseStructuredDocument("<poml><audience>Team</audience><task>Plan</task></poml>");
  assert.equal(doc.task, "Plan");
});

test("unknown inline elements keep the surrounding spaces", () => {
  const doc = parseStructuredDocument("<poml><task>Plan <b>the</b> fix now</task></poml>");
  assert.equal(flattenStructuredDocument(doc), "Task: Plan  fix now\n");
});

test("unclosed element is a parse error with a position", () => {
  assert.throws(
    () => parseStructuredDocument("<poml>\n  <task>Plan\n</poml>"),
    (err: unknown) =>
      err instanceof StructuralParseError &&
      err.stage === "parse" &&
      typeof err.line === "number" &&
      err.message.startsWith("Malformed structured template at line ")
  );
});

test("bare ampersand is a parse error", () => {
  assert.throws(() => parseStructuredDocument("<poml><task>a & b</task></poml>"), StructuralParseError);
});

test("text without markup is a parse error", () => {
  assert.throws(() => parseStructuredDocument("just some text"), StructuralParseError);
});

test("wrong root element is a parse error", () => {
  assert.throws(
    () => parseStructuredDocument("<prompt><task>Plan</task></prompt>"),
    (err: unknown) =>
      err instanceof StructuralParseError &&
      err.line === undefined &&
      err.message ===
        "Malformed structured template: expected root element <poml>, found <prompt>"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// FLATTEN
// ═══════════════════════════════════════════════════════════════════════════

section("Flatten");

test("task and a titled section only", () => {
  const doc = document({
    task: "Plan the fix",
    context: {
      sections: [{ name: "ticket", title: "LOGIN-1", description: "", metadata: EMPTY_METADATA }],
    },
  });
  assert.equal(flattenStructuredDocument(doc), "Task: Plan the fix\n\nContext:\n\nTicket: LOGIN-1\n");
});

test("the same document parsed from markup flattens identically", () => {
  const text = renderStructured(
    '<poml><role>  </role><task>Plan the fix</task><context><section name="ticket"><title>LOGIN-1</title><description/></section></context></poml>',
    CONTEXT
  );
  assert.equal(text, "Task: Plan the fix\n\nContext:\n\nTicket: LOGIN-1\n");
});

test("empty document flattens to empty text", () => {
  assert.equal(flattenStructuredDocument(document({})), "");
});

test("sections with nothing to say are dropped with their heading", () => {
  const doc = document({
    role: "Engineer",
    context: {
      sections: [{ name: "ticket", title: " ", description: "", metadata: EMPTY_METADATA }],
    },
    outputFormat: { sections: [{ name: "empty", title: "", content: "" }] },
  });
  assert.equal(flattenStructuredDocument(doc), "Role: Engineer\n");
});

test("metadata lines follow the fixed label order", () => {
  const doc = document({
    context: {
      sections: [
        {
          name: "ticket",
          title: "",
          description: "Broken",
          metadata: {
            status: "Open",
            type: "Bug",
            priority: "",
            assignee: "Unassigned",
            reporter: "Sam",
            components: "Auth",
            labels: "x",
          },
        },
      ],
    },
  });
  assert.equal(
    flattenStructuredDocument(doc),
    "Context:\n\nDescription: Broken\nStatus: Open\nType: Bug\nAssignee: Unassigned\nReporter: Sam\nComponents: Auth\nLabels: x\n"
  );
});

test("multiple context sections are separated by blank lines", () => {
  const doc = document({
    context: {
      sections: [
        { name: "a", title: "A-1", description: "", metadata: EMPTY_METADATA },
        { name: "b", title: "B-2", description: "", metadata: EMPTY_METADATA },
      ],
    },
  });
  assert.equal(flattenStructuredDocument(doc), "Context:\n\nTicket: A-1\n\nTicket: B-2\n");
});

test("instructions skip blank items", () => {
  const doc = document({ instructions: [" First ", "", "  ", "Second"] });
  assert.equal(flattenStructuredDocument(doc), "Instructions:\n- First\n- Second\n");
});

test("output format and style blocks", () => {
  const doc = document({
    outputFormat: {
      sections: [
        { name: "overview", title: "Overview", content: "Short summary." },
        { name: "notes", title: "", content: "Free text." },
      ],
    },
    style: { formatting: " Markdown " },
  });
  assert.equal(
    flattenStructuredDocument(doc),
    "Please provide your response in the following format:\n\n## Overview\nShort summary.\n\nFree text.\n" +
      "\nFormatting Guidelines:\nMarkdown\n"
  );
});

test("flatten is deterministic", () => {
  const doc = document({
    role: "Engineer",
    task: "Plan",
    instructions: ["One", "Two"],
    style: { formatting: "Markdown" },
  });
  assert.equal(flattenStructuredDocument(doc), flattenStructuredDocument(doc));
});

test("end to end with escaped values", () => {
  const text = renderStructured(
    "<poml><task>{{ticket.summary}}</task><context><section><title>{{ticket.summary}}</title>" +
      "<metadata><assignee>{{ticket.assignee}}</assignee></metadata></section></context></poml>",
    CONTEXT
  );
  assert.equal(
    text,
    "Task: Fix <login> & logout\n\nContext:\n\nTicket: Fix <login> & logout\nAssignee: Dana O'Neil\n"
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
