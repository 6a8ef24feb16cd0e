/**
 * Structured template phase 2: markup → StructuredDocument.
 *
 * Well-formedness is checked first with XMLValidator so that an unclosed or
 * mismatched element is reported with its position instead of producing a
 * half-built tree. The tree is then read leniently: unknown elements are
 * ignored (the text around them is kept) and missing ones default to empty
 * strings or empty lists.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { StructuralParseError } from "../errors.js";
import {
  ROOT_ELEMENT,
  type ContextSection,
  type OutputSection,
  type SectionMetadata,
  type StructuredDocument,
} from "./document.js";

const ATTRIBUTE_PREFIX = "@_";

/** Element paths that always parse as lists, even with one entry. */
const LIST_PATHS: ReadonlySet<string> = new Set([
  `${ROOT_ELEMENT}.context.section`,
  `${ROOT_ELEMENT}.instructions.requirement`,
  `${ROOT_ELEMENT}.output-format.section`,
]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  // Mixed content keeps the spaces around inline elements; flatten trims.
  trimValues: false,
  htmlEntities: true,
  isArray: (_name, jpath) => LIST_PATHS.has(jpath),
});

// ---------------------------------------------------------------------------
// Tree access
// ---------------------------------------------------------------------------

type XmlNode = Readonly<Record<string, unknown>>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A repeated element where one was expected resolves to its first entry. */
function single(value: unknown): unknown {
  return Array.isArray(value) ? value[0] : value;
}

function child(node: unknown, name: string): unknown {
  const current = single(node);
  return isNode(current) ? single(current[name]) : undefined;
}

function list(node: unknown, name: string): readonly unknown[] {
  const current = single(node);
  if (!isNode(current)) return [];
  const value = current[name];
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

/** Character data of an element; elements with attributes keep it in #text. */
function text(node: unknown): string {
  if (typeof node === "string") return node;
  if (typeof node === "number" || typeof node === "boolean") return String(node);
  if (isNode(node)) return text(node["#text"]);
  return "";
}

function attribute(node: unknown, name: string): string {
  return isNode(node) ? text(node[`${ATTRIBUTE_PREFIX}${name}`]) : "";
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

function metadata(node: unknown): SectionMetadata {
  return {
    status: text(child(node, "status")),
    type: text(child(node, "type")),
    priority: text(child(node, "priority")),
    assignee: text(child(node, "assignee")),
    reporter: text(child(node, "reporter")),
    components: text(child(node, "components")),
    labels: text(child(node, "labels")),
  };
}

function contextSection(node: unknown): ContextSection {
  return {
    name: attribute(node, "name"),
    title: text(child(node, "title")),
    description: text(child(node, "description")),
    metadata: metadata(child(node, "metadata")),
  };
}

function outputSection(node: unknown): OutputSection {
  return {
    name: attribute(node, "name"),
    title: text(child(node, "title")),
    content: text(child(node, "content")),
  };
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * Parse substituted structured markup.
 *
 * @throws StructuralParseError if the markup is not well-formed or its root
 *         element is not `<poml>`
 */
export function parseStructuredDocument(markup: string): StructuredDocument {
  const validation = XMLValidator.validate(markup);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new StructuralParseError(msg, line, col);
  }

  const tree: unknown = xmlParser.parse(markup);
  const roots = isNode(tree) ? Object.keys(tree).filter((key) => key !== "#text") : [];
  if (!isNode(tree) || !roots.includes(ROOT_ELEMENT)) {
    const found = roots.length > 0 ? `<${roots.join(">, <")}>` : "no element";
    throw new StructuralParseError(`expected root element <${ROOT_ELEMENT}>, found ${found}`);
  }

  const root = tree[ROOT_ELEMENT];

  return {
    role: text(child(root, "role")),
    task: text(child(root, "task")),
    context: {
      sections: list(child(root, "context"), "section").map(contextSection),
    },
    instructions: list(child(root, "instructions"), "requirement").map(text),
    outputFormat: {
      sections: list(child(root, "output-format"), "section").map(outputSection),
    },
    style: {
      formatting: text(child(child(root, "style"), "formatting")),
    },
  };
}
