/**
 * Structured prompt document.
 *
 * The parsed form of a `.poml` template after variable substitution:
 *
 *   <poml>
 *     <role>…</role>
 *     <task>…</task>
 *     <context>
 *       <section name="ticket">
 *         <title>…</title>
 *         <description>…</description>
 *         <metadata>
 *           <status/> <type/> <priority/> <assignee/>
 *           <reporter/> <components/> <labels/>
 *         </metadata>
 *       </section>
 *     </context>
 *     <instructions>
 *       <requirement>…</requirement>
 *     </instructions>
 *     <output-format>
 *       <section name="overview"><title/><content/></section>
 *     </output-format>
 *     <style><formatting>…</formatting></style>
 *   </poml>
 *
 * All collections are ordered as they appear in the markup.
 */

export interface SectionMetadata {
  readonly status: string;
  readonly type: string;
  readonly priority: string;
  readonly assignee: string;
  readonly reporter: string;
  readonly components: string;
  readonly labels: string;
}

export interface ContextSection {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly metadata: SectionMetadata;
}

export interface OutputSection {
  readonly name: string;
  readonly title: string;
  readonly content: string;
}

export interface StructuredDocument {
  readonly role: string;
  readonly task: string;
  readonly context: { readonly sections: readonly ContextSection[] };
  readonly instructions: readonly string[];
  readonly outputFormat: { readonly sections: readonly OutputSection[] };
  readonly style: { readonly formatting: string };
}

/** Root element name of a structured template. */
export const ROOT_ELEMENT = "poml";

/**
 * Metadata fields in the order they are flattened, with their labels.
 */
export const METADATA_FIELDS: ReadonlyArray<readonly [keyof SectionMetadata, string]> = [
  ["status", "Status"],
  ["type", "Type"],
  ["priority", "Priority"],
  ["assignee", "Assignee"],
  ["reporter", "Reporter"],
  ["components", "Components"],
  ["labels", "Labels"],
];
