#!/usr/bin/env node
/**
 * CLI: generate an implementation plan for a Jira ticket.
 *
 * Fetches the ticket, renders it through a prompt template (flat `.md` or
 * structured `.poml`), sends the prompt to the plan generator, prints the
 * plan and saves it as Markdown.
 *
 * USAGE:
 *
 *   npm run generate-plan -- LOGIN-1
 *   npm run generate-plan -- --token <pat> LOGIN-1
 *   npm run generate-plan -- --template prompts/implementation-plan.poml --preview LOGIN-1
 *
 * Options:
 *   -t, --token <pat>         Jira Personal Access Token (default: JIRA_TOKEN)
 *   --jira-base-url <url>     Jira instance (default: JIRA_BASE_URL or issues.redhat.com)
 *   --template <path>         Prompt template (default: prompts/implementation-plan.md)
 *   --model <id>              Generation model (default: ANTHROPIC_MODEL)
 *   --output-dir <dir>        Where plans are saved (default: implementation-plans)
 *   --preview                 Print the rendered prompt and stop
 *   --no-color                Disable ANSI colors
 *   -h, --help                Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (configuration, ticket, template, generation)
 */

import { parseArgs } from "node:util";

import { loadConfig, type AppConfig } from "../config/index.js";
import { createLogger, initRunId } from "../logging/index.js";
import { JiraClient } from "../jira/index.js";
import { TemplateSourceLoader } from "../prompts/index.js";
import { AnthropicPlanGenerator } from "../generation/index.js";
import { savePlan } from "../plans/writer.js";
import { buildPrompt, generatePlan } from "../pipeline/plan-pipeline.js";
import { formatComponentList, assigneeName, type Ticket } from "../tickets/index.js";

// ============================================================
// CLI Parsing
// ============================================================

export interface CliOptions {
  ticketId: string;
  token?: string;
  jiraBaseUrl?: string;
  template?: string;
  model?: string;
  outputDir?: string;
  preview: boolean;
  color: boolean;
}

export type ParsedCli =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "error"; message: string };

export const USAGE = `
Usage: generate-plan [options] <TICKET_ID>

Options:
  -t, --token <pat>         Jira Personal Access Token (default: JIRA_TOKEN)
  --jira-base-url <url>     Jira instance base URL
  --template <path>         Prompt template (.md/.txt flat, .poml structured)
  --model <id>              Generation model
  --output-dir <dir>        Directory for saved plans
  --preview                 Print the rendered prompt without generating a plan
  --no-color                Disable ANSI colors
  -h, --help                Show this help message
`;

export function parseCliArgs(argv: string[]): ParsedCli {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        token: { type: "string", short: "t" },
        "jira-base-url": { type: "string" },
        template: { type: "string" },
        model: { type: "string" },
        "output-dir": { type: "string" },
        preview: { type: "boolean", default: false },
        "no-color": { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    if (values.help) {
      return { kind: "help" };
    }
    if (positionals.length !== 1) {
      return {
        kind: "error",
        message: `Expected exactly one ticket id, got ${positionals.length}`,
      };
    }

    return {
      kind: "run",
      options: {
        ticketId: positionals[0],
        token: values.token,
        jiraBaseUrl: values["jira-base-url"],
        template: values.template,
        model: values.model,
        outputDir: values["output-dir"],
        preview: values.preview === true,
        color: values["no-color"] !== true,
      },
    };
  } catch (err) {
    // parseArgs rejects unknown options and missing option values
    return { kind: "error", message: err instanceof Error ? err.message : String(err) };
  }
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  magenta: "\x1b[35m",
};

let useColors = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function separator(): string {
  return c("bold", "═".repeat(60));
}

function printTicketInfo(ticket: Ticket): void {
  const components = formatComponentList(ticket.components);
  const description =
    ticket.description.length > 200
      ? `${ticket.description.slice(0, 200)}...`
      : ticket.description;

  console.log("");
  console.log(separator());
  console.log(c("bold", " Ticket"));
  console.log(separator());
  console.log(`  ${c("cyan", "Ticket:")}      ${ticket.key} - ${ticket.summary}`);
  console.log(`  ${c("cyan", "Status:")}      ${ticket.status.name}`);
  console.log(`  ${c("cyan", "Type:")}        ${ticket.issueType.name}`);
  console.log(`  ${c("cyan", "Priority:")}    ${ticket.priority.name}`);
  console.log(
    `  ${c("cyan", "Assignee:")}    ${ticket.assignee ? assigneeName(ticket) : c("yellow", "Unassigned")}`
  );
  console.log(`  ${c("cyan", "Reporter:")}    ${ticket.reporter.displayName}`);
  console.log(`  ${c("cyan", "Components:")}  ${components || c("yellow", "None")}`);
  if (ticket.labels.length > 0) {
    console.log(`  ${c("cyan", "Labels:")}      ${ticket.labels.join(", ")}`);
  }
  console.log(`  ${c("cyan", "Description:")} ${description}`);
  console.log(separator());
}

// ============================================================
// Main
// ============================================================

async function run(options: CliOptions, config: AppConfig): Promise<void> {
  const logger = createLogger({ level: config.logLevel, file: config.logToFile });
  const token = options.token ?? config.jiraToken;
  const baseUrl = options.jiraBaseUrl ?? config.jiraBaseUrl;

  const tickets = new JiraClient({ baseUrl, token, timeoutMs: config.requestTimeoutMs });
  if (tickets.authenticated) {
    logger.info("Using Personal Access Token for authentication");
    await tickets.testAuthentication();
    logger.info("Authentication successful");
  } else {
    logger.info("Using anonymous access (public tickets only)");
  }
  logger.info("Using Jira instance", { baseUrl: tickets.baseUrl });

  const deps = { tickets, templates: new TemplateSourceLoader(), logger };
  const templatePath = options.template ?? config.templatePath;

  if (options.preview) {
    const { ticket, prompt } = await buildPrompt(options.ticketId, templatePath, deps);
    printTicketInfo(ticket);
    console.log(prompt);
    return;
  }

  const generator = new AnthropicPlanGenerator({
    apiKey: config.anthropicApiKey,
    model: options.model ?? config.model,
    maxTokens: config.maxTokens,
  });

  const result = await generatePlan(
    {
      ticketId: options.ticketId,
      templatePath,
      outputDir: options.outputDir ?? config.outputDir,
    },
    { ...deps, generator, savePlan }
  );

  printTicketInfo(result.ticket);
  console.log("");
  console.log(separator());
  console.log(c("magenta", " Implementation Plan"));
  console.log(separator());
  console.log(result.plan);
  console.log(separator());

  if (result.savedTo) {
    console.log(c("green", `Implementation plan saved to: ${result.savedTo}`));
  }
}

async function main(): Promise<void> {
  initRunId();
  const cli = parseCliArgs(process.argv.slice(2));

  if (cli.kind === "help") {
    console.log(USAGE);
    process.exit(0);
  }
  if (cli.kind === "error") {
    console.error(c("red", `Error: ${cli.message}`));
    console.error(USAGE);
    process.exit(1);
  }

  if (!cli.options.color) {
    useColors = false;
  }

  await run(cli.options, loadConfig());
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("generate-plan") ||
   process.argv[1].endsWith("generate-plan.ts") ||
   process.argv[1].endsWith("generate-plan.js"));

if (isDirectExecution) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exit(1);
  });
}
