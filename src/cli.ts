import { Command, CommanderError, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import * as z from "zod/v4";
import { loadJiraConfig } from "./config.js";
import { formatError } from "./errors.js";
import { JiraClient } from "./jira-client.js";
import { buildSearchQuery, DEFAULT_MAX_RESULTS, describeFilter } from "./jql.js";
import { renderSearchResult } from "./render.js";
import type { FilterIntent } from "./types.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const positiveInt = z.coerce.number().int().positive();

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliOptions {
  assignee?: string;
  label?: string;
  labels?: string[];
  matchAll: boolean;
  maxResults: number;
  verbose: boolean;
}

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line)
};

export function createProgram(io: CliIo = consoleIo): Command {
  return new Command()
    .name("jira-issue-finder")
    .description("Find Jira issues by assignee or labels, most recently updated first.")
    .version(pkg.version)
    .option("--assignee <username>", "issues assigned to this user (default: JIRA_DEFAULT_ASSIGNEE or JIRA_USERNAME)")
    .option("--label <label>", "issues carrying this label")
    .option("--labels <labels>", "comma-separated labels, e.g. backend,urgent", splitLabels)
    .option("--match-all", "with --labels, require every label instead of any", false)
    .option("--max-results <n>", "maximum number of issues to return", parsePositiveInt, DEFAULT_MAX_RESULTS)
    .option("--verbose", "print the JQL and request URL to stderr", false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.replace(/\n$/, "")),
      writeErr: (text) => io.stderr(text.replace(/\n$/, "")),
      outputError: () => {}
    });
}

export async function runCli(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIo = consoleIo
): Promise<number> {
  const program = createProgram(io);

  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0
        ? 0
        : fail(io, new Error(error.message.replace(/^error:\s*/i, "")));
    }

    throw error;
  }

  const options = program.opts<CliOptions>();

  const config = loadJiraConfig(env);
  if (config.isErr()) {
    return fail(io, config.error);
  }

  const intent = resolveFilterIntent(options, config.value.defaultAssignee);
  const query = buildSearchQuery(intent, { maxResults: options.maxResults });
  const client = new JiraClient(config.value);

  if (options.verbose) {
    io.stderr(`JQL: ${query.jql}`);
    io.stderr(`GET ${client.buildSearchUrl(query).toString()}`);
  }

  const result = await client.search(query);
  if (result.isErr()) {
    return fail(io, result.error);
  }

  const lines = renderSearchResult(result.value, {
    title: describeFilter(intent),
    browseUrl: (key) => client.browseUrl(key)
  });
  for (const line of lines) {
    io.stdout(line);
  }

  return 0;
}

export function resolveFilterIntent(options: CliOptions, defaultAssignee: string): FilterIntent {
  if (options.label !== undefined) {
    return { kind: "label", label: options.label };
  }

  const [first, ...rest] = options.labels ?? [];
  if (first !== undefined) {
    return { kind: "labels", labels: [first, ...rest], matchAll: options.matchAll };
  }

  return { kind: "assignee", username: options.assignee ?? defaultAssignee };
}

export function splitLabels(value: string): string[] {
  return value
    .split(",")
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

function parsePositiveInt(value: string): number {
  const parsed = positiveInt.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }

  return parsed.data;
}

function fail(io: CliIo, error: unknown): number {
  io.stderr(`Error: ${formatError(error)}`);
  return 1;
}
