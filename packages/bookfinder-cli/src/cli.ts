import { createRequire } from "node:module";

import {
  CliAppError,
  createCommandContext,
  createErrorEnvelope,
  createLogger,
  createSuccessEnvelope,
  EXIT_CODES,
  mapErrorCodeToExitCode,
  toCliAppError,
  type Logger,
} from "bookfinder-cli-core";

import { renderSearchOutput, runSearchCommand } from "./commands/search.js";
import { renderTopicsOutput, runTopicsCommand } from "./commands/topics.js";
import { createOreillyClient, type CatalogClient } from "./domain/client.js";
import { resolveClientConfig, type FlagValue } from "./domain/config.js";
import type { OpenCsvFile } from "./domain/export/csv.js";
import { isCalendarDay } from "./domain/filter.js";
import { DEFAULT_TIMEOUT_MS } from "./domain/http/session.js";
import { buildUnknownTopicError, resolveTopics } from "./domain/topics.js";
import type { SearchOptions } from "./domain/types.js";

interface WritableLike {
  write: (chunk: string) => unknown;
}

export interface BookfinderCliDeps {
  client?: CatalogClient;
  fetchImpl?: typeof fetch;
  stdout?: WritableLike;
  stderr?: WritableLike;
  openFile?: OpenCsvFile;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  clock?: () => number;
  now?: () => Date;
  requestIdFactory?: () => string;
}

interface ParsedArgs {
  command: string | undefined;
  flags: Map<string, FlagValue>;
  positional: string[];
  /** Single-dash tokens that are not a known short alias, e.g. `-x`. */
  unknownShortFlags: string[];
}

interface VersionInfo {
  name: string;
  version: string;
}

const SHORT_FLAG_ALIASES: Record<string, string> = {
  "-h": "help",
  "-V": "version",
  "-v": "verbose",
  "-a": "author",
  "-l": "limit",
  "-p": "page",
  "-o": "output",
  "-t": "topic",
};

const BOOLEAN_FLAGS = new Set([
  "help",
  "version",
  "verbose",
  "json",
  "dry-run",
  "list-topics",
  "all-topics",
  "strict-topics",
]);

const GLOBAL_FLAGS = ["help", "version", "verbose", "json"];

const SEARCH_FLAGS = new Set([
  ...GLOBAL_FLAGS,
  "query",
  "author",
  "after",
  "before",
  "limit",
  "page",
  "output",
  "topic",
  "fields",
  "list-topics",
  "all-topics",
  "strict-topics",
  "dry-run",
  "base-url",
  "timeout-ms",
]);

const TOPICS_FLAGS = new Set(GLOBAL_FLAGS);

const CLI_VERSION = loadVersionInfo();
const DEFAULT_LIMIT = 10;
const DEFAULT_PAGE = 0;

export async function runCli(argv: string[], deps: BookfinderCliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const parsed = parseArgs(argv);
  const json = isFlagEnabled(parsed.flags, "json");
  const verbose = isFlagEnabled(parsed.flags, "verbose");
  const logger = createLogger({
    stream: stderr,
    level: verbose ? "debug" : "warn",
    component: "bookfinder",
  });

  const context = createCommandContext({
    clock: deps.clock,
    now: deps.now,
    requestIdFactory: deps.requestIdFactory,
    verbose,
  });

  if (hasFlag(parsed.flags, "version") || parsed.command === "version") {
    if (json) {
      stdout.write(`${JSON.stringify(createSuccessEnvelope(CLI_VERSION, context.toMeta()))}\n`);
    } else {
      stdout.write(`${CLI_VERSION.name} ${CLI_VERSION.version}\n`);
    }
    return EXIT_CODES.SUCCESS;
  }

  if (parsed.command === undefined || parsed.command === "help" || hasFlag(parsed.flags, "help")) {
    const command = parsed.command === "help" ? parsed.positional[0] : parsed.command;
    const helpText = renderHelp(command);
    if (json) {
      stdout.write(
        `${JSON.stringify(createSuccessEnvelope({ help: helpText, command }, context.toMeta()))}\n`,
      );
    } else {
      stdout.write(`${helpText}\n`);
    }
    return EXIT_CODES.SUCCESS;
  }

  const getClient = async (): Promise<CatalogClient> => {
    if (deps.client) {
      return deps.client;
    }

    const resolved = await resolveClientConfig({
      cwd: deps.cwd ?? process.cwd(),
      env: deps.env ?? process.env,
      homeDir: deps.homeDir,
      getFlag: (key) => parsed.flags.get(key),
    });
    logger.debug(`Using ${resolved.baseUrl} (from ${resolved.baseUrlSource})`);

    return createOreillyClient({
      baseUrl: resolved.baseUrl,
      timeoutMs: resolved.timeoutMs,
      fetchImpl: deps.fetchImpl,
      logger: logger.child("http"),
    });
  };

  try {
    const result = await dispatch(parsed, {
      getClient,
      openFile: deps.openFile,
      logger,
    });

    if (json) {
      stdout.write(`${JSON.stringify(createSuccessEnvelope(result.data, context.toMeta()))}\n`);
    } else {
      stdout.write(`${result.humanOutput}\n`);
    }

    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const appError = toCliAppError(error);
    const exitCode = mapErrorCodeToExitCode(appError.code);

    if (json) {
      stdout.write(
        `${JSON.stringify(
          createErrorEnvelope(appError.code, appError.message, appError.details),
        )}\n`,
      );
    } else {
      stderr.write(formatHumanError(appError, verbose));
    }

    return exitCode;
  }
}

interface DispatchDeps {
  getClient: () => Promise<CatalogClient>;
  openFile?: OpenCsvFile;
  logger: Logger;
}

interface DispatchResult {
  data: unknown;
  humanOutput: string;
}

async function dispatch(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  switch (parsed.command) {
    case "search":
      return dispatchSearch(parsed, deps);
    case "topics":
      return dispatchTopics(parsed);
    default:
      throw createArgumentError("E_ARG_UNSUPPORTED", `Unknown command: ${parsed.command}`, {
        command: parsed.command,
      });
  }
}

function dispatchTopics(parsed: ParsedArgs): DispatchResult {
  rejectUnknownFlags(parsed, TOPICS_FLAGS);
  if (parsed.positional.length > 0) {
    throw createArgumentError("E_ARG_UNSUPPORTED", "topics command does not accept arguments", {
      positional: parsed.positional,
    });
  }

  const output = runTopicsCommand();
  return {
    data: output,
    humanOutput: renderTopicsOutput(output),
  };
}

async function dispatchSearch(parsed: ParsedArgs, deps: DispatchDeps): Promise<DispatchResult> {
  if (getBooleanFlag(parsed.flags, "list-topics")) {
    const output = runTopicsCommand();
    return {
      data: output,
      humanOutput: renderTopicsOutput(output),
    };
  }

  rejectUnknownFlags(parsed, SEARCH_FLAGS);

  const query = [getOptionalString(parsed.flags, "query"), ...parsed.positional]
    .filter((part): part is string => part !== undefined && part.trim().length > 0)
    .join(" ");
  const author = getOptionalString(parsed.flags, "author");
  const after = getOptionalDate(parsed.flags, "after");
  const before = getOptionalDate(parsed.flags, "before");
  const limit = getPositiveInteger(parsed.flags, "limit", DEFAULT_LIMIT);
  const page = getNonNegativeInteger(parsed.flags, "page", DEFAULT_PAGE);
  validateConnectionFlags(parsed.flags);
  const outputPath = getOptionalString(parsed.flags, "output");
  const fields = getStringValues(parsed.flags, "fields").flatMap((value) => value.split(","));

  const topicResolution = resolveTopics(getStringValues(parsed.flags, "topic"));
  if (topicResolution.invalid.length > 0) {
    throw buildUnknownTopicError(topicResolution.invalid);
  }

  const options: SearchOptions = {
    query: query.length > 0 ? query : undefined,
    author,
    topics: topicResolution.topics,
    allTopics: getBooleanFlag(parsed.flags, "all-topics"),
    after,
    before,
    page,
    limit,
    fields: fields.length > 0 ? fields : undefined,
  };

  const output = await runSearchCommand(await deps.getClient(), {
    options,
    outputPath,
    strictTopics: getBooleanFlag(parsed.flags, "strict-topics"),
    dryRun: getBooleanFlag(parsed.flags, "dry-run"),
    openFile: deps.openFile,
    logger: deps.logger.child("search"),
  });

  return {
    data: output,
    humanOutput: renderSearchOutput(output),
  };
}

function parseArgs(argv: string[]): ParsedArgs {
  let command: string | undefined;
  const flags = new Map<string, FlagValue>();
  const positional: string[] = [];
  const unknownShortFlags: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === undefined) {
      continue;
    }

    const shortAlias = SHORT_FLAG_ALIASES[token];
    const key = shortAlias ?? (token.startsWith("--") ? token.slice(2) : undefined);

    if (key !== undefined) {
      const eqIndex = shortAlias === undefined ? key.indexOf("=") : -1;
      if (eqIndex >= 0) {
        appendFlagValue(flags, key.slice(0, eqIndex), key.slice(eqIndex + 1));
        continue;
      }

      if (BOOLEAN_FLAGS.has(key)) {
        flags.set(key, true);
        continue;
      }

      const next = argv[index + 1];
      if (next !== undefined && !next.startsWith("-")) {
        appendFlagValue(flags, key, next);
        index += 1;
        continue;
      }

      flags.set(key, true);
      continue;
    }

    if (token.startsWith("-") && token.length > 1) {
      unknownShortFlags.push(token);
      continue;
    }

    if (command === undefined) {
      command = token;
      continue;
    }

    positional.push(token);
  }

  return {
    command,
    flags,
    positional,
    unknownShortFlags,
  };
}

function hasFlag(flags: Map<string, FlagValue>, key: string): boolean {
  return flags.has(key);
}

function isFlagEnabled(flags: Map<string, FlagValue>, key: string): boolean {
  const value = flags.get(key);
  return value !== undefined && value !== "false";
}

function appendFlagValue(flags: Map<string, FlagValue>, key: string, value: string): void {
  const previous = flags.get(key);
  if (previous === undefined || typeof previous === "boolean") {
    flags.set(key, value);
    return;
  }

  if (Array.isArray(previous)) {
    flags.set(key, [...previous, value]);
    return;
  }

  flags.set(key, [previous, value]);
}

function rejectUnknownFlags(parsed: ParsedArgs, allowed: Set<string>): void {
  const unknown = [
    ...Array.from(parsed.flags.keys())
      .filter((key) => !allowed.has(key))
      .map((key) => `--${key}`),
    ...parsed.unknownShortFlags,
  ];
  if (unknown.length > 0) {
    throw createArgumentError(
      "E_ARG_UNSUPPORTED",
      `Unknown flag${unknown.length > 1 ? "s" : ""} for ${parsed.command}: ${unknown.join(", ")}`,
      { flags: unknown },
    );
  }
}

function getBooleanFlag(flags: Map<string, FlagValue>, key: string): boolean {
  const value = flags.get(key);
  if (value === undefined) {
    return false;
  }

  if (typeof value === "boolean") {
    return value;
  }

  const candidate = Array.isArray(value) ? value.at(-1) : value;
  if (candidate === "true") {
    return true;
  }

  if (candidate === "false") {
    return false;
  }

  throw createArgumentError("E_ARG_INVALID", `--${key} must be true or false`, {
    arg: key,
    value: candidate,
  });
}

function getOptionalString(flags: Map<string, FlagValue>, key: string): string | undefined {
  const value = flags.get(key);
  if (value === undefined) {
    return undefined;
  }

  if (typeof value === "boolean") {
    throw createArgumentError("E_ARG_MISSING", `--${key} requires a value`, {
      arg: key,
    });
  }

  if (Array.isArray(value)) {
    const candidate = value.at(-1);
    return candidate !== undefined && candidate.trim().length > 0 ? candidate.trim() : undefined;
  }

  return value.trim().length > 0 ? value.trim() : undefined;
}

function getStringValues(flags: Map<string, FlagValue>, key: string): string[] {
  const value = flags.get(key);
  if (value === undefined) {
    return [];
  }

  if (typeof value === "boolean") {
    throw createArgumentError("E_ARG_MISSING", `--${key} requires a value`, {
      arg: key,
    });
  }

  const values = Array.isArray(value) ? value : [value];
  return values.filter((item) => item.trim().length > 0);
}

function getPositiveInteger(flags: Map<string, FlagValue>, key: string, fallback: number): number {
  const value = getOptionalString(flags, key);
  if (value === undefined) {
    return fallback;
  }

  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw createArgumentError("E_ARG_INVALID", `--${key} must be a positive integer`, {
      arg: key,
      value,
    });
  }

  return parsed;
}

function getNonNegativeInteger(
  flags: Map<string, FlagValue>,
  key: string,
  fallback: number,
): number {
  const value = getOptionalString(flags, key);
  if (value === undefined) {
    return fallback;
  }

  const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw createArgumentError("E_ARG_INVALID", `--${key} must be a non-negative integer`, {
      arg: key,
      value,
    });
  }

  return parsed;
}

/** The config chain reads these; here they are only checked before a client exists. */
function validateConnectionFlags(flags: Map<string, FlagValue>): void {
  getOptionalString(flags, "base-url");
  getPositiveInteger(flags, "timeout-ms", DEFAULT_TIMEOUT_MS);
}

function getOptionalDate(flags: Map<string, FlagValue>, key: string): string | undefined {
  const value = getOptionalString(flags, key);
  if (value === undefined) {
    return undefined;
  }

  if (!isCalendarDay(value)) {
    throw createArgumentError("E_ARG_INVALID", `--${key} must be a date in YYYY-MM-DD format`, {
      arg: key,
      value,
    });
  }

  return value;
}

function renderHelp(command?: string): string {
  if (command === "search") {
    return [
      "bookfinder search",
      "",
      "Search O'Reilly books. Without --topic or --all-topics, only data science and AI",
      "topics are searched.",
      "",
      "Usage:",
      "  bookfinder search [query...] [options]",
      "",
      "Options:",
      "  -a, --author <name>      Filter by author",
      "  --after <YYYY-MM-DD>     Keep books published on or after this date",
      "  --before <YYYY-MM-DD>    Keep books published on or before this date",
      "  -l, --limit <n>          Results per page (default 10)",
      "  -p, --page <n>           Page number, 0 is the first page (default 0)",
      "  -o, --output <path>      Save results to a CSV file instead of printing them",
      "  -t, --topic <name>       Filter by topic (repeatable, comma-separated)",
      "  --list-topics            List available topics and exit",
      "  --all-topics             Search all topics (disable the default topic filter)",
      "  --strict-topics          Drop results that list none of the requested topics",
      "  --fields <a,b>           Ask the API for specific result fields",
      "  --dry-run                Print the request URL without sending it",
      "  --base-url <url>         Search API origin (default https://learning.oreilly.com)",
      "  --timeout-ms <n>         Request timeout in milliseconds (default 15000)",
    ].join("\n");
  }

  if (command === "topics") {
    return ["bookfinder topics", "", "Usage:", "  bookfinder topics [--json]"].join("\n");
  }

  if (command === "version") {
    return ["bookfinder version", "", "Usage:", "  bookfinder version [--json]"].join("\n");
  }

  return [
    "bookfinder CLI",
    "",
    "Usage:",
    "  bookfinder [--help|-h] [--version|-V]",
    "  bookfinder help [command]",
    "  bookfinder version [--json]",
    "  bookfinder search [query...] [-a <author>] [--after <date>] [--before <date>] [-l <n>] [-p <n>] [-o <file.csv>] [-t <topic>]... [--all-topics] [--json]",
    "  bookfinder search --list-topics [--json]",
    "  bookfinder topics [--json]",
    "",
    "Config priority:",
    "  CLI flags > ENV (BOOKFINDER_BASE_URL, BOOKFINDER_TIMEOUT_MS) > ./.bookfinderrc.json > ~/.config/bookfinder/config.json",
    "",
    "Flags:",
    "  -h, --help     Show help",
    "  -V, --version  Show CLI version",
    "  --json         Output CliEnvelope JSON",
    "  -v, --verbose  Log requests to stderr and include error details",
  ].join("\n");
}

function loadVersionInfo(): VersionInfo {
  const fallback: VersionInfo = {
    name: "bookfinder-cli",
    version: "0.0.0",
  };

  try {
    const require = createRequire(import.meta.url);
    const pkg: unknown = require("../package.json");
    if (typeof pkg !== "object" || pkg === null) {
      return fallback;
    }
    return {
      name: "name" in pkg && typeof pkg.name === "string" ? pkg.name : fallback.name,
      version: "version" in pkg && typeof pkg.version === "string" ? pkg.version : fallback.version,
    };
  } catch {
    return fallback;
  }
}

function createArgumentError(
  code: "E_ARG_INVALID" | "E_ARG_MISSING" | "E_ARG_CONFLICT" | "E_ARG_UNSUPPORTED",
  message: string,
  details?: unknown,
): CliAppError {
  return new CliAppError({
    code,
    message,
    details,
  });
}

function formatHumanError(error: CliAppError, verbose: boolean): string {
  const details =
    verbose && error.details !== undefined ? `\nDetails: ${JSON.stringify(error.details)}` : "";
  return `Error (${error.code}): ${error.message}${details}\n`;
}
