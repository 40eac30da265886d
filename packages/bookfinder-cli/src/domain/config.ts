import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";

import { CliAppError, isErrnoException } from "bookfinder-cli-core";

import { DEFAULT_BASE_URL } from "./client.js";
import { DEFAULT_TIMEOUT_MS } from "./http/session.js";

export interface BookfinderrcConfig {
  baseUrl?: string;
  timeoutMs?: number;
}

export type FlagValue = string | boolean | string[] | undefined;

export type ConfigSource = "flag" | "env" | "project-config" | "global-config" | "default";

export interface ResolveClientConfigInput {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  getFlag: (key: string) => FlagValue;
}

export interface ResolvedClientConfig {
  baseUrl: string;
  timeoutMs: number;
  baseUrlSource: ConfigSource;
}

export const PROJECT_CONFIG_FILE = ".bookfinderrc.json";

export function getGlobalConfigPath(homeDir: string = homedir()): string {
  return join(homeDir, ".config", "bookfinder", "config.json");
}

export function getProjectConfigPath(cwd: string): string {
  return join(cwd, PROJECT_CONFIG_FILE);
}

export async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return undefined;
    }

    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: `Failed to read config file: ${path}`,
      details: {
        path,
        reason: error instanceof Error ? error.message : String(error),
      },
      cause: error,
    });
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: `Config file is not valid JSON: ${path}`,
      details: {
        path,
        reason: error instanceof Error ? error.message : String(error),
      },
      cause: error,
    });
  }
}

async function readConfigFile(path: string): Promise<BookfinderrcConfig> {
  const raw = await readJsonFile(path);
  if (raw === undefined) {
    return {};
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new CliAppError({
      code: "E_CONFIG_INVALID",
      message: `Config file must contain a JSON object: ${path}`,
      details: { path },
    });
  }

  const config: BookfinderrcConfig = {};
  if ("baseUrl" in raw && typeof raw.baseUrl === "string") {
    config.baseUrl = raw.baseUrl;
  }
  if ("timeoutMs" in raw && typeof raw.timeoutMs === "number") {
    config.timeoutMs = raw.timeoutMs;
  }
  return config;
}

function firstString(value: FlagValue): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (Array.isArray(value)) {
    return value.at(-1);
  }
  return typeof value === "string" ? value : undefined;
}

function readFlagValue(value: FlagValue, key: string): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const raw = firstString(value);
  if (raw === undefined) {
    throw new CliAppError({
      code: "E_ARG_MISSING",
      message: `--${key} requires a value`,
      details: { arg: key },
    });
  }
  return raw;
}

function readTimeoutFlag(value: FlagValue): number | undefined {
  const raw = readFlagValue(value, "timeout-ms");
  if (raw === undefined) {
    return undefined;
  }

  const timeoutMs = toValidTimeout(raw);
  if (timeoutMs === undefined) {
    throw new CliAppError({
      code: "E_ARG_INVALID",
      message: "--timeout-ms must be a positive integer",
      details: { arg: "timeout-ms", value: raw },
    });
  }
  return timeoutMs;
}

function toValidTimeout(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value) && value > 0) {
    return Math.floor(value);
  }

  if (typeof value === "string" && /^\d+$/.test(value.trim())) {
    const parsed = Number.parseInt(value, 10);
    if (parsed > 0) {
      return parsed;
    }
  }

  return undefined;
}

function nonEmpty(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Precedence: flags > env > ./.bookfinderrc.json > ~/.config/bookfinder/config.json > defaults. */
export async function resolveClientConfig(
  input: ResolveClientConfigInput,
): Promise<ResolvedClientConfig> {
  const env = input.env ?? process.env;
  const projectConfig = await readConfigFile(getProjectConfigPath(input.cwd));
  const globalConfig = await readConfigFile(getGlobalConfigPath(input.homeDir));

  const baseUrlCandidates: Array<[ConfigSource, string | undefined]> = [
    ["flag", nonEmpty(readFlagValue(input.getFlag("base-url"), "base-url"))],
    ["env", nonEmpty(env.BOOKFINDER_BASE_URL)],
    ["project-config", nonEmpty(projectConfig.baseUrl)],
    ["global-config", nonEmpty(globalConfig.baseUrl)],
  ];
  const baseUrlEntry = baseUrlCandidates.find(([, value]) => value !== undefined);

  const timeoutMs =
    readTimeoutFlag(input.getFlag("timeout-ms")) ??
    toValidTimeout(env.BOOKFINDER_TIMEOUT_MS) ??
    toValidTimeout(projectConfig.timeoutMs) ??
    toValidTimeout(globalConfig.timeoutMs) ??
    DEFAULT_TIMEOUT_MS;

  return {
    baseUrl: baseUrlEntry?.[1] ?? DEFAULT_BASE_URL,
    timeoutMs,
    baseUrlSource: baseUrlEntry?.[0] ?? "default",
  };
}
