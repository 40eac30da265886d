import type { CliErrorCode } from "./errors.js";

export const EXIT_CODES = {
  SUCCESS: 0,
  UNKNOWN_ERROR: 1,
  ARGUMENT_ERROR: 2,
  CONFIG_ERROR: 3,
  UPSTREAM_ERROR: 4,
  IO_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function mapErrorCodeToExitCode(code: CliErrorCode): ExitCode {
  if (code.startsWith("E_ARG_") || code === "E_TOPIC_UNKNOWN") {
    return EXIT_CODES.ARGUMENT_ERROR;
  }

  if (code.startsWith("E_CONFIG_")) {
    return EXIT_CODES.CONFIG_ERROR;
  }

  if (code.startsWith("E_UPSTREAM_")) {
    return EXIT_CODES.UPSTREAM_ERROR;
  }

  if (code.startsWith("E_IO_")) {
    return EXIT_CODES.IO_ERROR;
  }

  return EXIT_CODES.UNKNOWN_ERROR;
}
