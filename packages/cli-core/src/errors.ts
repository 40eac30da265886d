export type CliErrorCode =
  | "E_ARG_INVALID"
  | "E_ARG_MISSING"
  | "E_ARG_CONFLICT"
  | "E_ARG_UNSUPPORTED"
  | "E_TOPIC_UNKNOWN"
  | "E_CONFIG_INVALID"
  | "E_UPSTREAM_NETWORK"
  | "E_UPSTREAM_TIMEOUT"
  | "E_UPSTREAM_HTTP"
  | "E_UPSTREAM_PARSE"
  | "E_IO_WRITE"
  | "E_UNKNOWN";

export interface CliAppErrorInput {
  code: CliErrorCode;
  message: string;
  details?: unknown;
  cause?: unknown;
}

export class CliAppError extends Error {
  public readonly code: CliErrorCode;
  public readonly details?: unknown;

  public constructor(input: CliAppErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "CliAppError";
    this.code = input.code;
    this.details = input.details;
  }
}

export function toCliAppError(error: unknown): CliAppError {
  if (error instanceof CliAppError) {
    return error;
  }

  if (error instanceof Error) {
    return new CliAppError({
      code: "E_UNKNOWN",
      message: error.message.length > 0 ? error.message : "Unexpected error",
      cause: error,
    });
  }

  return new CliAppError({
    code: "E_UNKNOWN",
    message: String(error),
  });
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
