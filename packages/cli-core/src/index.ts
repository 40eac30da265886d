export { CliAppError, isErrnoException, toCliAppError } from "./errors.js";
export type { CliAppErrorInput, CliErrorCode } from "./errors.js";
export { EXIT_CODES, mapErrorCodeToExitCode } from "./exit-codes.js";
export type { ExitCode } from "./exit-codes.js";
export { createErrorEnvelope, createSuccessEnvelope } from "./envelope.js";
export type { CliEnvelope, ErrorEnvelope, Meta, SuccessEnvelope } from "./envelope.js";
export { createCommandContext } from "./context.js";
export type { CommandContext, CommandContextOptions } from "./context.js";
export { createLogger } from "./logger.js";
export type { LogLevel, LogStream, Logger, LoggerOptions } from "./logger.js";
