import { describe, expect, it } from "vitest";

import { EXIT_CODES, mapErrorCodeToExitCode } from "../src/exit-codes.js";

describe("exit code mapping", () => {
  it("maps argument errors", () => {
    expect(mapErrorCodeToExitCode("E_ARG_INVALID")).toBe(EXIT_CODES.ARGUMENT_ERROR);
    expect(mapErrorCodeToExitCode("E_ARG_UNSUPPORTED")).toBe(EXIT_CODES.ARGUMENT_ERROR);
  });

  it("treats unknown topics as argument errors", () => {
    expect(mapErrorCodeToExitCode("E_TOPIC_UNKNOWN")).toBe(2);
  });

  it("maps config errors", () => {
    expect(mapErrorCodeToExitCode("E_CONFIG_INVALID")).toBe(EXIT_CODES.CONFIG_ERROR);
  });

  it("maps every upstream failure to the same exit code", () => {
    expect(mapErrorCodeToExitCode("E_UPSTREAM_NETWORK")).toBe(EXIT_CODES.UPSTREAM_ERROR);
    expect(mapErrorCodeToExitCode("E_UPSTREAM_TIMEOUT")).toBe(EXIT_CODES.UPSTREAM_ERROR);
    expect(mapErrorCodeToExitCode("E_UPSTREAM_HTTP")).toBe(EXIT_CODES.UPSTREAM_ERROR);
    expect(mapErrorCodeToExitCode("E_UPSTREAM_PARSE")).toBe(EXIT_CODES.UPSTREAM_ERROR);
  });

  it("maps io errors", () => {
    expect(mapErrorCodeToExitCode("E_IO_WRITE")).toBe(EXIT_CODES.IO_ERROR);
  });

  it("maps unknown errors", () => {
    expect(mapErrorCodeToExitCode("E_UNKNOWN")).toBe(EXIT_CODES.UNKNOWN_ERROR);
  });
});
