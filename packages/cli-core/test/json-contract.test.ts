import { describe, expect, it } from "vitest";

import { createCommandContext } from "../src/context.js";
import { createErrorEnvelope, createSuccessEnvelope } from "../src/envelope.js";

describe("json contract", () => {
  it("keeps ok, data, meta key order on success", () => {
    const context = createCommandContext({
      requestIdFactory: () => "req-contract",
      clock: () => 0,
      now: () => new Date("2026-03-02T09:00:00.000Z"),
    });

    expect(JSON.stringify(createSuccessEnvelope({ id: "9781098100001" }, context.toMeta()))).toBe(
      '{"ok":true,"data":{"id":"9781098100001"},"meta":{"requestId":"req-contract",' +
        '"startedAt":"2026-03-02T09:00:00.000Z","finishedAt":"2026-03-02T09:00:00.000Z",' +
        '"durationMs":0,"verbose":false}}',
    );
  });

  it("keeps ok, error key order on failure", () => {
    expect(
      JSON.stringify(createErrorEnvelope("E_ARG_MISSING", "--output is required", { arg: "output" })),
    ).toBe(
      '{"ok":false,"error":{"code":"E_ARG_MISSING","message":"--output is required","details":{"arg":"output"}}}',
    );
  });
});
