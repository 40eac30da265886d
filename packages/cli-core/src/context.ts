import { randomUUID } from "node:crypto";

import type { Meta } from "./envelope.js";

export interface CommandContextOptions {
  clock?: () => number;
  now?: () => Date;
  requestIdFactory?: () => string;
  verbose?: boolean;
}

export interface CommandContext {
  readonly requestId: string;
  readonly verbose: boolean;
  toMeta(): Meta;
}

/**
 * Captures the request id and start time of one CLI invocation.
 * `clock` measures the duration, `now` anchors the wall-clock timestamps.
 */
export function createCommandContext(options: CommandContextOptions = {}): CommandContext {
  const clock = options.clock ?? Date.now;
  const now = options.now ?? (() => new Date());
  const requestId = (options.requestIdFactory ?? randomUUID)();
  const verbose = options.verbose ?? false;

  const startedAt = now();
  const startedTick = clock();

  return {
    requestId,
    verbose,
    toMeta(): Meta {
      const durationMs = Math.max(0, clock() - startedTick);
      return {
        requestId,
        startedAt: startedAt.toISOString(),
        finishedAt: new Date(startedAt.getTime() + durationMs).toISOString(),
        durationMs,
        verbose,
      };
    },
  };
}
