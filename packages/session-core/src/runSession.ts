import type { ViewpointSession, TickResult } from "./ViewpointSession";
import { CollaboratorFailureError, UnsupportedEventError } from "./errors";
import { eventFromKey } from "./events";
import type { KeyMap, SessionEvent } from "./events";
import type { Logger } from "./logger";
import { consoleLogger } from "./logger";

export type TickError =
  | { type: "unsupported-event"; error: UnsupportedEventError }
  | { type: "collaborator-failure"; error: CollaboratorFailureError };

export interface RunSessionOptions {
  logger?: Logger;
  keymap?: KeyMap;
  onError?: (error: TickError) => void;
  onTick?: (result: TickResult) => void;
}

export interface RunSummary {
  ticks: number;
  failedTicks: number;
}

function toTickError(err: unknown): TickError | null {
  if (err instanceof UnsupportedEventError) return { type: "unsupported-event", error: err };
  if (err instanceof CollaboratorFailureError) return { type: "collaborator-failure", error: err };
  return null;
}

/**
 * Feeds events to the session one at a time until the source ends. Raw key
 * strings go through the key map first. A failed tick is reported and the loop
 * moves on; configuration and unexpected errors end the run.
 */
export async function runSession(
  events: AsyncIterable<string | SessionEvent>,
  session: ViewpointSession,
  options: RunSessionOptions = {}
): Promise<RunSummary> {
  const logger = options.logger ?? consoleLogger;
  const summary: RunSummary = { ticks: 0, failedTicks: 0 };

  for await (const input of events) {
    summary.ticks += 1;
    try {
      const event = typeof input === "string" ? eventFromKey(input, options.keymap) : input;
      const result = await session.handle(event);
      options.onTick?.(result);
    } catch (err) {
      const tickError = toTickError(err);
      if (!tickError) throw err;
      summary.failedTicks += 1;
      logger.error(tickError.error.message, tickError.error.cause);
      options.onError?.(tickError);
    }
  }
  return summary;
}
