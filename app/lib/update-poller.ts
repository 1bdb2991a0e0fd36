import { setTimeout as delay } from "node:timers/promises";
import {
  getTelegramRetryAfterMs,
  isTransientTelegramError,
  type TelegramClient,
  type TelegramUpdate,
} from "../../packages/messaging/src/client.ts";
import { normalizeTelegramUpdate } from "../../packages/messaging/src/inbound.ts";
import type { InboundEvent } from "../../packages/messaging/src/types.ts";
import {
  describeError,
  logEvent,
  type StructuredLogEventInput,
} from "../../packages/core/src/observability/logger.ts";

const INITIAL_BACKOFF_MS = 1_000;
const MAX_BACKOFF_MS = 30_000;

export type PollerSleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type UpdatePollerDeps = {
  client: Pick<TelegramClient, "getUpdates">;
  dispatch: (event: InboundEvent) => Promise<unknown>;
  pollTimeoutSeconds: number;
  signal: AbortSignal;
  sleep?: PollerSleep;
  logger?: (input: StructuredLogEventInput) => unknown;
};

export type UpdatePollerSummary = {
  polls: number;
  failedPolls: number;
  dispatched: number;
  nextOffset: number | null;
};

/**
 * Long-polls for updates until `signal` aborts. Each normalized update is
 * dispatched without waiting for the previous one; on exit the poller waits
 * for every in-flight dispatch to settle.
 */
export async function runUpdatePoller(deps: UpdatePollerDeps): Promise<UpdatePollerSummary> {
  const sleep = deps.sleep ?? abortableSleep;
  const log = deps.logger ?? logEvent;
  const inFlight = new Set<Promise<void>>();
  const summary: UpdatePollerSummary = {
    polls: 0,
    failedPolls: 0,
    dispatched: 0,
    nextOffset: null,
  };
  let consecutiveFailures = 0;

  while (!deps.signal.aborted) {
    summary.polls += 1;
    let updates: TelegramUpdate[];
    try {
      updates = await deps.client.getUpdates({
        offset: summary.nextOffset,
        timeoutSeconds: deps.pollTimeoutSeconds,
        signal: deps.signal,
      });
    } catch (error) {
      if (deps.signal.aborted) {
        break;
      }
      summary.failedPolls += 1;
      consecutiveFailures += 1;
      const retryInMs = getTelegramRetryAfterMs(error) ?? backoffMs(consecutiveFailures);
      log({
        event: "transport.poll_failed",
        level: isTransientTelegramError(error) ? "warn" : "error",
        payload: {
          retry_in_ms: retryInMs,
          consecutive_failures: consecutiveFailures,
          ...describeError(error),
        },
      });
      await sleep(retryInMs, deps.signal);
      continue;
    }

    consecutiveFailures = 0;
    for (const update of updates) {
      summary.nextOffset = update.update_id + 1;
      const event = normalizeTelegramUpdate(update);
      if (!event) {
        continue;
      }

      summary.dispatched += 1;
      const task = deps.dispatch(event).then(
        () => undefined,
        (error: unknown) => {
          log({
            event: "system.unhandled_error",
            user_id: event.senderUserId,
            level: "error",
            payload: {
              phase: "poller_dispatch",
              update_id: event.updateId,
              ...describeError(error),
            },
          });
        },
      );
      inFlight.add(task);
      void task.finally(() => inFlight.delete(task));
    }
  }

  await Promise.all(inFlight);
  return summary;
}

export function backoffMs(consecutiveFailures: number): number {
  const exponent = Math.max(0, consecutiveFailures - 1);
  return Math.min(MAX_BACKOFF_MS, INITIAL_BACKOFF_MS * 2 ** exponent);
}

async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) {
      return;
    }
    throw error;
  }
}
