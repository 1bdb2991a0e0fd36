import { InboundDispatcher } from "../packages/core/src/dispatch/inbound-dispatcher.ts";
import { FormSessionEngine } from "../packages/core/src/forms/form-session-engine.ts";
import { describeError, logEvent } from "../packages/core/src/observability/logger.ts";
import { OperatorRegistry } from "../packages/core/src/operators/operator-registry.ts";
import { ContactRouter } from "../packages/core/src/routing/contact-router.ts";
import { ThreadTable } from "../packages/core/src/threads/thread-table.ts";
import { createNodeEnvReader, createTelegramClient } from "../packages/messaging/src/client.ts";
import { createTelegramTransport } from "../packages/messaging/src/sender.ts";
import { resolveRuntimeConfig, RuntimeConfigError, type RuntimeConfig } from "./lib/runtime-config.ts";
import { flushNodeSentry, initNodeSentry } from "./lib/sentry.ts";
import { runUpdatePoller } from "./lib/update-poller.ts";

const SENTRY_FLUSH_TIMEOUT_MS = 2_000;

async function main(): Promise<number> {
  let config: RuntimeConfig;
  try {
    config = resolveRuntimeConfig(createNodeEnvReader(process.env));
  } catch (error) {
    logEvent({
      event: "system.startup_failed",
      level: "fatal",
      payload: {
        ...describeError(error),
        variable: error instanceof RuntimeConfigError ? error.variable : null,
        code: error instanceof RuntimeConfigError ? error.code : null,
      },
    });
    return 1;
  }

  const sentryEnabled = initNodeSentry(config.sentry);

  const client = createTelegramClient({
    botToken: config.telegramBotToken,
    apiBaseUrl: config.telegramApiBaseUrl ?? undefined,
  });
  const transport = createTelegramTransport(client);
  const operators = new OperatorRegistry({ adminSecret: config.adminSecret });
  const threads = new ThreadTable({
    capacity: config.threadTableCapacity,
    onEvict: ({ operatorChatId, thread }) => {
      logEvent({
        event: "routing.thread_evicted",
        level: "debug",
        payload: {
          capacity: config.threadTableCapacity,
          operator_chat_id: operatorChatId,
          visitor_chat_id: thread.visitorChatId,
        },
      });
    },
  });
  const router = new ContactRouter({
    transport,
    operators,
    threads,
    teamLabel: config.teamLabel,
  });
  const engine = new FormSessionEngine({ transport, router });
  const dispatcher = new InboundDispatcher({
    transport,
    operators,
    router,
    engine,
    teamLabel: config.teamLabel,
    applicationFormUrl: config.applicationFormUrl,
  });

  const controller = new AbortController();
  let stopSignal = "none";
  const stop = (signal: NodeJS.Signals) => {
    stopSignal = signal;
    controller.abort();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  logEvent({
    event: "system.startup",
    payload: {
      thread_table_capacity: config.threadTableCapacity,
      poll_timeout_seconds: config.pollTimeoutSeconds,
      team_label: config.teamLabel,
      sentry_enabled: sentryEnabled,
    },
  });

  const summary = await runUpdatePoller({
    client,
    dispatch: (event) => dispatcher.dispatch(event),
    pollTimeoutSeconds: config.pollTimeoutSeconds,
    signal: controller.signal,
  });
  await engine.drain();

  logEvent({
    event: "system.shutdown",
    payload: {
      signal: stopSignal,
      polls: summary.polls,
      failed_polls: summary.failedPolls,
      dispatched: summary.dispatched,
    },
  });
  await flushNodeSentry(SENTRY_FLUSH_TIMEOUT_MS);
  return 0;
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logEvent({
      event: "system.unhandled_error",
      level: "fatal",
      payload: {
        phase: "main",
        ...describeError(error),
      },
    });
    process.exitCode = 1;
  },
);
