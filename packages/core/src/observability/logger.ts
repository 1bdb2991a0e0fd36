import {
  EVENT_CATALOG_BY_NAME,
  type CanonicalEventName,
  type EventCatalogEntry,
} from "./event-catalog.ts";
import { emitMetricBestEffort } from "./metrics.ts";
import { redactPII } from "./redaction.ts";
import { captureSentryFromStructuredLog } from "./sentry.ts";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type StructuredLogEventInput = {
  event: CanonicalEventName | string;
  user_id?: string | number | null;
  correlation_id?: string | null;
  payload: Record<string, unknown>;
  level?: LogLevel;
};

export type StructuredLogEvent = {
  ts: string;
  level: LogLevel;
  event: string;
  category: string;
  env: string;
  correlation_id: string | null;
  user_id: string | null;
  payload: Record<string, unknown>;
};

export type LoggerContext = {
  env?: string;
  correlation_id?: string | null;
  user_id?: string | number | null;
};

export type StructuredLogger = (input: StructuredLogEventInput) => StructuredLogEvent;

export function createLogger(context: LoggerContext = {}): StructuredLogger {
  return (input) => logEvent({
    ...input,
    correlation_id: normalizeString(input.correlation_id) ??
      normalizeString(context.correlation_id) ??
      null,
    user_id: normalizeId(input.user_id) ?? normalizeId(context.user_id) ?? null,
    payload: input.payload,
    level: input.level,
  }, context.env);
}

export function logEvent(input: StructuredLogEventInput, explicitEnv?: string): StructuredLogEvent {
  const eventDef = resolveEventDefinition(input.event);
  const payload = ensurePayloadObject(input.payload);
  assertRequiredFields(eventDef, payload);

  const redactedPayload = redactPII(payload);
  const correlationId = normalizeString(input.correlation_id) ??
    normalizeString(readString(redactedPayload, "correlation_id")) ??
    null;
  const env = normalizeEnv(explicitEnv ?? detectRuntimeEnv());

  const event: StructuredLogEvent = {
    ts: new Date().toISOString(),
    level: input.level ?? "info",
    event: eventDef.event_name,
    category: eventDef.category,
    env,
    correlation_id: correlationId,
    user_id: normalizeId(input.user_id),
    payload: redactedPayload,
  };

  emitDerivedMetricsFromLog(event);
  console.info(JSON.stringify(event));
  captureSentryFromStructuredLog(event);
  return event;
}

export function describeError(error: unknown): { error_name: string; error_message: string } {
  if (error instanceof Error) {
    return { error_name: error.name, error_message: error.message };
  }
  return { error_name: "NonError", error_message: String(error) };
}

export { redactPII } from "./redaction.ts";

function resolveEventDefinition(event: string): EventCatalogEntry {
  const normalized = event.trim();
  const eventDef = EVENT_CATALOG_BY_NAME[normalized];
  if (!eventDef) {
    throw new Error(`Unknown structured log event: '${event}'.`);
  }
  return eventDef;
}

function ensurePayloadObject(payload: Record<string, unknown>): Record<string, unknown> {
  if (!payload || typeof payload !== "object" || Array.isArray(payload)) {
    throw new Error("Structured log payload must be an object.");
  }
  return payload;
}

function assertRequiredFields(
  eventDef: EventCatalogEntry,
  payload: Record<string, unknown>,
): void {
  for (const requiredField of eventDef.required_fields) {
    const value = payload[requiredField];
    if (isPresent(value)) {
      continue;
    }
    throw new Error(
      `Missing required field '${requiredField}' for log event '${eventDef.event_name}'.`,
    );
  }
}

function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  return true;
}

function detectRuntimeEnv(): string {
  return readEnv("APP_ENV") ??
    readEnv("SENTRY_ENVIRONMENT") ??
    readEnv("NODE_ENV") ??
    "local";
}

function readEnv(name: string): string | undefined {
  const value = process.env[name];
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  return undefined;
}

function normalizeEnv(raw: string): string {
  const value = raw.trim().toLowerCase();
  if (value === "staging") {
    return "staging";
  }
  if (value === "production" || value === "prod") {
    return "production";
  }
  return "local";
}

function normalizeString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function normalizeId(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return normalizeString(value);
}

function readString(payload: Record<string, unknown>, key: string): string | null {
  return normalizeString(payload[key]);
}

function emitDerivedMetricsFromLog(event: StructuredLogEvent): void {
  const payload = event.payload;
  switch (event.event) {
    case "system.unhandled_error":
      emitMetricBestEffort({
        metric: "system.error.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "structured_logger",
          phase: safeTagValue(payload.phase) ?? "unknown",
          error_name: safeTagValue(payload.error_name) ?? "Error",
        },
      });
      return;

    case "conversation.form_started":
      emitMetricBestEffort({
        metric: "conversation.form.started",
        value: 1,
        correlation_id: event.correlation_id,
        tags: { component: "form_session_engine" },
      });
      return;

    case "conversation.form_input_rejected":
      emitMetricBestEffort({
        metric: "conversation.form.input_rejected",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "form_session_engine",
          slot: safeTagValue(payload.slot) ?? "unknown",
          reason: safeTagValue(payload.reason) ?? "unknown",
        },
      });
      return;

    case "conversation.form_completed":
      emitMetricBestEffort({
        metric: "conversation.form.completed",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "form_session_engine",
          broadcast_outcome: safeTagValue(payload.broadcast_outcome) ?? "unknown",
        },
      });
      return;

    case "routing.broadcast_completed":
      emitMetricBestEffort({
        metric: "routing.broadcast.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "contact_router",
          outcome: safeTagValue(payload.outcome) ?? "unknown",
        },
      });
      return;

    case "routing.operator_send_failed":
      emitMetricBestEffort({
        metric: "routing.operator_send.failure.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "contact_router",
          error_name: safeTagValue(payload.error_name) ?? "Error",
        },
      });
      return;

    case "routing.reply_delivered":
    case "routing.reply_failed":
    case "routing.reply_ignored":
      emitMetricBestEffort({
        metric: "routing.reply.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "contact_router",
          outcome: event.event.slice("routing.reply_".length),
          reason: safeTagValue(payload.reason) ?? "none",
        },
      });
      return;

    case "routing.thread_evicted":
      emitMetricBestEffort({
        metric: "routing.thread.evicted",
        value: 1,
        correlation_id: event.correlation_id,
        tags: { component: "thread_table" },
      });
      return;

    case "transport.poll_failed":
      emitMetricBestEffort({
        metric: "transport.poll.failure.count",
        value: 1,
        correlation_id: event.correlation_id,
        tags: {
          component: "update_poller",
          error_name: safeTagValue(payload.error_name) ?? "Error",
        },
      });
      return;

    default:
      return;
  }
}

function safeTagValue(value: unknown): string | null {
  if (typeof value === "string") {
    const normalized = value.trim();
    return normalized.length > 0 ? normalized : null;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "boolean") {
    return value ? "true" : "false";
  }
  return null;
}
