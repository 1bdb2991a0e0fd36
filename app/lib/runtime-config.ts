import type { EnvReader } from "../../packages/messaging/src/client.ts";
import { DEFAULT_THREAD_TABLE_CAPACITY } from "../../packages/core/src/threads/thread-table.ts";
import { DEFAULT_TEAM_LABEL } from "../../packages/core/src/routing/messages.ts";

export const DEFAULT_APPLICATION_FORM_URL = "https://example.com/apply";
export const DEFAULT_POLL_TIMEOUT_SECONDS = 30;
const MAX_POLL_TIMEOUT_SECONDS = 50;

export type RuntimeConfigErrorCode = "MISSING_ENV" | "INVALID_ENV";

export class RuntimeConfigError extends Error {
  readonly code: RuntimeConfigErrorCode;
  readonly variable: string;

  constructor(code: RuntimeConfigErrorCode, variable: string, message: string) {
    super(message);
    this.name = "RuntimeConfigError";
    this.code = code;
    this.variable = variable;
  }
}

export type RuntimeConfig = {
  telegramBotToken: string;
  telegramApiBaseUrl: string | null;
  adminSecret: string;
  applicationFormUrl: string;
  teamLabel: string;
  threadTableCapacity: number;
  pollTimeoutSeconds: number;
  sentry: {
    dsn: string | null;
    environment: string | null;
    release: string | null;
  };
};

export function resolveRuntimeConfig(getEnv: EnvReader): RuntimeConfig {
  return {
    telegramBotToken: requireEnv(getEnv, "TELEGRAM_BOT_TOKEN"),
    telegramApiBaseUrl: optionalEnv(getEnv, "TELEGRAM_API_BASE_URL"),
    adminSecret: requireEnv(getEnv, "ADMIN_SECRET"),
    applicationFormUrl: optionalEnv(getEnv, "TEAM_APPLICATION_FORM_URL") ?? DEFAULT_APPLICATION_FORM_URL,
    teamLabel: optionalEnv(getEnv, "TEAM_LABEL") ?? DEFAULT_TEAM_LABEL,
    threadTableCapacity: readInteger(getEnv, "THREAD_TABLE_CAPACITY", {
      fallback: DEFAULT_THREAD_TABLE_CAPACITY,
      min: 1,
      max: Number.MAX_SAFE_INTEGER,
    }),
    pollTimeoutSeconds: readInteger(getEnv, "TELEGRAM_POLL_TIMEOUT_SECONDS", {
      fallback: DEFAULT_POLL_TIMEOUT_SECONDS,
      min: 0,
      max: MAX_POLL_TIMEOUT_SECONDS,
    }),
    sentry: {
      dsn: optionalEnv(getEnv, "SENTRY_DSN"),
      environment: optionalEnv(getEnv, "SENTRY_ENVIRONMENT"),
      release: optionalEnv(getEnv, "SENTRY_RELEASE"),
    },
  };
}

function requireEnv(getEnv: EnvReader, name: string): string {
  const value = optionalEnv(getEnv, name);
  if (!value) {
    throw new RuntimeConfigError("MISSING_ENV", name, `Missing required env var: ${name}`);
  }
  return value;
}

function optionalEnv(getEnv: EnvReader, name: string): string | null {
  const value = getEnv(name);
  if (typeof value !== "string") {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readInteger(
  getEnv: EnvReader,
  name: string,
  bounds: { fallback: number; min: number; max: number },
): number {
  const raw = optionalEnv(getEnv, name);
  if (raw === null) {
    return bounds.fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new RuntimeConfigError("INVALID_ENV", name, `${name} must be an integer, got '${raw}'.`);
  }
  const parsed = Number(raw);
  if (!Number.isSafeInteger(parsed) || parsed < bounds.min || parsed > bounds.max) {
    throw new RuntimeConfigError(
      "INVALID_ENV",
      name,
      `${name} must be between ${bounds.min} and ${bounds.max}, got ${raw}.`,
    );
  }
  return parsed;
}
