import type { ChatId, MessageId } from "./types.ts";

const DEFAULT_TIMEOUT_MS = 6000;
const DEFAULT_API_BASE_URL = "https://api.telegram.org";

export type EnvReader = (name: string) => string | undefined;

export type TelegramClientConfig = {
  botToken: string;
  apiBaseUrl?: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
};

export type TelegramSendMessageInput = {
  chatId: ChatId;
  text: string;
};

export type TelegramSendMessageResult = {
  messageId: MessageId;
  chatId: ChatId;
};

export type TelegramGetUpdatesInput = {
  offset: number | null;
  timeoutSeconds: number;
  signal?: AbortSignal;
};

export type TelegramUpdate = {
  update_id: number;
  [key: string]: unknown;
};

export type TelegramClient = {
  sendMessage: (input: TelegramSendMessageInput) => Promise<TelegramSendMessageResult>;
  getUpdates: (input: TelegramGetUpdatesInput) => Promise<TelegramUpdate[]>;
};

export type TelegramClientErrorCode = "CONFIG" | "AUTH" | "REQUEST" | "TIMEOUT" | "RESPONSE";

export class TelegramClientError extends Error {
  readonly code: TelegramClientErrorCode;
  readonly statusCode: number | null;
  readonly retryable: boolean;
  readonly retryAfterSeconds: number | null;

  constructor(input: {
    code: TelegramClientErrorCode;
    message: string;
    statusCode?: number | null;
    retryable?: boolean;
    retryAfterSeconds?: number | null;
  }) {
    super(input.message);
    this.name = "TelegramClientError";
    this.code = input.code;
    this.statusCode = input.statusCode ?? null;
    this.retryable = Boolean(input.retryable);
    this.retryAfterSeconds = input.retryAfterSeconds ?? null;
  }
}

export function createTelegramClient(config: TelegramClientConfig): TelegramClient {
  const botToken = normalizeRequiredString("TELEGRAM_BOT_TOKEN", config.botToken);
  const apiBaseUrl = (normalizeOptionalString(config.apiBaseUrl) ?? DEFAULT_API_BASE_URL)
    .replace(/\/+$/, "");

  const fetchImpl = config.fetchImpl ?? globalThis.fetch;
  if (typeof fetchImpl !== "function") {
    throw new TelegramClientError({
      code: "CONFIG",
      message: "Fetch implementation is required to create Telegram client.",
      retryable: false,
    });
  }

  const timeoutMs = typeof config.timeoutMs === "number" && Number.isFinite(config.timeoutMs)
    ? Math.max(1, Math.trunc(config.timeoutMs))
    : DEFAULT_TIMEOUT_MS;

  const callMethod = async (
    method: string,
    payload: Record<string, unknown>,
    requestTimeoutMs: number,
    signal?: AbortSignal,
  ): Promise<unknown> => {
    const response = await fetchWithTimeout(
      fetchImpl,
      `${apiBaseUrl}/bot${botToken}/${method}`,
      {
        method: "POST",
        headers: {
          "content-type": "application/json",
        },
        body: JSON.stringify(payload),
      },
      requestTimeoutMs,
      signal,
    );

    const json: unknown = await response.json().catch(() => null);
    if (!response.ok || readBoolean(json, "ok") !== true) {
      throw buildTelegramResponseError(response.status, json);
    }

    return readField(json, "result");
  };

  return {
    sendMessage: async (input) => {
      const text = normalizeRequiredString("text", input.text);
      if (!Number.isSafeInteger(input.chatId)) {
        throw new TelegramClientError({
          code: "CONFIG",
          message: "chatId must be an integer.",
          retryable: false,
        });
      }

      const result = await callMethod(
        "sendMessage",
        {
          chat_id: input.chatId,
          text,
        },
        timeoutMs,
      );

      const messageId = readNumber(result, "message_id");
      if (messageId === null) {
        throw new TelegramClientError({
          code: "RESPONSE",
          message: "Telegram response missing message_id.",
          retryable: false,
        });
      }

      return {
        messageId,
        chatId: readNumber(readField(result, "chat"), "id") ?? input.chatId,
      };
    },

    getUpdates: async (input) => {
      const timeoutSeconds = Math.max(0, Math.trunc(input.timeoutSeconds));
      const payload: Record<string, unknown> = {
        timeout: timeoutSeconds,
        allowed_updates: ["message"],
      };
      if (input.offset !== null) {
        payload.offset = input.offset;
      }

      const result = await callMethod(
        "getUpdates",
        payload,
        timeoutSeconds * 1000 + timeoutMs,
        input.signal,
      );

      if (!Array.isArray(result)) {
        throw new TelegramClientError({
          code: "RESPONSE",
          message: "Telegram getUpdates returned an invalid payload.",
          retryable: false,
        });
      }

      return result.filter(isTelegramUpdate);
    },
  };
}

export function createTelegramClientFromEnv(input: {
  getEnv: EnvReader;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}): TelegramClient {
  if (typeof input.getEnv !== "function") {
    throw new TelegramClientError({
      code: "CONFIG",
      message: "getEnv must be provided to create Telegram client from env.",
      retryable: false,
    });
  }

  const botToken = normalizeOptionalString(input.getEnv("TELEGRAM_BOT_TOKEN"));
  if (!botToken) {
    throw new TelegramClientError({
      code: "CONFIG",
      message: "Missing required env var: TELEGRAM_BOT_TOKEN",
      retryable: false,
    });
  }

  return createTelegramClient({
    botToken,
    apiBaseUrl: normalizeOptionalString(input.getEnv("TELEGRAM_API_BASE_URL")) ?? undefined,
    fetchImpl: input.fetchImpl,
    timeoutMs: input.timeoutMs,
  });
}

export function createNodeEnvReader(
  env: Record<string, string | undefined> = process.env,
): EnvReader {
  return (name) => normalizeOptionalString(env[name]) ?? undefined;
}

export function isTransientTelegramError(error: unknown): boolean {
  if (error instanceof TelegramClientError) {
    return error.retryable;
  }
  return false;
}

export function getTelegramRetryAfterMs(error: unknown): number | null {
  if (error instanceof TelegramClientError && error.retryAfterSeconds !== null) {
    return error.retryAfterSeconds * 1000;
  }
  return null;
}

function isTelegramUpdate(value: unknown): value is TelegramUpdate {
  return readNumber(value, "update_id") !== null;
}

function normalizeRequiredString(name: string, value: string): string {
  const normalized = value.trim();
  if (!normalized) {
    throw new TelegramClientError({
      code: "CONFIG",
      message: `${name} is required.`,
      retryable: false,
    });
  }
  return normalized;
}

function normalizeOptionalString(value: string | null | undefined): string | null {
  if (typeof value !== "string") {
    return null;
  }

  const normalized = value.trim();
  return normalized.length > 0 ? normalized : null;
}

async function fetchWithTimeout(
  fetchImpl: typeof fetch,
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort("telegram_timeout");
  }, timeoutMs);
  const forwardAbort = () => controller.abort("caller_aborted");
  signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    return await fetchImpl(url, {
      ...init,
      signal: controller.signal,
    });
  } catch (error) {
    if (signal?.aborted) {
      throw new TelegramClientError({
        code: "REQUEST",
        message: "Telegram request aborted by caller.",
        retryable: false,
      });
    }

    if (isAbortError(error)) {
      throw new TelegramClientError({
        code: "TIMEOUT",
        message: "Telegram request timed out.",
        retryable: true,
      });
    }

    throw new TelegramClientError({
      code: "REQUEST",
      message: "Telegram request failed.",
      retryable: true,
    });
  } finally {
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

function buildTelegramResponseError(statusCode: number, payload: unknown): TelegramClientError {
  const description = readString(payload, "description") ?? "Telegram API request failed.";
  const errorCode = readNumber(payload, "error_code") ?? statusCode;
  const retryAfterSeconds = readNumber(readField(payload, "parameters"), "retry_after");

  if (errorCode === 401 || errorCode === 404) {
    return new TelegramClientError({
      code: "AUTH",
      message: `${description} (code=${errorCode})`,
      statusCode,
      retryable: false,
    });
  }

  return new TelegramClientError({
    code: "RESPONSE",
    message: `${description} (code=${errorCode})`,
    statusCode,
    retryable: errorCode === 429 || (errorCode >= 500 && errorCode < 600),
    retryAfterSeconds,
  });
}

function readField(payload: unknown, key: string): unknown {
  if (!payload || typeof payload !== "object") {
    return undefined;
  }
  return Reflect.get(payload, key);
}

function readString(payload: unknown, key: string): string | null {
  const value = readField(payload, key);
  return typeof value === "string" && value.trim().length > 0 ? value : null;
}

function readNumber(payload: unknown, key: string): number | null {
  const value = readField(payload, key);
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function readBoolean(payload: unknown, key: string): boolean | null {
  const value = readField(payload, key);
  return typeof value === "boolean" ? value : null;
}

function isAbortError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }

  const name = readField(error, "name");
  const message = readField(error, "message");
  return name === "AbortError" || message === "The operation was aborted.";
}
