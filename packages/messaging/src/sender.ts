import {
  getTelegramRetryAfterMs,
  isTransientTelegramError,
  TelegramClientError,
  type TelegramClient,
} from "./client.ts";
import type { ChatId, MessageId, MessageTransport } from "./types.ts";

const MAX_TEXT_LENGTH = 4096;

export class TransportError extends Error {
  readonly chatId: ChatId;
  readonly statusCode: number | null;
  readonly retryable: boolean;
  readonly retryAfterMs: number | null;

  constructor(input: {
    message: string;
    chatId: ChatId;
    statusCode: number | null;
    retryable: boolean;
    retryAfterMs?: number | null;
  }) {
    super(input.message);
    this.name = "TransportError";
    this.chatId = input.chatId;
    this.statusCode = input.statusCode;
    this.retryable = input.retryable;
    this.retryAfterMs = input.retryAfterMs ?? null;
  }
}

/**
 * Adapts a Telegram client to the transport contract the engine consumes.
 * One attempt per send; any client failure surfaces as `TransportError`.
 */
export function createTelegramTransport(client: TelegramClient): MessageTransport {
  if (!client || typeof client.sendMessage !== "function") {
    throw new Error("A valid Telegram client is required.");
  }

  return {
    sendText: async (chatId: ChatId, text: string): Promise<MessageId> => {
      const body = truncateText(text);
      if (!body.trim()) {
        throw new TransportError({
          message: "sendText requires a non-empty text.",
          chatId,
          statusCode: null,
          retryable: false,
        });
      }

      try {
        const sent = await client.sendMessage({ chatId, text: body });
        return sent.messageId;
      } catch (error) {
        throw toTransportError(error, chatId);
      }
    },
  };
}

export function truncateText(text: string): string {
  if (text.length <= MAX_TEXT_LENGTH) {
    return text;
  }
  let end = MAX_TEXT_LENGTH - 1;
  if (isHighSurrogate(text.charCodeAt(end - 1))) {
    end -= 1;
  }
  return `${text.slice(0, end)}…`;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function toTransportError(error: unknown, chatId: ChatId): TransportError {
  return new TransportError({
    message: toSafeMessage(error),
    chatId,
    statusCode: error instanceof TelegramClientError ? error.statusCode : null,
    retryable: isTransientTelegramError(error),
    retryAfterMs: getTelegramRetryAfterMs(error),
  });
}

function toSafeMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Message send failed.";
}
