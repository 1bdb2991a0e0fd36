import type { TelegramUpdate } from "./client.ts";
import type { InboundEvent } from "./types.ts";

const FALLBACK_DISPLAY_NAME = "Unknown";

/**
 * Maps a Telegram `message` update to an InboundEvent. Returns null for
 * updates that carry no message, or whose message lacks a sender (channel
 * posts, service messages).
 */
export function normalizeTelegramUpdate(update: TelegramUpdate): InboundEvent | null {
  const message = readRecord(update, "message");
  if (!message) {
    return null;
  }

  const from = readRecord(message, "from");
  const chat = readRecord(message, "chat");
  const senderUserId = readInteger(from, "id");
  const chatId = readInteger(chat, "id");
  const messageId = readInteger(message, "message_id");
  if (senderUserId === null || chatId === null || messageId === null) {
    return null;
  }

  const repliedTo = readRecord(message, "reply_to_message");

  return {
    updateId: readInteger(update, "update_id"),
    senderUserId,
    senderDisplayName: resolveDisplayName(from),
    chatId,
    messageId,
    text: readText(message, "text") ?? readText(message, "caption"),
    repliedToMessageId: readInteger(repliedTo, "message_id"),
    repliedToChatId: readInteger(readRecord(repliedTo, "chat"), "id"),
  };
}

export function resolveDisplayName(from: Record<string, unknown> | null): string {
  const firstName = readText(from, "first_name")?.trim() ?? "";
  const lastName = readText(from, "last_name")?.trim() ?? "";
  const fullName = [firstName, lastName].filter((part) => part.length > 0).join(" ");
  if (fullName) {
    return fullName;
  }

  const username = readText(from, "username")?.trim();
  if (username) {
    return `@${username}`;
  }
  return FALLBACK_DISPLAY_NAME;
}

function readRecord(
  payload: Record<string, unknown> | null,
  key: string,
): Record<string, unknown> | null {
  if (!payload) {
    return null;
  }
  const value = payload[key];
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  return { ...value };
}

function readInteger(payload: Record<string, unknown> | null, key: string): number | null {
  if (!payload) {
    return null;
  }
  const value = payload[key];
  return typeof value === "number" && Number.isSafeInteger(value) ? value : null;
}

function readText(payload: Record<string, unknown> | null, key: string): string | null {
  if (!payload) {
    return null;
  }
  const value = payload[key];
  return typeof value === "string" ? value : null;
}
