import type { ChatId, UserId } from "../../../messaging/src/types.ts";
import { createEmptyAnswers, type FormAnswers } from "./slots.ts";

export type FormSession = {
  visitorId: UserId;
  chatId: ChatId;
  displayName: string;
  slotIndex: number;
  answers: FormAnswers;
};

/**
 * In-memory store of open form sessions, at most one per visitor. Callers
 * serialize access per visitor; the store itself only guards the
 * one-session invariant.
 */
export class FormSessionStore {
  private readonly sessions = new Map<UserId, FormSession>();

  get(visitorId: UserId): FormSession | null {
    return this.sessions.get(visitorId) ?? null;
  }

  has(visitorId: UserId): boolean {
    return this.sessions.has(visitorId);
  }

  /** Returns null when a session is already open for the visitor. */
  open(input: { visitorId: UserId; chatId: ChatId; displayName: string }): FormSession | null {
    if (this.sessions.has(input.visitorId)) {
      return null;
    }

    const session: FormSession = {
      visitorId: input.visitorId,
      chatId: input.chatId,
      displayName: input.displayName,
      slotIndex: 0,
      answers: createEmptyAnswers(),
    };
    this.sessions.set(input.visitorId, session);
    return session;
  }

  remove(visitorId: UserId): boolean {
    return this.sessions.delete(visitorId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
