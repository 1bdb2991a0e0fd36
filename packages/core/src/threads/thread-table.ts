import type { ChatId, MessageId } from "../../../messaging/src/types.ts";

export const DEFAULT_THREAD_TABLE_CAPACITY = 10_000;

export type ContactThread = Readonly<{
  visitorChatId: ChatId;
  visitorMessageId: MessageId;
  visitorDisplayName: string;
  forwardedText: string;
}>;

export type ThreadEvictionListener = (evicted: {
  operatorChatId: ChatId;
  operatorMessageId: MessageId;
  thread: ContactThread;
}) => void;

type ThreadEntry = {
  operatorChatId: ChatId;
  operatorMessageId: MessageId;
  thread: ContactThread;
};

/**
 * Maps (operator chat, operator message) back to the visitor message that
 * produced it. Bounded: once `capacity` is exceeded the least recently
 * recorded or resolved entry is dropped.
 */
export class ThreadTable {
  readonly capacity: number;
  private readonly entries = new Map<string, ThreadEntry>();
  private readonly onEvict: ThreadEvictionListener | null;

  constructor(input: { capacity?: number; onEvict?: ThreadEvictionListener } = {}) {
    const capacity = input.capacity ?? DEFAULT_THREAD_TABLE_CAPACITY;
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new Error("ThreadTable capacity must be a positive integer.");
    }
    this.capacity = capacity;
    this.onEvict = input.onEvict ?? null;
  }

  record(operatorChatId: ChatId, operatorMessageId: MessageId, thread: ContactThread): void {
    const key = threadKey(operatorChatId, operatorMessageId);
    this.entries.delete(key);
    this.entries.set(key, {
      operatorChatId,
      operatorMessageId,
      thread: Object.freeze({ ...thread }),
    });

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.entries().next();
      if (oldest.done) {
        break;
      }
      const [oldestKey, evicted] = oldest.value;
      this.entries.delete(oldestKey);
      this.onEvict?.(evicted);
    }
  }

  resolve(operatorChatId: ChatId, repliedToMessageId: MessageId): ContactThread | null {
    const key = threadKey(operatorChatId, repliedToMessageId);
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.thread;
  }

  get size(): number {
    return this.entries.size;
  }
}

function threadKey(chatId: ChatId, messageId: MessageId): string {
  return `${chatId}:${messageId}`;
}
