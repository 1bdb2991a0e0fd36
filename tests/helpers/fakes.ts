import { TransportError } from "../../packages/messaging/src/sender";
import type { ChatId, MessageId, MessageTransport } from "../../packages/messaging/src/types";
import type { StructuredLogEventInput } from "../../packages/core/src/observability/logger";

export type SentMessage = {
  chatId: ChatId;
  text: string;
  messageId: MessageId;
};

export class FakeTransport implements MessageTransport {
  readonly sent: SentMessage[] = [];
  private readonly failingChats = new Set<ChatId>();
  private nextMessageId: MessageId;

  constructor(firstMessageId: MessageId = 1000) {
    this.nextMessageId = firstMessageId;
  }

  failFor(chatId: ChatId): void {
    this.failingChats.add(chatId);
  }

  async sendText(chatId: ChatId, text: string): Promise<MessageId> {
    if (this.failingChats.has(chatId)) {
      throw new TransportError({
        message: `chat ${chatId} is unreachable`,
        chatId,
        statusCode: 403,
        retryable: false,
      });
    }
    const messageId = this.nextMessageId;
    this.nextMessageId += 1;
    this.sent.push({ chatId, text, messageId });
    return messageId;
  }

  textsTo(chatId: ChatId): string[] {
    return this.sent.filter((message) => message.chatId === chatId).map((message) => message.text);
  }

  lastTo(chatId: ChatId): SentMessage | undefined {
    const messages = this.sent.filter((message) => message.chatId === chatId);
    return messages[messages.length - 1];
  }
}

export function createRecordingLogger() {
  const events: StructuredLogEventInput[] = [];
  return {
    events,
    logger: (input: StructuredLogEventInput): void => {
      events.push(input);
    },
    names: (): string[] => events.map((entry) => String(entry.event)),
  };
}
