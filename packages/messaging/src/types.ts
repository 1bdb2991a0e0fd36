export type UserId = number;
export type ChatId = number;
export type MessageId = number;

/**
 * Outbound half of the chat transport. `sendText` resolves to the id the
 * transport assigned to the delivered message and rejects with
 * `TransportError` when delivery fails.
 */
export type MessageTransport = {
  sendText: (chatId: ChatId, text: string) => Promise<MessageId>;
};

/**
 * Transport-neutral view of one inbound message. `text` carries the message
 * text, or the caption for media; it is null for media without a caption.
 */
export type InboundEvent = {
  updateId: number | null;
  senderUserId: UserId;
  senderDisplayName: string;
  chatId: ChatId;
  messageId: MessageId;
  text: string | null;
  repliedToMessageId: MessageId | null;
  repliedToChatId: ChatId | null;
};
