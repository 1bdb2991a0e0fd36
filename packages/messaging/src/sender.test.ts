import { describe, expect, it } from "vitest";
import { TelegramClientError, type TelegramClient } from "./client";
import { createTelegramTransport, TransportError, truncateText } from "./sender";

function stubClient(sendMessage: TelegramClient["sendMessage"]): TelegramClient {
  return {
    sendMessage,
    getUpdates: async () => [],
  };
}

describe("telegram transport", () => {
  it("returns the message id assigned by the client", async () => {
    const sent: Array<{ chatId: number; text: string }> = [];
    const transport = createTelegramTransport(stubClient(async (input) => {
      sent.push(input);
      return { messageId: 9001, chatId: input.chatId };
    }));

    await expect(transport.sendText(42, "hello")).resolves.toBe(9001);
    expect(sent).toEqual([{ chatId: 42, text: "hello" }]);
  });

  it("converts client failures into TransportError", async () => {
    const transport = createTelegramTransport(stubClient(async () => {
      throw new TelegramClientError({
        code: "RESPONSE",
        message: "Forbidden: bot was blocked by the user (code=403)",
        statusCode: 403,
        retryable: false,
      });
    }));

    const failure = transport.sendText(42, "hello");

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({
      chatId: 42,
      statusCode: 403,
      retryable: false,
      message: "Forbidden: bot was blocked by the user (code=403)",
    });
  });

  it("keeps retry hints from rate-limited sends", async () => {
    const transport = createTelegramTransport(stubClient(async () => {
      throw new TelegramClientError({
        code: "RESPONSE",
        message: "Too Many Requests (code=429)",
        statusCode: 429,
        retryable: true,
        retryAfterSeconds: 2,
      });
    }));

    await expect(transport.sendText(42, "hello")).rejects.toMatchObject({
      retryable: true,
      retryAfterMs: 2000,
    });
  });

  it("rejects blank text without calling the client", async () => {
    let calls = 0;
    const transport = createTelegramTransport(stubClient(async (input) => {
      calls += 1;
      return { messageId: 1, chatId: input.chatId };
    }));

    await expect(transport.sendText(42, "  ")).rejects.toThrow("sendText requires a non-empty text.");
    expect(calls).toBe(0);
  });

  it("truncates text beyond the Telegram message limit", () => {
    const truncated = truncateText("x".repeat(5000));

    expect(truncated).toHaveLength(4096);
    expect(truncated.endsWith("x…")).toBe(true);
    expect(truncateText("short")).toBe("short");
  });

  it("does not split an emoji at the truncation point", () => {
    const truncated = truncateText(`${"x".repeat(4094)}😀${"y".repeat(10)}`);

    expect(truncated).toBe(`${"x".repeat(4094)}…`);
  });
});
