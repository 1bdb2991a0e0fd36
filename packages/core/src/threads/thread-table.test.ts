import { describe, expect, it, vi } from "vitest";
import { ThreadTable, type ContactThread } from "./thread-table";

function thread(visitorChatId: number, visitorMessageId = 1): ContactThread {
  return {
    visitorChatId,
    visitorMessageId,
    visitorDisplayName: `Visitor ${visitorChatId}`,
    forwardedText: `summary for ${visitorChatId}`,
  };
}

describe("thread table", () => {
  it("resolves a recorded operator message back to its visitor", () => {
    const table = new ThreadTable();
    table.record(500, 9001, thread(42));

    expect(table.resolve(500, 9001)).toEqual(thread(42));
    expect(table.resolve(500, 9002)).toBeNull();
    expect(table.resolve(501, 9001)).toBeNull();
  });

  it("keeps entries for the same visitor across operators distinct", () => {
    const table = new ThreadTable();
    table.record(500, 1, thread(42));
    table.record(600, 1, thread(43));

    expect(table.resolve(500, 1)?.visitorChatId).toBe(42);
    expect(table.resolve(600, 1)?.visitorChatId).toBe(43);
    expect(table.size).toBe(2);
  });

  it("stores a frozen copy of the thread", () => {
    const table = new ThreadTable();
    const source = {
      visitorChatId: 42,
      visitorMessageId: 1,
      visitorDisplayName: "Visitor 42",
      forwardedText: "summary for 42",
    };
    table.record(500, 1, source);
    source.forwardedText = "changed";

    const stored = table.resolve(500, 1);
    expect(stored?.forwardedText).toBe("summary for 42");
    expect(Object.isFrozen(stored)).toBe(true);
  });

  it("evicts the least recently used entry once capacity is exceeded", () => {
    const onEvict = vi.fn();
    const table = new ThreadTable({ capacity: 2, onEvict });
    table.record(500, 1, thread(1));
    table.record(500, 2, thread(2));

    expect(table.resolve(500, 1)?.visitorChatId).toBe(1);
    table.record(500, 3, thread(3));

    expect(table.size).toBe(2);
    expect(table.resolve(500, 2)).toBeNull();
    expect(table.resolve(500, 1)?.visitorChatId).toBe(1);
    expect(table.resolve(500, 3)?.visitorChatId).toBe(3);
    expect(onEvict).toHaveBeenCalledTimes(1);
    expect(onEvict).toHaveBeenCalledWith({
      operatorChatId: 500,
      operatorMessageId: 2,
      thread: thread(2),
    });
  });

  it("replaces an entry recorded twice under the same key", () => {
    const table = new ThreadTable({ capacity: 2 });
    table.record(500, 1, thread(1));
    table.record(500, 1, thread(7));

    expect(table.size).toBe(1);
    expect(table.resolve(500, 1)?.visitorChatId).toBe(7);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new ThreadTable({ capacity: 0 })).toThrow(
      "ThreadTable capacity must be a positive integer.",
    );
  });
});
