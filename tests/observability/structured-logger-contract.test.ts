import fs from "fs";
import path from "path";
import { describe, expect, it, vi } from "vitest";
import { EVENT_CATALOG_BY_NAME } from "../../packages/core/src/observability/event-catalog";
import { createLogger, logEvent } from "../../packages/core/src/observability/logger";

const REQUIRED_CANONICAL_EVENTS = [
  "conversation.form_started",
  "conversation.form_input_rejected",
  "conversation.form_completed",
  "conversation.dispatch_decision",
  "routing.broadcast_completed",
  "routing.operator_send_failed",
  "routing.reply_delivered",
  "routing.reply_ignored",
  "routing.thread_evicted",
  "operators.registered",
  "operators.registration_rejected",
  "transport.send_failed",
  "transport.poll_failed",
  "system.startup",
  "system.startup_failed",
  "system.shutdown",
  "system.unhandled_error",
] as const;

describe("structured logger contract", () => {
  it("includes all required canonical events in the catalog", () => {
    const missing = REQUIRED_CANONICAL_EVENTS.filter((eventName) => !EVENT_CATALOG_BY_NAME[eventName]);
    expect(missing).toEqual([]);
  });

  it("throws when an unknown event is logged", () => {
    expect(() =>
      logEvent({
        event: "unknown.event",
        payload: {},
      })).toThrow("Unknown structured log event");
  });

  it("enforces required event payload fields", () => {
    expect(() =>
      logEvent({
        event: "routing.reply_delivered",
        payload: {
          operator_id: 7,
        },
      })).toThrow("Missing required field 'visitor_chat_id'");
  });

  it("writes one JSON line with category and stringified user id", () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => undefined);
    try {
      const emitted = logEvent({
        event: "operators.registered",
        user_id: 4242,
        payload: { already_registered: false },
      }, "staging");

      expect(infoSpy).toHaveBeenCalledTimes(1);
      const [line] = infoSpy.mock.calls[0] ?? [];
      expect(JSON.parse(String(line))).toEqual(emitted);
      expect(emitted.category).toBe("operators");
      expect(emitted.env).toBe("staging");
      expect(emitted.level).toBe("info");
      expect(emitted.user_id).toBe("4242");
      expect(emitted.payload).toEqual({ already_registered: false });
    } finally {
      infoSpy.mockRestore();
    }
  });

  it("fills correlation and user ids from logger context", () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => undefined);
    try {
      const log = createLogger({ env: "production", correlation_id: "corr_ctx", user_id: 9 });
      const emitted = log({
        event: "routing.reply_ignored",
        payload: { reason: "no_such_thread" },
      });

      expect(emitted.correlation_id).toBe("corr_ctx");
      expect(emitted.user_id).toBe("9");
      expect(emitted.env).toBe("production");
    } finally {
      infoSpy.mockRestore();
    }
  });

  it("redacts PII, secrets, and message bodies in emitted structured logs", () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => undefined);
    try {
      logEvent({
        event: "conversation.form_completed",
        user_id: "user_123",
        correlation_id: "corr_123",
        payload: {
          broadcast_outcome: "delivered",
          answers: {
            name: "Alex",
            contact: "alex@example.com",
          },
          summary_text: "New collaboration request from Alex",
          admin_secret: "test-secret",
          notes: "Reach out at +1 650 555 9000 or email sam@example.com",
        },
      });
      expect(infoSpy).toHaveBeenCalledTimes(1);
      const [line] = infoSpy.mock.calls[0] ?? [];
      expect(typeof line).toBe("string");

      const parsed: { payload: Record<string, unknown> } = JSON.parse(String(line));
      const serialized = JSON.stringify(parsed);

      expect(parsed.payload.broadcast_outcome).toBe("delivered");
      expect(parsed.payload.answers).toBe("[REDACTED_FORM_ANSWERS]");
      expect(parsed.payload.summary_text).toBe("[REDACTED_MESSAGE_TEXT]");
      expect(parsed.payload.admin_secret).toBe("[REDACTED_SECRET]");
      expect(parsed.payload.notes).toBe("Reach out at [REDACTED_PHONE] or email [REDACTED_EMAIL]");
      expect(serialized).not.toContain("sam@example.com");
      expect(serialized).not.toContain("test-secret");
    } finally {
      infoSpy.mockRestore();
    }
  });

  it("ensures literal log event names exist in the catalog", () => {
    const roots = ["app", "packages"];
    const literalEvents = new Set<string>();

    for (const root of roots) {
      const absoluteRoot = path.resolve(process.cwd(), root);
      if (!fs.existsSync(absoluteRoot)) {
        continue;
      }
      for (const file of walkFiles(absoluteRoot)) {
        if (isIgnoredPath(file)) {
          continue;
        }
        const source = fs.readFileSync(file, "utf8");
        const pattern = /\b(?:logEvent|log)\(\s*\{[\s\S]{0,500}?event:\s*"([^"]+)"/g;
        let match = pattern.exec(source);
        while (match) {
          const eventName = match[1];
          if (eventName) {
            literalEvents.add(eventName);
          }
          match = pattern.exec(source);
        }
      }
    }

    expect(literalEvents.size).toBeGreaterThan(10);
    const missing = Array.from(literalEvents)
      .filter((eventName) => !EVENT_CATALOG_BY_NAME[eventName])
      .sort();
    expect(missing).toEqual([]);
  });
});

function walkFiles(root: string): string[] {
  const discovered: string[] = [];
  const stack = [root];
  let current = stack.pop();
  while (current !== undefined) {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const absolutePath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        stack.push(absolutePath);
        continue;
      }
      if (entry.isFile()) {
        discovered.push(absolutePath);
      }
    }
    current = stack.pop();
  }
  return discovered;
}

function isIgnoredPath(filePath: string): boolean {
  const normalized = filePath.replace(/\\/g, "/");
  if (normalized.includes("/tests/") || normalized.endsWith(".test.ts")) {
    return true;
  }
  return !normalized.endsWith(".ts");
}
