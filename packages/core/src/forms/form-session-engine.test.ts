import { describe, expect, it } from "vitest";
import { createRecordingLogger, FakeTransport } from "../../../../tests/helpers/fakes";
import { OperatorRegistry } from "../operators/operator-registry";
import { ContactRouter } from "../routing/contact-router";
import { ThreadTable } from "../threads/thread-table";
import { FormSessionEngine } from "./form-session-engine";
import { FORM_ACKNOWLEDGEMENT } from "./messages";
import { FORM_SLOTS } from "./slots";

const PROMPTS = FORM_SLOTS.map((slot) => slot.prompt);

function setup(operatorIds: number[] = [500]) {
  const transport = new FakeTransport();
  const operators = new OperatorRegistry({ adminSecret: "test-secret" });
  for (const operatorId of operatorIds) {
    operators.register(operatorId, "test-secret");
  }
  const threads = new ThreadTable();
  const recording = createRecordingLogger();
  const router = new ContactRouter({ transport, operators, threads, logger: recording.logger });
  const engine = new FormSessionEngine({ transport, router, logger: recording.logger });
  return { transport, threads, engine, recording };
}

const ANSWERS = ["Ada", "Analytical Engines", "Build a music generator", "Q3", "ada@example.com"];

describe("form session engine", () => {
  it("opens a session and sends the first prompt", async () => {
    const { transport, engine } = setup();

    const result = await engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" });

    expect(result).toEqual({ ok: true, slot: "name" });
    expect(engine.hasSession(42)).toBe(true);
    expect(transport.textsTo(42)).toEqual([PROMPTS[0]]);
  });

  it("refuses a second session for the same visitor", async () => {
    const { transport, engine, recording } = setup();
    await engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" });
    await engine.advance({ visitorId: 42, text: "Ada", messageId: 10 });

    const result = await engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" });

    expect(result).toEqual({ ok: false, error: "already_open", slot: "organization" });
    expect(transport.textsTo(42)).toEqual([PROMPTS[0], PROMPTS[1]]);
    expect(recording.names().at(-1)).toBe("conversation.form_start_rejected");
  });

  it("advances through every slot in order and broadcasts the completed record", async () => {
    const { transport, threads, engine } = setup();
    await engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" });

    const steps = [];
    for (const [index, answer] of ANSWERS.entries()) {
      steps.push(await engine.advance({ visitorId: 42, text: ` ${answer} `, messageId: 10 + index }));
    }

    expect(steps.slice(0, 4)).toEqual([
      { ok: true, value: { kind: "awaiting_slot", slot: "organization" } },
      { ok: true, value: { kind: "awaiting_slot", slot: "idea" } },
      { ok: true, value: { kind: "awaiting_slot", slot: "timeline" } },
      { ok: true, value: { kind: "awaiting_slot", slot: "contact" } },
    ]);
    expect(steps[4]).toEqual({
      ok: true,
      value: {
        kind: "completed",
        record: {
          visitorId: 42,
          chatId: 42,
          displayName: "Ada",
          answers: {
            name: "Ada",
            organization: "Analytical Engines",
            idea: "Build a music generator",
            timeline: "Q3",
            contact: "ada@example.com",
          },
        },
        broadcast: { kind: "delivered", count: 1, failed: 0 },
      },
    });
    expect(engine.hasSession(42)).toBe(false);
    expect(transport.textsTo(42)).toEqual([...PROMPTS, FORM_ACKNOWLEDGEMENT]);

    const summary = transport.lastTo(500);
    expect(summary?.text).toBe(
      [
        "New collaboration request",
        "From: Ada (user id 42, chat id 42)",
        "",
        "Name: Ada",
        "Organization: Analytical Engines",
        "Idea: Build a music generator",
        "Timeline: Q3",
        "Contact: ada@example.com",
        "",
        "Reply to this message to answer the requester.",
      ].join("\n"),
    );
    expect(threads.resolve(500, summary?.messageId ?? -1)?.visitorMessageId).toBe(14);
  });

  it("re-prompts the same slot for empty or non-text answers", async () => {
    const { transport, engine, recording } = setup();
    await engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" });

    const blank = await engine.advance({ visitorId: 42, text: "   ", messageId: 10 });
    const media = await engine.advance({ visitorId: 42, text: null, messageId: 11 });
    const valid = await engine.advance({ visitorId: 42, text: "Ada", messageId: 12 });

    expect(blank).toEqual({ ok: false, error: "invalid_input", slot: "name" });
    expect(media).toEqual({ ok: false, error: "invalid_input", slot: "name" });
    expect(valid).toEqual({ ok: true, value: { kind: "awaiting_slot", slot: "organization" } });
    expect(transport.textsTo(42)).toEqual([
      PROMPTS[0],
      `Please answer with a text message.\n\n${PROMPTS[0]}`,
      `Please answer with a text message.\n\n${PROMPTS[0]}`,
      PROMPTS[1],
    ]);
    const rejections = recording.events.filter((entry) => entry.event === "conversation.form_input_rejected");
    expect(rejections.map((entry) => entry.payload.reason)).toEqual(["empty", "not_text"]);
  });

  it("reports no session for visitors without an open form", async () => {
    const { transport, engine } = setup();

    expect(await engine.advance({ visitorId: 42, text: "hello", messageId: 1 })).toEqual({
      ok: false,
      error: "no_session",
    });
    expect(transport.sent).toEqual([]);
  });

  it("uses the latest display name in the summary", async () => {
    const { transport, engine } = setup();
    await engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" });
    for (const [index, answer] of ANSWERS.entries()) {
      await engine.advance({
        visitorId: 42,
        text: answer,
        messageId: index,
        displayName: index === 4 ? "Ada L." : "Ada",
      });
    }

    expect(transport.lastTo(500)?.text.split("\n")[1]).toBe("From: Ada L. (user id 42, chat id 42)");
  });

  it("completes with no_operators when nobody is registered", async () => {
    const { engine } = setup([]);
    await engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" });
    let last;
    for (const answer of ANSWERS) {
      last = await engine.advance({ visitorId: 42, text: answer, messageId: 1 });
    }

    expect(last).toMatchObject({ ok: true, value: { kind: "completed", broadcast: { kind: "no_operators" } } });
  });

  it("keeps the session when the prompt cannot be delivered", async () => {
    const { transport, engine, recording } = setup();
    transport.failFor(42);

    const result = await engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" });

    expect(result).toEqual({ ok: true, slot: "name" });
    expect(engine.hasSession(42)).toBe(true);
    expect(recording.events[0]).toMatchObject({
      event: "transport.send_failed",
      payload: { purpose: "form_prompt", slot: "name", error_name: "TransportError" },
    });
  });

  it("opens exactly one session under concurrent starts", async () => {
    const { transport, engine } = setup();

    const results = await Promise.all(
      Array.from({ length: 5 }, () => engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" })),
    );

    expect(results.filter((result) => result.ok)).toHaveLength(1);
    expect(transport.textsTo(42)).toEqual([PROMPTS[0]]);
  });

  it("applies concurrent answers in arrival order", async () => {
    const { engine } = setup();
    await engine.start({ visitorId: 42, chatId: 42, displayName: "Ada" });

    const results = await Promise.all(
      ANSWERS.map((answer, index) => engine.advance({ visitorId: 42, text: answer, messageId: index })),
    );

    expect(results[4]).toMatchObject({
      ok: true,
      value: {
        kind: "completed",
        record: {
          answers: {
            name: "Ada",
            organization: "Analytical Engines",
            idea: "Build a music generator",
            timeline: "Q3",
            contact: "ada@example.com",
          },
        },
      },
    });
  });
});
