import type {
  ChatId,
  MessageId,
  MessageTransport,
  UserId,
} from "../../../messaging/src/types.ts";
import { KeyedSerializer } from "../concurrency/keyed-serializer.ts";
import { describeError, logEvent, type StructuredLogEventInput } from "../observability/logger.ts";
import type { BroadcastOutcome, ContactRouter } from "../routing/contact-router.ts";
import { FormSessionStore, type FormSession } from "./form-session-store.ts";
import {
  FORM_ACKNOWLEDGEMENT,
  renderFormSummary,
  renderInvalidInputReprompt,
  renderSlotPrompt,
  type CompletedFormRecord,
} from "./messages.ts";
import {
  getSlotAt,
  isLastSlotIndex,
  type FormSlotDefinition,
  type FormSlotKey,
} from "./slots.ts";

export type StartFormResult =
  | { ok: true; slot: FormSlotKey }
  | { ok: false; error: "already_open"; slot: FormSlotKey };

export type SessionStep =
  | { kind: "awaiting_slot"; slot: FormSlotKey }
  | { kind: "completed"; record: CompletedFormRecord; broadcast: BroadcastOutcome };

export type AdvanceFormResult =
  | { ok: true; value: SessionStep }
  | { ok: false; error: "no_session" }
  | { ok: false; error: "invalid_input"; slot: FormSlotKey };

export type StartFormInput = {
  visitorId: UserId;
  chatId: ChatId;
  displayName: string;
};

export type AdvanceFormInput = {
  visitorId: UserId;
  text: string | null;
  messageId: MessageId;
  displayName?: string;
};

export type EngineLogger = (input: StructuredLogEventInput) => unknown;

export type FormSessionEngineDeps = {
  transport: MessageTransport;
  router: Pick<ContactRouter, "broadcast">;
  store?: FormSessionStore;
  serializer?: KeyedSerializer<UserId>;
  logger?: EngineLogger;
};

/**
 * Collaboration form state machine.
 *
 * States per visitor: no session, `awaiting_slot(i)` for each entry of
 * FORM_SLOTS, and a transient completion that removes the session and hands
 * the record to the router. `start` and `advance` for one visitor run
 * strictly one after another; different visitors never wait on each other.
 */
export class FormSessionEngine {
  private readonly transport: MessageTransport;
  private readonly router: Pick<ContactRouter, "broadcast">;
  private readonly store: FormSessionStore;
  private readonly serializer: KeyedSerializer<UserId>;
  private readonly log: EngineLogger;

  constructor(deps: FormSessionEngineDeps) {
    this.transport = deps.transport;
    this.router = deps.router;
    this.store = deps.store ?? new FormSessionStore();
    this.serializer = deps.serializer ?? new KeyedSerializer<UserId>();
    this.log = deps.logger ?? logEvent;
  }

  hasSession(visitorId: UserId): boolean {
    return this.store.has(visitorId);
  }

  start(input: StartFormInput): Promise<StartFormResult> {
    return this.serializer.run(input.visitorId, async (): Promise<StartFormResult> => {
      const existing = this.store.get(input.visitorId);
      if (existing) {
        this.log({
          event: "conversation.form_start_rejected",
          user_id: input.visitorId,
          payload: {
            reason: "already_open",
            slot: currentSlot(existing).key,
          },
        });
        return { ok: false, error: "already_open", slot: currentSlot(existing).key };
      }

      const session = this.store.open(input);
      if (!session) {
        throw new Error(`Form session for visitor ${input.visitorId} appeared during start.`);
      }

      const firstSlot = currentSlot(session);
      await this.sendPrompt(session, renderSlotPrompt(firstSlot), "form_prompt");
      this.log({
        event: "conversation.form_started",
        user_id: input.visitorId,
        payload: { slot: firstSlot.key },
      });
      return { ok: true, slot: firstSlot.key };
    });
  }

  advance(input: AdvanceFormInput): Promise<AdvanceFormResult> {
    return this.serializer.run(input.visitorId, async (): Promise<AdvanceFormResult> => {
      const session = this.store.get(input.visitorId);
      if (!session) {
        return { ok: false, error: "no_session" };
      }

      const slot = currentSlot(session);
      const answer = normalizeAnswer(input.text);
      if (answer === null) {
        await this.sendPrompt(session, renderInvalidInputReprompt(slot), "form_reprompt");
        this.log({
          event: "conversation.form_input_rejected",
          user_id: input.visitorId,
          payload: {
            slot: slot.key,
            reason: input.text === null ? "not_text" : "empty",
          },
        });
        return { ok: false, error: "invalid_input", slot: slot.key };
      }

      session.answers[slot.key] = answer;
      if (input.displayName?.trim()) {
        session.displayName = input.displayName.trim();
      }

      if (!isLastSlotIndex(session.slotIndex)) {
        session.slotIndex += 1;
        const nextSlot = currentSlot(session);
        await this.sendPrompt(session, renderSlotPrompt(nextSlot), "form_prompt");
        this.log({
          event: "conversation.form_advanced",
          user_id: input.visitorId,
          payload: {
            filled_slot: slot.key,
            next_slot: nextSlot.key,
          },
        });
        return { ok: true, value: { kind: "awaiting_slot", slot: nextSlot.key } };
      }

      const record = toCompletedRecord(session);
      this.store.remove(input.visitorId);

      const broadcast = await this.router.broadcast(
        {
          userId: record.visitorId,
          chatId: record.chatId,
          messageId: input.messageId,
          displayName: record.displayName,
        },
        renderFormSummary(record),
        FORM_ACKNOWLEDGEMENT,
      );
      this.log({
        event: "conversation.form_completed",
        user_id: input.visitorId,
        payload: {
          broadcast_outcome: broadcast.kind,
          operators_notified: broadcast.kind === "delivered" ? broadcast.count : 0,
        },
      });
      return { ok: true, value: { kind: "completed", record, broadcast } };
    });
  }

  /** Waits for every queued start/advance to settle. */
  drain(): Promise<void> {
    return this.serializer.drain();
  }

  private async sendPrompt(session: FormSession, text: string, purpose: string): Promise<void> {
    try {
      await this.transport.sendText(session.chatId, text);
    } catch (error) {
      this.log({
        event: "transport.send_failed",
        user_id: session.visitorId,
        level: "warn",
        payload: {
          purpose,
          slot: currentSlot(session).key,
          ...describeError(error),
        },
      });
    }
  }
}

function currentSlot(session: FormSession): FormSlotDefinition {
  const slot = getSlotAt(session.slotIndex);
  if (!slot) {
    throw new Error(`Form session slot index ${session.slotIndex} is out of range.`);
  }
  return slot;
}

function normalizeAnswer(text: string | null): string | null {
  if (text === null) {
    return null;
  }
  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function toCompletedRecord(session: FormSession): CompletedFormRecord {
  return {
    visitorId: session.visitorId,
    chatId: session.chatId,
    displayName: session.displayName,
    answers: {
      name: requireAnswer(session, "name"),
      organization: requireAnswer(session, "organization"),
      idea: requireAnswer(session, "idea"),
      timeline: requireAnswer(session, "timeline"),
      contact: requireAnswer(session, "contact"),
    },
  };
}

function requireAnswer(session: FormSession, key: FormSlotKey): string {
  const value = session.answers[key];
  if (value === null) {
    throw new Error(`Form session completed without an answer for '${key}'.`);
  }
  return value;
}
