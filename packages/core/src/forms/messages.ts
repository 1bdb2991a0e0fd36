import type { ChatId, UserId } from "../../../messaging/src/types.ts";
import { FORM_SLOTS, type FormSlotDefinition, type FormSlotKey } from "./slots.ts";

export const FORM_INVALID_INPUT_PREFIX = "Please answer with a text message.";

export const FORM_ACKNOWLEDGEMENT =
  "Thank you! Your collaboration request has been sent to the team. We'll get back to you here.";

export type CompletedFormRecord = {
  visitorId: UserId;
  chatId: ChatId;
  displayName: string;
  answers: Readonly<Record<FormSlotKey, string>>;
};

export function renderSlotPrompt(slot: FormSlotDefinition): string {
  return slot.prompt;
}

export function renderInvalidInputReprompt(slot: FormSlotDefinition): string {
  return `${FORM_INVALID_INPUT_PREFIX}\n\n${slot.prompt}`;
}

export function renderFormSummary(record: CompletedFormRecord): string {
  const lines = [
    "New collaboration request",
    `From: ${record.displayName} (user id ${record.visitorId}, chat id ${record.chatId})`,
    "",
    ...FORM_SLOTS.map((slot) => `${slot.label}: ${record.answers[slot.key]}`),
    "",
    "Reply to this message to answer the requester.",
  ];
  return lines.join("\n");
}
