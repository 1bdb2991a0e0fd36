import type { ChatId, UserId } from "../../../messaging/src/types.ts";

export const DEFAULT_TEAM_LABEL = "Team Spark";

export const NO_OPERATORS_NOTICE =
  "No one from the team is available right now, but we saved your message and will get back to you.";

export const CONTACT_ACKNOWLEDGEMENT =
  "Thanks! Your message was forwarded to the team. You will get the answer here.";

export function renderOperatorReply(input: { teamLabel: string; replyText: string }): string {
  return `Reply from ${input.teamLabel}:\n\n${input.replyText}`;
}

export function renderContactSummary(input: {
  displayName: string;
  userId: UserId;
  chatId: ChatId;
  text: string;
}): string {
  return [
    "New message",
    `From: ${input.displayName} (user id ${input.userId}, chat id ${input.chatId})`,
    "",
    input.text,
    "",
    "Reply to this message to answer the sender.",
  ].join("\n");
}
