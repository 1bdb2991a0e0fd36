export function operatorRegisterUsage(): string {
  return "Usage: /register <secret>";
}

export function operatorRegistered(): string {
  return "You are now registered as an operator. Visitor messages will be forwarded to you; reply to one to answer.";
}

export function operatorAlreadyRegistered(): string {
  return "You are already registered as an operator.";
}

export function operatorSecretMismatch(): string {
  return "The secret does not match.";
}

export function renderOperatorReplyDelivered(input: { visitorDisplayName: string }): string {
  const name = input.visitorDisplayName.trim() || "the visitor";
  return `Reply delivered to ${name}.`;
}

export function operatorReplyFailed(): string {
  return "Your reply could not be delivered. The visitor may have blocked the bot.";
}
