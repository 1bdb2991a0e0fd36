export function systemWelcomeMessage(input: { teamLabel: string }): string {
  const teamLabel = requireNonEmpty(input.teamLabel, "teamLabel");
  return [
    `Welcome to ${teamLabel}!`,
    "",
    "Choose an option or use the commands:",
    "• /apply - Apply to join the team",
    "• /collaborate - Propose a collaboration with the team",
    "",
    "You can also just write a message here and it will be forwarded to the team.",
  ].join("\n");
}

export function renderApplyMessage(input: { teamLabel: string; applicationFormUrl: string }): string {
  const teamLabel = requireNonEmpty(input.teamLabel, "teamLabel");
  const applicationFormUrl = requireNonEmpty(input.applicationFormUrl, "applicationFormUrl");
  return [
    `Ready to join ${teamLabel}?`,
    "",
    "Fill out our application form and tell us about your skills, projects, and what excites you about working with the team:",
    applicationFormUrl,
  ].join("\n");
}

export function systemAlreadyOpenFormMessage(): string {
  return "You already have a collaboration request in progress. Please answer the last question to continue.";
}

function requireNonEmpty(value: string, field: string): string {
  const normalized = value.trim();
  if (!normalized) {
    throw new Error(`${field} must be non-empty.`);
  }
  return normalized;
}
