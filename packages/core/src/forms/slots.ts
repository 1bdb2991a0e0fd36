export const FORM_SLOT_KEYS = [
  "name",
  "organization",
  "idea",
  "timeline",
  "contact",
] as const;

export type FormSlotKey = (typeof FORM_SLOT_KEYS)[number];

export type FormSlotDefinition = {
  key: FormSlotKey;
  label: string;
  prompt: string;
};

export const FORM_SLOTS: readonly FormSlotDefinition[] = [
  {
    key: "name",
    label: "Name",
    prompt: "Let's set up your collaboration request. First, what is your name?",
  },
  {
    key: "organization",
    label: "Organization",
    prompt: "Which organization or project do you represent?",
  },
  {
    key: "idea",
    label: "Idea",
    prompt: "Describe your collaboration idea in a few sentences.",
  },
  {
    key: "timeline",
    label: "Timeline",
    prompt: "What timeline do you have in mind?",
  },
  {
    key: "contact",
    label: "Contact",
    prompt: "Finally, how can the team reach you (email, phone, or handle)?",
  },
];

export type FormAnswers = Record<FormSlotKey, string | null>;

export function createEmptyAnswers(): FormAnswers {
  return {
    name: null,
    organization: null,
    idea: null,
    timeline: null,
    contact: null,
  };
}

export function getSlotAt(index: number): FormSlotDefinition | null {
  return FORM_SLOTS[index] ?? null;
}

export function isLastSlotIndex(index: number): boolean {
  return index === FORM_SLOTS.length - 1;
}
