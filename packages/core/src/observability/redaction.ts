const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+?\d[\d().\-\s]{8,}\d)/g;

const FORBIDDEN_SECRET_KEY_PATTERN =
  /secret|(^|[_-])token$|authorization|password|api[_-]?key/i;
const FORBIDDEN_MESSAGE_TEXT_KEY_PATTERN =
  /(^|[_-])(text|inbound_text|reply_text|summary_text|forwarded_text|ack_text|answer|caption|body)$/i;
const FORBIDDEN_FORM_ANSWERS_KEY_PATTERN = /^(answers|slot_values|record)$/i;

export const REDACTED_SECRET = "[REDACTED_SECRET]";
export const REDACTED_MESSAGE_TEXT = "[REDACTED_MESSAGE_TEXT]";
export const REDACTED_FORM_ANSWERS = "[REDACTED_FORM_ANSWERS]";

export function redactPII<T>(input: T): T {
  const seen = new WeakSet<object>();
  return redactValue(input, "", seen) as T;
}

function redactValue(input: unknown, keyName: string, seen: WeakSet<object>): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (FORBIDDEN_SECRET_KEY_PATTERN.test(keyName)) {
    return REDACTED_SECRET;
  }
  if (FORBIDDEN_FORM_ANSWERS_KEY_PATTERN.test(keyName)) {
    return REDACTED_FORM_ANSWERS;
  }
  if (FORBIDDEN_MESSAGE_TEXT_KEY_PATTERN.test(keyName)) {
    return REDACTED_MESSAGE_TEXT;
  }

  if (typeof input === "string") {
    return redactString(input);
  }

  if (typeof input !== "object") {
    return input;
  }

  if (seen.has(input)) {
    return "[Circular]";
  }
  seen.add(input);

  if (Array.isArray(input)) {
    return input.map((value) => redactValue(value, keyName, seen));
  }

  if (input instanceof Error) {
    return {
      name: input.name,
      message: redactString(input.message),
    };
  }

  const output: Record<string, unknown> = {};
  for (const [childKey, childValue] of Object.entries(input)) {
    output[childKey] = redactValue(childValue, childKey, seen);
  }
  return output;
}

function redactString(input: string): string {
  let redacted = input.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]");
  redacted = redacted.replace(PHONE_PATTERN, (candidate) => {
    const digits = candidate.replace(/\D/g, "");
    if (digits.length < 10 || digits.length > 15) {
      return candidate;
    }
    return "[REDACTED_PHONE]";
  });
  return redacted;
}
