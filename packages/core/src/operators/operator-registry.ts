import type { UserId } from "../../../messaging/src/types.ts";

export type OperatorRegistrationResult =
  | { ok: true; alreadyRegistered: boolean }
  | { ok: false; error: "wrong_secret" };

/**
 * Process-wide set of operators. Membership is add-only: an id joins by
 * presenting the admin secret and stays until the process exits.
 */
export class OperatorRegistry {
  private readonly operators = new Set<UserId>();
  private readonly adminSecret: string;

  constructor(input: { adminSecret: string }) {
    if (input.adminSecret.length === 0) {
      throw new Error("OperatorRegistry requires a non-empty admin secret.");
    }
    this.adminSecret = input.adminSecret;
  }

  register(userId: UserId, suppliedSecret: string): OperatorRegistrationResult {
    if (!timingSafeEqual(suppliedSecret, this.adminSecret)) {
      return { ok: false, error: "wrong_secret" };
    }

    const alreadyRegistered = this.operators.has(userId);
    this.operators.add(userId);
    return { ok: true, alreadyRegistered };
  }

  isOperator(userId: UserId): boolean {
    return this.operators.has(userId);
  }

  snapshot(): UserId[] {
    return [...this.operators];
  }

  get size(): number {
    return this.operators.size;
  }
}

function timingSafeEqual(left: string, right: string): boolean {
  if (left.length !== right.length) {
    return false;
  }

  let diff = 0;
  for (let index = 0; index < left.length; index += 1) {
    diff |= left.charCodeAt(index) ^ right.charCodeAt(index);
  }

  return diff === 0;
}
