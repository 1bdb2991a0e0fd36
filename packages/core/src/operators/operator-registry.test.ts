import { describe, expect, it } from "vitest";
import { OperatorRegistry } from "./operator-registry";

describe("operator registry", () => {
  it("registers an operator who presents the admin secret", () => {
    const registry = new OperatorRegistry({ adminSecret: "test-secret" });

    expect(registry.register(11, "test-secret")).toEqual({ ok: true, alreadyRegistered: false });
    expect(registry.isOperator(11)).toBe(true);
    expect(registry.snapshot()).toEqual([11]);
  });

  it("is idempotent for repeat registrations", () => {
    const registry = new OperatorRegistry({ adminSecret: "test-secret" });
    registry.register(11, "test-secret");

    expect(registry.register(11, "test-secret")).toEqual({ ok: true, alreadyRegistered: true });
    expect(registry.size).toBe(1);
  });

  it("rejects a wrong secret without changing membership", () => {
    const registry = new OperatorRegistry({ adminSecret: "test-secret" });

    expect(registry.register(12, "test-secreT")).toEqual({ ok: false, error: "wrong_secret" });
    expect(registry.register(12, "test")).toEqual({ ok: false, error: "wrong_secret" });
    expect(registry.register(12, "")).toEqual({ ok: false, error: "wrong_secret" });
    expect(registry.isOperator(12)).toBe(false);
    expect(registry.size).toBe(0);
  });

  it("compares secrets exactly, including surrounding whitespace", () => {
    const registry = new OperatorRegistry({ adminSecret: "test-secret" });

    expect(registry.register(13, " test-secret")).toEqual({ ok: false, error: "wrong_secret" });
  });

  it("returns a snapshot that later registrations do not mutate", () => {
    const registry = new OperatorRegistry({ adminSecret: "test-secret" });
    registry.register(1, "test-secret");
    const snapshot = registry.snapshot();
    registry.register(2, "test-secret");

    expect(snapshot).toEqual([1]);
    expect(registry.snapshot()).toEqual([1, 2]);
  });

  it("requires a non-empty admin secret", () => {
    expect(() => new OperatorRegistry({ adminSecret: "" })).toThrow(
      "OperatorRegistry requires a non-empty admin secret.",
    );
  });
});
