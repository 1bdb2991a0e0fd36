import { afterEach, describe, expect, it, vi } from "vitest";
import { logEvent } from "../../packages/core/src/observability/logger";
import {
  clearInMemoryMetrics,
  emitMetric,
  emitMetricBestEffort,
  elapsedMetricMs,
  getInMemoryMetrics,
  nowMetricMs,
} from "../../packages/core/src/observability/metrics";
import {
  METRIC_CATALOG,
  validateMetricCatalog,
} from "../../packages/core/src/observability/metrics-catalog";

describe("metrics emitter", () => {
  afterEach(() => {
    clearInMemoryMetrics();
  });

  it("rejects unknown metric names", () => {
    expect(() =>
      emitMetric({
        metric: "unknown.metric",
        value: 1,
      })
    ).toThrow("Unknown metric");
  });

  it("returns null instead of throwing from the best-effort emitter", () => {
    expect(emitMetricBestEffort({ metric: "unknown.metric", value: 1 })).toBeNull();
  });

  it("validates the canonical metrics catalog", () => {
    expect(validateMetricCatalog(METRIC_CATALOG)).toEqual({ valid: true });
  });

  it("rejects catalog entries with invalid tag names", () => {
    expect(() =>
      validateMetricCatalog([
        {
          metric_name: "routing.test.count",
          type: "counter",
          description: "test",
          tags: ["Bad-Tag"],
          unit: "count",
        },
      ])
    ).toThrow("Metric 'routing.test.count' has invalid tag 'Bad-Tag'.");
  });

  it("keeps contact details out of emitted metrics", () => {
    const emitted = emitMetric({
      metric: "system.error.count",
      value: 1,
      correlation_id: "corr_metrics_1",
      tags: {
        component: "unit_test",
        email: "alex@example.com",
        contact: "+14155551212",
        message_text: "hello team",
        phase: "dispatch",
      },
    });

    const serialized = JSON.stringify(emitted);
    expect(serialized).not.toContain("alex@example.com");
    expect(serialized).not.toContain("4155551212");
    expect(serialized).not.toContain("hello team");
    expect(emitted.tags).toEqual({ component: "unit_test", phase: "dispatch" });
    expect(emitted.correlation_id).toBe("corr_metrics_1");
  });

  it("rounds counter values and buffers them in memory", () => {
    emitMetric({ metric: "routing.broadcast.recipients", value: 2.6, tags: { component: "contact_router" } });

    const [buffered] = getInMemoryMetrics();
    expect(buffered?.metric).toBe("routing.broadcast.recipients");
    expect(buffered?.type).toBe("histogram");
    expect(buffered?.value).toBe(3);
  });

  it("drops tags the catalog does not declare", () => {
    const emitted = emitMetric({
      metric: "routing.broadcast.count",
      value: 1,
      tags: { component: "contact_router", outcome: "delivered", chat_id: 42, phase: "" },
    });

    expect(emitted.tags).toEqual({ component: "contact_router", outcome: "delivered" });
  });

  it("emits latency histogram metrics with millisecond values", () => {
    const startedAt = nowMetricMs();
    const elapsed = elapsedMetricMs(startedAt);

    const emitted = emitMetric({
      metric: "system.request.latency",
      value: elapsed,
      tags: {
        component: "unit_test",
        operation: "latency_probe",
        outcome: "welcome",
      },
    });

    expect(emitted.metric).toBe("system.request.latency");
    expect(emitted.type).toBe("histogram");
    expect(emitted.unit).toBe("ms");
    expect(emitted.value).toBeGreaterThanOrEqual(0);
  });

  it("derives counters from structured log events", () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);

    logEvent({
      event: "routing.reply_ignored",
      payload: { reason: "no_such_thread" },
    });

    const captured = getInMemoryMetrics();
    expect(captured).toHaveLength(1);
    expect(captured[0]?.metric).toBe("routing.reply.count");
    expect(captured[0]?.tags).toEqual({
      component: "contact_router",
      outcome: "ignored",
      reason: "no_such_thread",
    });
  });
});
