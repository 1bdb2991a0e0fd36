import {
  METRIC_CATALOG_BY_NAME,
  type MetricDefinition,
  type MetricName,
  type MetricType,
} from "./metrics-catalog.ts";

export type MetricTags = Record<string, string | number | boolean | null | undefined>;

export type EmitMetricInput = {
  metric: MetricName | string;
  value: number;
  tags?: MetricTags;
  correlation_id?: string | null;
};

export type EmittedMetric = {
  ts: string;
  metric: MetricName;
  type: MetricType;
  unit: string;
  value: number;
  correlation_id: string | null;
  tags: Record<string, string>;
};

const MAX_BUFFERED_METRICS = 2_000;
const MAX_TAG_VALUE_LENGTH = 64;

// Process-local ring of recent metrics; there is no exporter.
const buffer: EmittedMetric[] = [];

export function getInMemoryMetrics(limit?: number): EmittedMetric[] {
  if (!limit || limit <= 0) {
    return [...buffer];
  }
  return buffer.slice(-limit);
}

export function clearInMemoryMetrics(): void {
  buffer.length = 0;
}

/**
 * Records one metric from the catalog. Tags the catalog does not declare
 * for that metric are dropped, so chat ids and message text never become
 * tag values.
 */
export function emitMetric(input: EmitMetricInput): EmittedMetric {
  const definition = METRIC_CATALOG_BY_NAME[input.metric.trim()];
  if (!definition) {
    throw new Error(`Unknown metric '${input.metric}'.`);
  }
  if (!Number.isFinite(input.value)) {
    throw new Error("Metric value must be a finite number.");
  }

  const metric: EmittedMetric = {
    ts: new Date().toISOString(),
    metric: definition.metric_name,
    type: definition.type,
    unit: definition.unit,
    value: definition.unit === "count" ? Math.round(input.value) : roundToThree(input.value),
    correlation_id: input.correlation_id?.trim() || null,
    tags: declaredTags(definition, input.tags),
  };

  buffer.push(metric);
  if (buffer.length > MAX_BUFFERED_METRICS) {
    buffer.splice(0, buffer.length - MAX_BUFFERED_METRICS);
  }
  return metric;
}

export function emitMetricBestEffort(input: EmitMetricInput): EmittedMetric | null {
  try {
    return emitMetric(input);
  } catch {
    return null;
  }
}

export function nowMetricMs(): number {
  return performance.now();
}

export function elapsedMetricMs(startedAtMs: number): number {
  const elapsed = nowMetricMs() - startedAtMs;
  if (!Number.isFinite(elapsed) || elapsed < 0) {
    return 0;
  }
  return roundToThree(elapsed);
}

function declaredTags(definition: MetricDefinition, tags: MetricTags = {}): Record<string, string> {
  const allowed: readonly string[] = definition.tags;
  const output: Record<string, string> = {};
  for (const [key, rawValue] of Object.entries(tags)) {
    if (!allowed.includes(key)) {
      continue;
    }
    const value = tagValue(rawValue);
    if (value) {
      output[key] = value.slice(0, MAX_TAG_VALUE_LENGTH);
    }
  }
  return output;
}

function tagValue(value: MetricTags[string]): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    return null;
  }
  const normalized = String(value).trim();
  return normalized || null;
}

function roundToThree(value: number): number {
  return Math.round(value * 1_000) / 1_000;
}
