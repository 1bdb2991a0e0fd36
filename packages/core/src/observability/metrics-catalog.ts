export type MetricType = "counter" | "histogram" | "gauge";

export type MetricCatalogEntry = {
  metric_name: string;
  type: MetricType;
  description: string;
  tags: readonly string[];
  unit: string;
};

export const METRIC_CATALOG = [
  {
    metric_name: "system.error.count",
    type: "counter",
    description: "Unhandled runtime errors across the dispatcher, poller, and entry point.",
    tags: ["component", "phase", "error_name"],
    unit: "count",
  },
  {
    metric_name: "system.request.latency",
    type: "histogram",
    description: "Latency of one inbound dispatch from normalization to outcome.",
    tags: ["component", "operation", "outcome"],
    unit: "ms",
  },
  {
    metric_name: "conversation.form.started",
    type: "counter",
    description: "Collaboration form sessions opened by visitors.",
    tags: ["component"],
    unit: "count",
  },
  {
    metric_name: "conversation.form.input_rejected",
    type: "counter",
    description: "Form answers rejected as empty or non-text.",
    tags: ["component", "slot", "reason"],
    unit: "count",
  },
  {
    metric_name: "conversation.form.completed",
    type: "counter",
    description: "Form sessions that filled every slot and were broadcast.",
    tags: ["component", "broadcast_outcome"],
    unit: "count",
  },
  {
    metric_name: "routing.broadcast.count",
    type: "counter",
    description: "Broadcast fan-outs by outcome.",
    tags: ["component", "outcome"],
    unit: "count",
  },
  {
    metric_name: "routing.broadcast.recipients",
    type: "histogram",
    description: "Operators successfully notified per broadcast.",
    tags: ["component"],
    unit: "count",
  },
  {
    metric_name: "routing.operator_send.failure.count",
    type: "counter",
    description: "Per-operator broadcast sends that failed.",
    tags: ["component", "error_name"],
    unit: "count",
  },
  {
    metric_name: "routing.reply.count",
    type: "counter",
    description: "Operator replies by routing outcome.",
    tags: ["component", "outcome", "reason"],
    unit: "count",
  },
  {
    metric_name: "routing.thread.evicted",
    type: "counter",
    description: "Thread table entries evicted to stay within capacity.",
    tags: ["component"],
    unit: "count",
  },
  {
    metric_name: "transport.poll.failure.count",
    type: "counter",
    description: "Failed update polls against the chat transport.",
    tags: ["component", "error_name"],
    unit: "count",
  },
] as const satisfies readonly MetricCatalogEntry[];

export type MetricName = (typeof METRIC_CATALOG)[number]["metric_name"];

export type MetricDefinition = (typeof METRIC_CATALOG)[number];

export const METRIC_CATALOG_BY_NAME: Readonly<Record<string, MetricDefinition | undefined>> =
  Object.freeze(
    METRIC_CATALOG.reduce((accumulator, entry) => {
      accumulator[entry.metric_name] = entry;
      return accumulator;
    }, {} as Record<string, MetricDefinition | undefined>),
  );

const METRIC_NAME_PATTERN = /^[a-z][a-z0-9_]*(\.[a-z0-9_]+)+$/;
const TAG_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

export function validateMetricCatalog(
  entries: readonly MetricCatalogEntry[] = METRIC_CATALOG,
): { valid: true } {
  const seenNames = new Set<string>();
  for (const entry of entries) {
    if (!METRIC_NAME_PATTERN.test(entry.metric_name)) {
      throw new Error(`Invalid metric_name '${entry.metric_name}'.`);
    }
    if (seenNames.has(entry.metric_name)) {
      throw new Error(`Duplicate metric_name '${entry.metric_name}'.`);
    }
    seenNames.add(entry.metric_name);

    if (entry.description.trim().length === 0) {
      throw new Error(`Metric '${entry.metric_name}' requires a non-empty description.`);
    }
    if (entry.unit.trim().length === 0) {
      throw new Error(`Metric '${entry.metric_name}' requires a non-empty unit.`);
    }

    const seenTags = new Set<string>();
    for (const tag of entry.tags) {
      if (!TAG_NAME_PATTERN.test(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has invalid tag '${tag}'.`);
      }
      if (seenTags.has(tag)) {
        throw new Error(`Metric '${entry.metric_name}' has duplicate tag '${tag}'.`);
      }
      seenTags.add(tag);
    }
  }
  return { valid: true };
}

validateMetricCatalog(METRIC_CATALOG);
