export type EventCategory =
  | "conversation"
  | "routing"
  | "operators"
  | "transport"
  | "system";

export type EventCatalogEntry = {
  event_name: string;
  category: EventCategory;
  description: string;
  required_fields: readonly string[];
};

export const EVENT_CATALOG = [
  {
    event_name: "conversation.form_started",
    category: "conversation",
    description: "A visitor opened a collaboration form session.",
    required_fields: ["slot"],
  },
  {
    event_name: "conversation.form_start_rejected",
    category: "conversation",
    description: "A visitor tried to open a second form session while one is open.",
    required_fields: ["reason"],
  },
  {
    event_name: "conversation.form_advanced",
    category: "conversation",
    description: "A form slot was filled and the next prompt was issued.",
    required_fields: ["filled_slot", "next_slot"],
  },
  {
    event_name: "conversation.form_input_rejected",
    category: "conversation",
    description: "A form answer was empty or not text; the current prompt was re-issued.",
    required_fields: ["slot", "reason"],
  },
  {
    event_name: "conversation.form_completed",
    category: "conversation",
    description: "The final slot was filled and the record was handed to the router.",
    required_fields: ["broadcast_outcome"],
  },
  {
    event_name: "conversation.dispatch_decision",
    category: "conversation",
    description: "The inbound dispatcher picked a handler for an event.",
    required_fields: ["route"],
  },
  {
    event_name: "routing.broadcast_completed",
    category: "routing",
    description: "A visitor message was fanned out to the operator snapshot.",
    required_fields: ["outcome", "operator_count"],
  },
  {
    event_name: "routing.operator_send_failed",
    category: "routing",
    description: "Delivering a broadcast copy to one operator failed.",
    required_fields: ["operator_id", "error_name"],
  },
  {
    event_name: "routing.ack_send_failed",
    category: "routing",
    description: "Acknowledging a visitor failed; the broadcast continued.",
    required_fields: ["error_name"],
  },
  {
    event_name: "routing.reply_delivered",
    category: "routing",
    description: "An operator reply was routed back to the originating visitor.",
    required_fields: ["operator_id", "visitor_chat_id"],
  },
  {
    event_name: "routing.reply_failed",
    category: "routing",
    description: "An operator reply matched a thread but could not be delivered.",
    required_fields: ["operator_id", "visitor_chat_id", "error_name"],
  },
  {
    event_name: "routing.reply_ignored",
    category: "routing",
    description: "A reply did not resolve to a thread or came from a non-operator.",
    required_fields: ["reason"],
  },
  {
    event_name: "routing.thread_evicted",
    category: "routing",
    description: "The thread table dropped its least recently used entry.",
    required_fields: ["capacity"],
  },
  {
    event_name: "operators.registered",
    category: "operators",
    description: "A user registered as an operator.",
    required_fields: ["already_registered"],
  },
  {
    event_name: "operators.registration_rejected",
    category: "operators",
    description: "An operator registration attempt supplied the wrong secret.",
    required_fields: ["reason"],
  },
  {
    event_name: "transport.send_failed",
    category: "transport",
    description: "An outbound send that is not part of a broadcast failed.",
    required_fields: ["purpose", "error_name"],
  },
  {
    event_name: "transport.poll_failed",
    category: "transport",
    description: "Fetching inbound updates failed; the poller backs off.",
    required_fields: ["error_name", "retry_in_ms"],
  },
  {
    event_name: "system.startup",
    category: "system",
    description: "The process finished wiring and started polling.",
    required_fields: ["thread_table_capacity"],
  },
  {
    event_name: "system.startup_failed",
    category: "system",
    description: "Configuration or wiring failed before polling started.",
    required_fields: ["error_name"],
  },
  {
    event_name: "system.shutdown",
    category: "system",
    description: "The poller stopped and in-flight dispatches drained.",
    required_fields: ["signal"],
  },
  {
    event_name: "system.unhandled_error",
    category: "system",
    description: "An unexpected error reached a top-level catch.",
    required_fields: ["phase", "error_name"],
  },
] as const satisfies readonly EventCatalogEntry[];

export type CanonicalEventName = (typeof EVENT_CATALOG)[number]["event_name"];

export const EVENT_CATALOG_BY_NAME: Readonly<Record<string, EventCatalogEntry | undefined>> =
  Object.freeze(
    EVENT_CATALOG.reduce((accumulator, entry) => {
      accumulator[entry.event_name] = entry;
      return accumulator;
    }, {} as Record<string, EventCatalogEntry | undefined>),
  );
