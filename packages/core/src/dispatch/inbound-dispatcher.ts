import type { ChatId, InboundEvent, MessageTransport, UserId } from "../../../messaging/src/types.ts";
import {
  operatorAlreadyRegistered,
  operatorRegistered,
  operatorRegisterUsage,
  operatorReplyFailed,
  operatorSecretMismatch,
  renderOperatorReplyDelivered,
} from "../../../messaging/src/templates/operators.ts";
import {
  renderApplyMessage,
  systemAlreadyOpenFormMessage,
  systemWelcomeMessage,
} from "../../../messaging/src/templates/system.ts";
import { KeyedSerializer } from "../concurrency/keyed-serializer.ts";
import type { AdvanceFormResult, FormSessionEngine } from "../forms/form-session-engine.ts";
import { elapsedMetricMs, emitMetricBestEffort, nowMetricMs } from "../observability/metrics.ts";
import { describeError, logEvent, type StructuredLogEventInput } from "../observability/logger.ts";
import { startSentrySpan, withSentryContext } from "../observability/sentry.ts";
import type { OperatorRegistry } from "../operators/operator-registry.ts";
import type { ContactRouter } from "../routing/contact-router.ts";
import {
  CONTACT_ACKNOWLEDGEMENT,
  DEFAULT_TEAM_LABEL,
  renderContactSummary,
} from "../routing/messages.ts";

export type DispatchRoute =
  | "welcome"
  | "apply"
  | "form_started"
  | "form_already_open"
  | "form_advanced"
  | "form_completed"
  | "form_invalid_input"
  | "register_usage"
  | "registered"
  | "registration_rejected"
  | "reply_delivered"
  | "reply_failed"
  | "contact_broadcast"
  | "ignored"
  | "failed";

export type DispatchOutcome = {
  route: DispatchRoute;
};

export type ParsedCommand = {
  name: string;
  args: string;
};

export type DispatcherLogger = (input: StructuredLogEventInput) => unknown;

export type InboundDispatcherDeps = {
  transport: MessageTransport;
  operators: OperatorRegistry;
  router: Pick<ContactRouter, "broadcast" | "resolve">;
  engine: Pick<FormSessionEngine, "start" | "advance">;
  teamLabel?: string;
  applicationFormUrl: string;
  logger?: DispatcherLogger;
  serializer?: KeyedSerializer<UserId>;
};

const COMMAND_PATTERN = /^\/([a-z0-9_]+)(?:@[a-z0-9_]+)?(?:\s+([\s\S]*))?$/i;

export function parseCommand(text: string | null): ParsedCommand | null {
  if (text === null) {
    return null;
  }
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  return {
    name: (match[1] ?? "").toLowerCase(),
    args: (match[2] ?? "").trim(),
  };
}

/**
 * Entry point for one inbound event: commands first, then operator replies,
 * then open form sessions, then free-text contact messages. Events from one
 * sender are handled in arrival order.
 */
export class InboundDispatcher {
  private readonly transport: MessageTransport;
  private readonly operators: OperatorRegistry;
  private readonly router: Pick<ContactRouter, "broadcast" | "resolve">;
  private readonly engine: Pick<FormSessionEngine, "start" | "advance">;
  private readonly teamLabel: string;
  private readonly applicationFormUrl: string;
  private readonly log: DispatcherLogger;
  private readonly serializer: KeyedSerializer<UserId>;

  constructor(deps: InboundDispatcherDeps) {
    this.transport = deps.transport;
    this.operators = deps.operators;
    this.router = deps.router;
    this.engine = deps.engine;
    this.teamLabel = deps.teamLabel?.trim() || DEFAULT_TEAM_LABEL;
    this.applicationFormUrl = deps.applicationFormUrl;
    this.log = deps.logger ?? logEvent;
    this.serializer = deps.serializer ?? new KeyedSerializer<UserId>();
  }

  async dispatch(event: InboundEvent): Promise<DispatchOutcome> {
    const startedAt = nowMetricMs();
    let outcome: DispatchOutcome;

    try {
      outcome = await withSentryContext(
        { user_id: String(event.senderUserId), tags: { chat_id: event.chatId } },
        () =>
          startSentrySpan(
            {
              name: "inbound.dispatch",
              op: "dispatch",
              attributes: { update_id: event.updateId },
            },
            () => this.serializer.run(event.senderUserId, () => this.route(event)),
          ),
      );
    } catch (error) {
      this.log({
        event: "system.unhandled_error",
        user_id: event.senderUserId,
        level: "error",
        payload: {
          phase: "dispatch",
          update_id: event.updateId,
          ...describeError(error),
        },
      });
      outcome = { route: "failed" };
    }

    this.log({
      event: "conversation.dispatch_decision",
      user_id: event.senderUserId,
      level: "debug",
      payload: {
        route: outcome.route,
        update_id: event.updateId,
      },
    });
    emitMetricBestEffort({
      metric: "system.request.latency",
      value: elapsedMetricMs(startedAt),
      tags: {
        component: "inbound_dispatcher",
        operation: "dispatch",
        outcome: outcome.route,
      },
    });
    return outcome;
  }

  private async route(event: InboundEvent): Promise<DispatchOutcome> {
    const command = parseCommand(event.text);
    if (command) {
      return this.handleCommand(event, command);
    }

    const replyText = event.text?.trim() ?? "";
    if (event.repliedToMessageId !== null && replyText) {
      const routed = await this.router.resolve({
        operatorId: event.senderUserId,
        operatorChatId: event.repliedToChatId ?? event.chatId,
        repliedToMessageId: event.repliedToMessageId,
        replyText,
      });

      if (routed.kind === "delivered") {
        await this.reply(
          event.chatId,
          renderOperatorReplyDelivered({ visitorDisplayName: routed.thread.visitorDisplayName }),
          "operator_reply_confirmation",
        );
        return { route: "reply_delivered" };
      }
      if (routed.kind === "delivery_failed") {
        await this.reply(event.chatId, operatorReplyFailed(), "operator_reply_failed");
        return { route: "reply_failed" };
      }
    }

    const advanced = await this.advanceForm(event);
    if (advanced) {
      return advanced;
    }

    if (!replyText || this.operators.isOperator(event.senderUserId)) {
      return { route: "ignored" };
    }

    await this.router.broadcast(
      {
        userId: event.senderUserId,
        chatId: event.chatId,
        messageId: event.messageId,
        displayName: event.senderDisplayName,
      },
      renderContactSummary({
        displayName: event.senderDisplayName,
        userId: event.senderUserId,
        chatId: event.chatId,
        text: replyText,
      }),
      CONTACT_ACKNOWLEDGEMENT,
    );
    return { route: "contact_broadcast" };
  }

  private async handleCommand(event: InboundEvent, command: ParsedCommand): Promise<DispatchOutcome> {
    switch (command.name) {
      case "start":
      case "help":
        await this.reply(event.chatId, systemWelcomeMessage({ teamLabel: this.teamLabel }), "welcome");
        return { route: "welcome" };

      case "apply":
        await this.reply(
          event.chatId,
          renderApplyMessage({
            teamLabel: this.teamLabel,
            applicationFormUrl: this.applicationFormUrl,
          }),
          "apply",
        );
        return { route: "apply" };

      case "collaborate": {
        const started = await this.engine.start({
          visitorId: event.senderUserId,
          chatId: event.chatId,
          displayName: event.senderDisplayName,
        });
        if (started.ok) {
          return { route: "form_started" };
        }
        await this.reply(event.chatId, systemAlreadyOpenFormMessage(), "form_already_open");
        return { route: "form_already_open" };
      }

      case "register":
        return this.handleRegister(event, command.args);

      default:
        // Unknown commands still count as answers while a form is open.
        return (await this.advanceForm(event)) ?? { route: "ignored" };
    }
  }

  private async advanceForm(event: InboundEvent): Promise<DispatchOutcome | null> {
    const advanced = await this.engine.advance({
      visitorId: event.senderUserId,
      text: event.text,
      messageId: event.messageId,
      displayName: event.senderDisplayName,
    });
    if (!advanced.ok && advanced.error === "no_session") {
      return null;
    }
    return { route: routeForAdvance(advanced) };
  }

  private async handleRegister(event: InboundEvent, suppliedSecret: string): Promise<DispatchOutcome> {
    if (!suppliedSecret) {
      await this.reply(event.chatId, operatorRegisterUsage(), "register_usage");
      return { route: "register_usage" };
    }

    const result = this.operators.register(event.senderUserId, suppliedSecret);
    if (!result.ok) {
      this.log({
        event: "operators.registration_rejected",
        user_id: event.senderUserId,
        level: "warn",
        payload: { reason: result.error },
      });
      await this.reply(event.chatId, operatorSecretMismatch(), "register_rejected");
      return { route: "registration_rejected" };
    }

    this.log({
      event: "operators.registered",
      user_id: event.senderUserId,
      payload: {
        already_registered: result.alreadyRegistered,
        operator_count: this.operators.size,
      },
    });
    await this.reply(
      event.chatId,
      result.alreadyRegistered ? operatorAlreadyRegistered() : operatorRegistered(),
      "registered",
    );
    return { route: "registered" };
  }

  private async reply(chatId: ChatId, text: string, purpose: string): Promise<void> {
    try {
      await this.transport.sendText(chatId, text);
    } catch (error) {
      this.log({
        event: "transport.send_failed",
        level: "warn",
        payload: {
          purpose,
          chat_id: chatId,
          ...describeError(error),
        },
      });
    }
  }
}

function routeForAdvance(result: AdvanceFormResult): DispatchRoute {
  if (result.ok) {
    return result.value.kind === "completed" ? "form_completed" : "form_advanced";
  }
  return result.error === "invalid_input" ? "form_invalid_input" : "ignored";
}
