import type {
  ChatId,
  MessageId,
  MessageTransport,
  UserId,
} from "../../../messaging/src/types.ts";
import { emitMetricBestEffort } from "../observability/metrics.ts";
import { describeError, logEvent, type StructuredLogEventInput } from "../observability/logger.ts";
import type { OperatorRegistry } from "../operators/operator-registry.ts";
import type { ContactThread, ThreadTable } from "../threads/thread-table.ts";
import {
  DEFAULT_TEAM_LABEL,
  NO_OPERATORS_NOTICE,
  renderOperatorReply,
} from "./messages.ts";

export type BroadcastOrigin = {
  userId: UserId;
  chatId: ChatId;
  messageId: MessageId;
  displayName: string;
};

export type BroadcastOutcome =
  | { kind: "no_operators" }
  | { kind: "delivered"; count: number; failed: number };

export type OperatorReply = {
  operatorId: UserId;
  operatorChatId: ChatId;
  repliedToMessageId: MessageId;
  replyText: string;
};

export type RouteOutcome =
  | { kind: "not_operator" }
  | { kind: "no_such_thread" }
  | { kind: "delivered"; thread: ContactThread }
  | { kind: "delivery_failed"; thread: ContactThread };

export type RouterLogger = (input: StructuredLogEventInput) => unknown;

export type ContactRouterDeps = {
  transport: MessageTransport;
  operators: OperatorRegistry;
  threads: ThreadTable;
  teamLabel?: string;
  logger?: RouterLogger;
};

type OperatorSendResult = { ok: true } | { ok: false };

/**
 * Fans visitor messages out to every registered operator and routes operator
 * replies back to the one visitor whose message they answer.
 */
export class ContactRouter {
  private readonly transport: MessageTransport;
  private readonly operators: OperatorRegistry;
  private readonly threads: ThreadTable;
  private readonly teamLabel: string;
  private readonly log: RouterLogger;

  constructor(deps: ContactRouterDeps) {
    this.transport = deps.transport;
    this.operators = deps.operators;
    this.threads = deps.threads;
    this.teamLabel = deps.teamLabel?.trim() || DEFAULT_TEAM_LABEL;
    this.log = deps.logger ?? logEvent;
  }

  async broadcast(
    origin: BroadcastOrigin,
    summaryText: string,
    ackText: string,
  ): Promise<BroadcastOutcome> {
    await this.sendToVisitor(origin, ackText);

    // Operators registering after this point do not receive this broadcast.
    const operatorIds = this.operators.snapshot();
    if (operatorIds.length === 0) {
      await this.sendToVisitor(origin, NO_OPERATORS_NOTICE);
      this.log({
        event: "routing.broadcast_completed",
        user_id: origin.userId,
        payload: {
          outcome: "no_operators",
          operator_count: 0,
        },
      });
      return { kind: "no_operators" };
    }

    const thread: ContactThread = {
      visitorChatId: origin.chatId,
      visitorMessageId: origin.messageId,
      visitorDisplayName: origin.displayName,
      forwardedText: summaryText,
    };

    const results = await Promise.all(
      operatorIds.map((operatorId) => this.sendToOperator(operatorId, summaryText, thread)),
    );
    const count = results.filter((result) => result.ok).length;
    const failed = results.length - count;

    this.log({
      event: "routing.broadcast_completed",
      user_id: origin.userId,
      level: failed > 0 ? "warn" : "info",
      payload: {
        outcome: "delivered",
        operator_count: operatorIds.length,
        delivered_count: count,
        failed_count: failed,
      },
    });
    emitMetricBestEffort({
      metric: "routing.broadcast.recipients",
      value: count,
      tags: { component: "contact_router" },
    });

    return { kind: "delivered", count, failed };
  }

  async resolve(reply: OperatorReply): Promise<RouteOutcome> {
    if (!this.operators.isOperator(reply.operatorId)) {
      this.log({
        event: "routing.reply_ignored",
        user_id: reply.operatorId,
        level: "debug",
        payload: { reason: "not_operator" },
      });
      return { kind: "not_operator" };
    }

    const thread = this.threads.resolve(reply.operatorChatId, reply.repliedToMessageId);
    if (!thread) {
      this.log({
        event: "routing.reply_ignored",
        user_id: reply.operatorId,
        level: "debug",
        payload: { reason: "no_such_thread" },
      });
      return { kind: "no_such_thread" };
    }

    try {
      await this.transport.sendText(
        thread.visitorChatId,
        renderOperatorReply({ teamLabel: this.teamLabel, replyText: reply.replyText }),
      );
    } catch (error) {
      this.log({
        event: "routing.reply_failed",
        user_id: reply.operatorId,
        level: "warn",
        payload: {
          operator_id: reply.operatorId,
          visitor_chat_id: thread.visitorChatId,
          ...describeError(error),
        },
      });
      return { kind: "delivery_failed", thread };
    }

    this.log({
      event: "routing.reply_delivered",
      user_id: reply.operatorId,
      payload: {
        operator_id: reply.operatorId,
        visitor_chat_id: thread.visitorChatId,
      },
    });
    return { kind: "delivered", thread };
  }

  private async sendToOperator(
    operatorId: UserId,
    summaryText: string,
    thread: ContactThread,
  ): Promise<OperatorSendResult> {
    // Operators talk to the bot in private chats, where chat id equals user id.
    const operatorChatId: ChatId = operatorId;
    try {
      const messageId = await this.transport.sendText(operatorChatId, summaryText);
      this.threads.record(operatorChatId, messageId, thread);
      return { ok: true };
    } catch (error) {
      this.log({
        event: "routing.operator_send_failed",
        user_id: operatorId,
        level: "warn",
        payload: {
          operator_id: operatorId,
          ...describeError(error),
        },
      });
      return { ok: false };
    }
  }

  private async sendToVisitor(origin: BroadcastOrigin, text: string): Promise<void> {
    try {
      await this.transport.sendText(origin.chatId, text);
    } catch (error) {
      this.log({
        event: "routing.ack_send_failed",
        user_id: origin.userId,
        level: "warn",
        payload: describeError(error),
      });
    }
  }
}
