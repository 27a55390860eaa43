import type { OutboundSender } from "../infra/outbound/deliver.js";
import type { GatewayChannelMap } from "../mesh/gateway-channels.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createIntervalTask, type IntervalTask } from "../infra/interval-task.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { redactEmailAddress } from "../logging/redact-email.js";
import { cleanReplyBody } from "./clean-body.js";
import type { EmailRecord, EmailService } from "./types.js";

export const DEFAULT_RELAY_INTERVAL_MS = 30_000;

export type ReplyRelayOptions = {
  email: Pick<EmailService, "getEmail" | "getPendingReplies" | "markReplyProcessed">;
  outbound: Pick<OutboundSender, "sendChunked">;
  gateways: GatewayChannelMap;
  fallbackGatewayId?: string;
  intervalMs?: number;
  log?: SubsystemLogger;
};

export type ReplyRelayTickResult = {
  relayed: number;
  deferred: number;
};

export function formatReplyNotification(reply: EmailRecord, cleanBody: string): string {
  return (
    `Email Reply Received\nFrom: ${reply.senderEmail}\nSubject: ${reply.subject}\n\n` +
    `${cleanBody}\n\nEmail ID: ${reply.id}`
  );
}

/**
 * Delivers inbound email replies to the mesh node that wrote the original
 * email. Replies that cannot be routed yet stay pending for the next tick.
 */
export function createReplyRelayPoller(opts: ReplyRelayOptions): IntervalTask & {
  relayPending: () => Promise<ReplyRelayTickResult>;
} {
  const log = opts.log ?? createSubsystemLogger("email/relay");

  const traceRequester = async (reply: EmailRecord): Promise<number | undefined> => {
    const visited = new Set<string>([reply.id]);
    let current = reply.replyToId;
    while (current && !visited.has(current)) {
      visited.add(current);
      const record = await opts.email.getEmail(current);
      if (!record) {
        return undefined;
      }
      if (record.direction === "outgoing" && record.senderNodeId > 0) {
        return record.senderNodeId;
      }
      current = record.replyToId;
    }
    return undefined;
  };

  const pickGateway = (nodeId: number): string | undefined =>
    opts.gateways.gatewayForNode(nodeId) ?? opts.gateways.firstGateway() ?? opts.fallbackGatewayId;

  const relayPending = async (): Promise<ReplyRelayTickResult> => {
    const pending = await opts.email.getPendingReplies();
    const result: ReplyRelayTickResult = { relayed: 0, deferred: 0 };
    for (const reply of pending) {
      try {
        const requester = await traceRequester(reply);
        if (requester === undefined) {
          log.warn(`reply ${reply.id} has no traceable requester`, { replyTo: reply.replyToId });
          result.deferred += 1;
          continue;
        }
        const gatewayId = pickGateway(requester);
        if (!gatewayId) {
          log.warn(`no gateway known for reply ${reply.id}; will retry`, { requester });
          result.deferred += 1;
          continue;
        }
        const text = formatReplyNotification(reply, cleanReplyBody(reply.body));
        const sent = opts.outbound.sendChunked({ gatewayId, destination: requester }, text);
        if (sent.chunkCount === 0) {
          result.deferred += 1;
          continue;
        }
        await opts.email.markReplyProcessed(reply.id, requester);
        result.relayed += 1;
        log.info(`relayed reply ${reply.id} to node ${requester}`, {
          from: redactEmailAddress(reply.senderEmail),
          chunks: sent.chunkCount,
        });
      } catch (err) {
        result.deferred += 1;
        log.error(`failed to relay reply ${reply.id}`, { error: formatErrorMessage(err) });
      }
    }
    return result;
  };

  const task = createIntervalTask({
    name: "reply relay",
    intervalMs: opts.intervalMs ?? DEFAULT_RELAY_INTERVAL_MS,
    run: async () => {
      await relayPending();
    },
    log,
  });
  return { ...task, relayPending };
}
