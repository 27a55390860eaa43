import type { GatewayChannelMap } from "../../mesh/gateway-channels.js";
import { chunkText } from "../../auto-reply/chunk.js";
import { createSubsystemLogger, type SubsystemLogger } from "../../logging/subsystem.js";
import { formatErrorMessage } from "../errors.js";
import {
  buildDownlink,
  resolveRoute,
  type DownlinkPacket,
  type MeshRoute,
  type ResolvedRoute,
} from "./route.js";

export type MeshPublisher = {
  publish: (topic: string, payload: string) => void | Promise<void>;
};

export type SendResult = {
  chunkCount: number;
  /** Settles once the last chunk was handed to the publisher. Never rejects. */
  completion: Promise<void>;
};

export type OutboundSender = {
  sendChunked: (route: MeshRoute, text: string) => SendResult;
  /** Several logical messages to one destination, each chunked, one paced stream. */
  sendSeries: (route: MeshRoute, texts: string[]) => SendResult;
  sendBroadcast: (gatewayId: string, text: string) => boolean;
  requestPosition: (route: MeshRoute) => boolean;
  pendingChunks: () => number;
  dispose: () => void;
};

export type OutboundSenderOptions = {
  publisher: MeshPublisher;
  gateways: GatewayChannelMap;
  topic: string;
  maxBytes: number;
  chunkDelayMs: number;
  log?: SubsystemLogger;
};

type QueuedChunk = {
  packet: DownlinkPacket;
  onSent?: () => void;
};

type Lane = {
  queue: QueuedChunk[];
  timer: ReturnType<typeof setTimeout> | null;
};

const SETTLED: Promise<void> = Promise.resolve();

/**
 * Paced downlink delivery. Chunks for one destination go out in order with
 * `chunkDelayMs` between consecutive sends; the first chunk to an idle
 * destination is published synchronously. Destinations never wait on each
 * other.
 */
export function createOutboundSender(opts: OutboundSenderOptions): OutboundSender {
  const log = opts.log ?? createSubsystemLogger("outbound");
  const lanes = new Map<string, Lane>();

  const publishPacket = (packet: DownlinkPacket): Promise<void> => {
    const payload = JSON.stringify(packet);
    const onError = (err: unknown) => {
      log.warn("downlink publish failed", { to: packet.to, error: formatErrorMessage(err) });
    };
    try {
      return Promise.resolve(opts.publisher.publish(opts.topic, payload)).then(() => {
        log.debug("published downlink", { topic: opts.topic, type: packet.type, to: packet.to });
      }, onError);
    } catch (err) {
      onError(err);
      return SETTLED;
    }
  };

  const pump = (key: string, lane: Lane) => {
    const next = lane.queue.shift();
    if (!next) {
      lanes.delete(key);
      return;
    }
    const published = publishPacket(next.packet);
    if (next.onSent) {
      void published.then(next.onSent);
    }
    // Keep the lane busy for one delay even after the last chunk, so the next
    // reply to this node is spaced from this one.
    lane.timer = setTimeout(() => {
      lane.timer = null;
      pump(key, lane);
    }, opts.chunkDelayMs);
  };

  const enqueue = (route: ResolvedRoute, gatewayId: string, chunks: string[]): SendResult => {
    if (chunks.length === 0) {
      return { chunkCount: 0, completion: SETTLED };
    }
    const key = `${gatewayId}:${route.destination}`;
    const existing = lanes.get(key);
    const lane: Lane = existing ?? { queue: [], timer: null };
    if (!existing) {
      lanes.set(key, lane);
    }
    let resolveCompletion: () => void = () => undefined;
    const completion = new Promise<void>((resolve) => {
      resolveCompletion = resolve;
    });
    chunks.forEach((chunk, index) => {
      lane.queue.push({
        packet: buildDownlink(route, "sendtext", chunk),
        onSent: index === chunks.length - 1 ? resolveCompletion : undefined,
      });
    });
    if (!existing) {
      pump(key, lane);
    }
    return { chunkCount: chunks.length, completion };
  };

  const resolveOrWarn = (route: { gatewayId: string; destination: number | "broadcast" }) => {
    const resolved = resolveRoute(route, opts.gateways);
    if (!resolved) {
      log.warn("dropping send: gateway id is not routable", {
        gatewayId: route.gatewayId || "<none>",
        destination: route.destination,
      });
    }
    return resolved;
  };

  const sendSeries = (route: MeshRoute, texts: string[]): SendResult => {
    const resolved = resolveOrWarn(route);
    if (!resolved) {
      return { chunkCount: 0, completion: SETTLED };
    }
    const chunks = texts.flatMap((text) => chunkText(text, opts.maxBytes));
    return enqueue(resolved, route.gatewayId, chunks);
  };

  return {
    sendChunked: (route, text) => sendSeries(route, [text]),
    sendSeries,
    sendBroadcast: (gatewayId, text) => {
      const resolved = resolveOrWarn({ gatewayId, destination: "broadcast" });
      const payload = text.trim();
      if (!resolved || !payload) {
        return false;
      }
      void publishPacket(buildDownlink(resolved, "sendtext", payload));
      return true;
    },
    requestPosition: (route) => {
      const resolved = resolveOrWarn(route);
      if (!resolved) {
        return false;
      }
      void publishPacket(buildDownlink(resolved, "requestposition", ""));
      return true;
    },
    pendingChunks: () => {
      let count = 0;
      for (const lane of lanes.values()) {
        count += lane.queue.length;
      }
      return count;
    },
    dispose: () => {
      for (const lane of lanes.values()) {
        if (lane.timer) {
          clearTimeout(lane.timer);
        }
        for (const queued of lane.queue) {
          queued.onSent?.();
        }
      }
      lanes.clear();
    },
  };
}
