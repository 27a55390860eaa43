import type { Dispatcher } from "../auto-reply/dispatch.js";
import type { GatewayChannelMap } from "./gateway-channels.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { decodePacket, extractChannelIndex, extractSenderId, normalizePacket } from "./normalize.js";
import { extractPosition } from "./position.js";

export type MeshRouter = {
  /** Never rejects. */
  handleMessage: (topic: string, payload: Uint8Array | string) => Promise<void>;
};

export type MeshRouterOptions = {
  dispatcher: Pick<Dispatcher, "dispatch" | "handlePosition">;
  gateways: GatewayChannelMap;
  log?: SubsystemLogger;
};

export function createMeshRouter(opts: MeshRouterOptions): MeshRouter {
  const log = opts.log ?? createSubsystemLogger("mesh/router");

  const route = async (topic: string, payload: Uint8Array | string) => {
    const decoded = decodePacket(payload, topic);
    if (!decoded) {
      log.debug("ignoring non-packet payload", { topic });
      return;
    }
    const { packet, gatewayId } = decoded;

    const channel = extractChannelIndex(packet);
    if (channel !== undefined && opts.gateways.learn(gatewayId, channel)) {
      log.info(`gateway ${gatewayId} now on channel ${channel}`);
    }

    const senderId = extractSenderId(packet);
    const coords = extractPosition(packet);
    if (coords && senderId !== undefined) {
      await opts.dispatcher.handlePosition(senderId, gatewayId, coords);
    }

    const message = normalizePacket(decoded);
    if (message) {
      await opts.dispatcher.dispatch(message);
    }
  };

  return {
    handleMessage: async (topic, payload) => {
      try {
        await route(topic, payload);
      } catch (err) {
        log.error("failed to route packet", { topic, error: formatErrorMessage(err) });
      }
    },
  };
}
