import type { GatewayChannelMap } from "../../mesh/gateway-channels.js";
import { BROADCAST_NODE_NUM, gatewayNumFromId } from "../../mesh/node-id.js";

export type MeshRoute = {
  gatewayId: string;
  destination: number;
};

export type DownlinkType = "sendtext" | "requestposition";

/** JSON downlink accepted by the broker's `json/mqtt` bridge. */
export type DownlinkPacket = {
  from: number;
  to: number;
  channel: number;
  type: DownlinkType;
  payload: string;
};

export type ResolvedRoute = {
  gatewayNum: number;
  destination: number;
  channel: number;
};

export function resolveRoute(
  route: { gatewayId: string; destination: number | "broadcast" },
  gateways: GatewayChannelMap,
): ResolvedRoute | null {
  const gatewayNum = gatewayNumFromId(route.gatewayId);
  if (gatewayNum === undefined) {
    return null;
  }
  return {
    gatewayNum,
    destination: route.destination === "broadcast" ? BROADCAST_NODE_NUM : route.destination,
    channel: gateways.channelFor(route.gatewayId),
  };
}

export function buildDownlink(
  route: ResolvedRoute,
  type: DownlinkType,
  payload: string,
): DownlinkPacket {
  return {
    from: route.gatewayNum,
    to: route.destination,
    channel: route.channel,
    type,
    payload,
  };
}
