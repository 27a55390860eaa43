import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { decodeServiceEnvelope, type DecodedEnvelope } from "./envelope.js";
import { BROADCAST_NODE_NUM, gatewayIdFromTopic, parseNodeNum } from "./node-id.js";

const log = createSubsystemLogger("mesh/normalize");

export type NormalizedMessage = {
  senderId: number;
  destination: number | "broadcast";
  /** `!hex` of the relaying node; empty when the packet cannot be answered. */
  gatewayId: string;
  channelIndex?: number;
  text: string;
  isPublic: boolean;
};

export type DecodedPacket = {
  packet: Record<string, unknown>;
  gatewayId: string;
  encoding: "json" | "protobuf";
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function parseJsonObject(raw: Uint8Array | string): Record<string, unknown> | null {
  const text = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function fallbackGatewayId(value: unknown): string {
  return typeof value === "string" && value.startsWith("!") && value.length > 1 ? value : "";
}

/**
 * JSON first; the protobuf envelope is only tried when the bytes are not a
 * JSON object. The gateway comes from the topic, then from the envelope or
 * the uplink's `sender` field.
 */
export function decodePacket(raw: Uint8Array | string, topic: string): DecodedPacket | null {
  const json = parseJsonObject(raw);
  if (json) {
    return {
      packet: json,
      gatewayId: gatewayIdFromTopic(topic) || fallbackGatewayId(json.sender),
      encoding: "json",
    };
  }
  if (typeof raw === "string") {
    return null;
  }
  let envelope: DecodedEnvelope | null;
  try {
    envelope = decodeServiceEnvelope(raw);
  } catch (err) {
    log.warn("protobuf decoder unavailable", { error: formatErrorMessage(err) });
    return null;
  }
  if (!envelope) {
    log.debug("dropping undecodable packet", { topic, bytes: raw.byteLength });
    return null;
  }
  return {
    packet: envelope.packet,
    gatewayId: gatewayIdFromTopic(topic) || fallbackGatewayId(envelope.gatewayId),
    encoding: "protobuf",
  };
}

export function extractText(packet: Record<string, unknown>): string | undefined {
  const payload = packet.payload;
  if (isRecord(payload)) {
    if (typeof payload.text === "string") {
      return payload.text;
    }
    if (isRecord(payload.decoded) && typeof payload.decoded.text === "string") {
      return payload.decoded.text;
    }
  }
  return typeof packet.text === "string" ? packet.text : undefined;
}

export function extractChannelIndex(packet: Record<string, unknown>): number | undefined {
  if (typeof packet.channel === "number" && Number.isInteger(packet.channel)) {
    return packet.channel;
  }
  const payload = packet.payload;
  if (isRecord(payload) && typeof payload.channel === "number" && Number.isInteger(payload.channel)) {
    return payload.channel;
  }
  return undefined;
}

export function extractSenderId(packet: Record<string, unknown>): number | undefined {
  const sender = parseNodeNum(packet.from);
  return sender !== undefined && sender > 0 && sender !== BROADCAST_NODE_NUM ? sender : undefined;
}

/**
 * Public when `to` is absent, the broadcast address in either form, or a
 * shape we do not recognise as a node address.
 */
export function resolveDestination(to: unknown): number | "broadcast" {
  if (to === undefined || to === null) {
    return "broadcast";
  }
  if (typeof to === "string") {
    const lowered = to.trim().toLowerCase();
    if (lowered === "ffffffff" || lowered === "0xffffffff" || lowered === "!ffffffff") {
      return "broadcast";
    }
  }
  const node = parseNodeNum(to);
  if (node === undefined || node === BROADCAST_NODE_NUM) {
    return "broadcast";
  }
  return node;
}

export function normalizePacket(decoded: DecodedPacket): NormalizedMessage | null {
  const { packet, gatewayId } = decoded;
  const text = extractText(packet);
  if (text === undefined || !text.trim()) {
    return null;
  }
  const senderId = extractSenderId(packet);
  if (senderId === undefined) {
    return null;
  }
  const destination = resolveDestination(packet.to);
  return {
    senderId,
    destination,
    gatewayId,
    channelIndex: extractChannelIndex(packet),
    text,
    isPublic: destination === "broadcast",
  };
}

/** Never throws; null means "nothing to dispatch". */
export function normalize(raw: Uint8Array | string, topic: string): NormalizedMessage | null {
  const decoded = decodePacket(raw, topic);
  return decoded ? normalizePacket(decoded) : null;
}
