import protobuf from "protobufjs";
import { fileURLToPath } from "node:url";

const PROTO_PATH = fileURLToPath(new URL("../../proto/meshtastic.proto", import.meta.url));

export const PortNum = {
  TEXT_MESSAGE_APP: 1,
  POSITION_APP: 3,
} as const;

export type MeshSchema = {
  serviceEnvelope: protobuf.Type;
  position: protobuf.Type;
};

let cachedSchema: MeshSchema | null = null;

export function loadMeshSchema(): MeshSchema {
  if (!cachedSchema) {
    const root = protobuf.loadSync(PROTO_PATH);
    cachedSchema = {
      serviceEnvelope: root.lookupType("meshtastic.ServiceEnvelope"),
      position: root.lookupType("meshtastic.Position"),
    };
  }
  return cachedSchema;
}

export type DecodedEnvelope = {
  /** Same shape as a JSON uplink, so one normalizer handles both. */
  packet: Record<string, unknown>;
  gatewayId?: string;
  channelId?: string;
};

// Defaults on so channel 0 and a zero sender are visible rather than absent.
const PACKET_OBJECT_OPTIONS: protobuf.IConversionOptions = {
  longs: Number,
  enums: Number,
  defaults: true,
};

const POSITION_OBJECT_OPTIONS: protobuf.IConversionOptions = {
  longs: Number,
  enums: Number,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function decodePayload(
  portnum: unknown,
  bytes: unknown,
  schema: MeshSchema,
): Record<string, unknown> {
  if (!(bytes instanceof Uint8Array)) {
    return {};
  }
  if (portnum === PortNum.TEXT_MESSAGE_APP) {
    return { text: Buffer.from(bytes).toString("utf8") };
  }
  if (portnum === PortNum.POSITION_APP) {
    const position: Record<string, unknown> = schema.position.toObject(
      schema.position.decode(bytes),
      POSITION_OBJECT_OPTIONS,
    );
    return { latitudeI: position.latitudeI, longitudeI: position.longitudeI };
  }
  return {};
}

/**
 * Decodes a protobuf ServiceEnvelope. Returns null for bytes that are not an
 * envelope or carry an encrypted packet we cannot read.
 */
export function decodeServiceEnvelope(bytes: Uint8Array): DecodedEnvelope | null {
  const schema = loadMeshSchema();
  let envelope: Record<string, unknown>;
  try {
    envelope = schema.serviceEnvelope.toObject(
      schema.serviceEnvelope.decode(bytes),
      PACKET_OBJECT_OPTIONS,
    );
  } catch {
    return null;
  }
  const meshPacket = envelope.packet;
  if (!isRecord(meshPacket) || !isRecord(meshPacket.decoded)) {
    return null;
  }
  const data = meshPacket.decoded;
  let payload: Record<string, unknown>;
  try {
    payload = decodePayload(data.portnum, data.payload, schema);
  } catch {
    return null;
  }
  return {
    packet: {
      from: meshPacket.from,
      to: meshPacket.to,
      channel: meshPacket.channel,
      portnum: data.portnum,
      payload,
    },
    gatewayId: typeof envelope.gatewayId === "string" ? envelope.gatewayId : undefined,
    channelId: typeof envelope.channelId === "string" ? envelope.channelId : undefined,
  };
}
