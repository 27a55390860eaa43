import { describe, expect, it } from "vitest";
import { loadMeshSchema, PortNum } from "./envelope.js";
import { decodePacket, normalize, resolveDestination } from "./normalize.js";
import { extractPosition } from "./position.js";

const TOPIC = "msh/EU/2/json/LongFast/!a1b2c3d4";

function jsonBytes(value: unknown): Uint8Array {
  return Buffer.from(JSON.stringify(value), "utf8");
}

function envelopeBytes(packet: Record<string, unknown>, gatewayId = "!0000beef"): Uint8Array {
  const { serviceEnvelope } = loadMeshSchema();
  return serviceEnvelope.encode(serviceEnvelope.fromObject({ packet, gatewayId })).finish();
}

describe("normalize (JSON)", () => {
  it("reads a direct message with payload.text", () => {
    const msg = normalize(
      jsonBytes({ from: 1234, to: 5678, channel: 1, payload: { text: "/help" } }),
      TOPIC,
    );
    expect(msg).toEqual({
      senderId: 1234,
      destination: 5678,
      gatewayId: "!a1b2c3d4",
      channelIndex: 1,
      text: "/help",
      isPublic: false,
    });
  });

  it("prefers payload.text, then payload.decoded.text, then text", () => {
    expect(
      normalize(jsonBytes({ from: 1, payload: { decoded: { text: "nested" } }, text: "top" }), TOPIC)
        ?.text,
    ).toBe("nested");
    expect(normalize(jsonBytes({ from: 1, text: "top" }), TOPIC)?.text).toBe("top");
  });

  it("treats missing and broadcast destinations as public", () => {
    for (const to of [undefined, 0xffffffff, "ffffffff", "0xFFFFFFFF"]) {
      const msg = normalize(jsonBytes({ from: 7, to, text: "/weather" }), TOPIC);
      expect(msg?.isPublic).toBe(true);
      expect(msg?.destination).toBe("broadcast");
    }
  });

  it("accepts hex sender ids", () => {
    expect(normalize(jsonBytes({ from: "!000004d2", to: 1, text: "hi" }), TOPIC)?.senderId).toBe(
      1234,
    );
  });

  it("reads the channel from payload.channel", () => {
    const msg = normalize(jsonBytes({ from: 3, to: 4, payload: { text: "x", channel: 2 } }), TOPIC);
    expect(msg?.channelIndex).toBe(2);
  });

  it("ignores non-integer channels", () => {
    const msg = normalize(jsonBytes({ from: 3, to: 4, channel: "2", text: "x" }), TOPIC);
    expect(msg?.channelIndex).toBeUndefined();
  });

  it("keeps unroutable messages with an empty gateway", () => {
    const msg = normalize(jsonBytes({ from: 3, to: 4, text: "/bot" }), "msh/EU/2/json/LongFast");
    expect(msg?.gatewayId).toBe("");
    expect(msg?.text).toBe("/bot");
  });

  it("returns null without text or sender", () => {
    expect(normalize(jsonBytes({ from: 3, to: 4 }), TOPIC)).toBeNull();
    expect(normalize(jsonBytes({ from: 3, to: 4, text: "   " }), TOPIC)).toBeNull();
    expect(normalize(jsonBytes({ to: 4, text: "hello" }), TOPIC)).toBeNull();
    expect(normalize(jsonBytes({ from: 3, text: 42 }), TOPIC)).toBeNull();
  });

  it("returns null for garbage bytes", () => {
    expect(normalize(Buffer.from([0xff, 0x00, 0x13, 0x37]), TOPIC)).toBeNull();
    expect(normalize("not json", TOPIC)).toBeNull();
  });
});

describe("normalize (protobuf envelope)", () => {
  it("decodes text packets", () => {
    const bytes = envelopeBytes({
      from: 0x1234,
      to: 0x5678,
      channel: 3,
      decoded: { portnum: PortNum.TEXT_MESSAGE_APP, payload: Buffer.from("/ai hi", "utf8") },
    });
    expect(normalize(bytes, TOPIC)).toEqual({
      senderId: 0x1234,
      destination: 0x5678,
      gatewayId: "!a1b2c3d4",
      channelIndex: 3,
      text: "/ai hi",
      isPublic: false,
    });
  });

  it("falls back to the envelope gateway when the topic has none", () => {
    const bytes = envelopeBytes({
      from: 9,
      to: 0xffffffff,
      decoded: { portnum: PortNum.TEXT_MESSAGE_APP, payload: Buffer.from("hello") },
    });
    const msg = normalize(bytes, "msh/EU/2/e/LongFast");
    expect(msg?.gatewayId).toBe("!0000beef");
    expect(msg?.isPublic).toBe(true);
    expect(msg?.channelIndex).toBe(0);
  });

  it("yields no message for position packets but exposes the coordinates", () => {
    const { position } = loadMeshSchema();
    const positionBytes = position
      .encode(position.fromObject({ latitudeI: 426_977_000, longitudeI: 233_219_000 }))
      .finish();
    const bytes = envelopeBytes({
      from: 42,
      to: 0xffffffff,
      decoded: { portnum: PortNum.POSITION_APP, payload: positionBytes },
    });
    expect(normalize(bytes, TOPIC)).toBeNull();
    const decoded = decodePacket(bytes, TOPIC);
    expect(decoded?.encoding).toBe("protobuf");
    const coords = decoded ? extractPosition(decoded.packet) : null;
    expect(coords?.lat).toBeCloseTo(42.6977, 6);
    expect(coords?.lon).toBeCloseTo(23.3219, 6);
  });
});

describe("resolveDestination", () => {
  it("treats unrecognised shapes as broadcast", () => {
    expect(resolveDestination({ node: 1 })).toBe("broadcast");
    expect(resolveDestination("not-a-node")).toBe("broadcast");
    expect(resolveDestination("!0000002a")).toBe(42);
  });
});
