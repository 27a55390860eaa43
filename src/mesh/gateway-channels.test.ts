import { describe, expect, it } from "vitest";
import { GatewayChannelMap } from "./gateway-channels.js";
import { formatNodeId, gatewayIdFromTopic, gatewayNumFromId, parseNodeNum } from "./node-id.js";

describe("GatewayChannelMap", () => {
  it("falls back to the default channel", () => {
    const map = new GatewayChannelMap(2);
    expect(map.channelFor("!00000001")).toBe(2);
  });

  it("reports changes with last-write-wins", () => {
    const map = new GatewayChannelMap();
    expect(map.learn("!00000001", 1)).toBe(true);
    expect(map.learn("!00000001", 1)).toBe(false);
    expect(map.learn("!00000001", 3)).toBe(true);
    expect(map.channelFor("!00000001")).toBe(3);
    expect(map.learn("", 5)).toBe(false);
  });

  it("remembers the gateway a node was heard through", () => {
    const map = new GatewayChannelMap();
    expect(map.firstGateway()).toBeUndefined();
    map.rememberNode(42, "!0000abcd");
    expect(map.gatewayForNode(42)).toBe("!0000abcd");
    expect(map.firstGateway()).toBe("!0000abcd");
    map.learn("!00000001", 0);
    expect(map.firstGateway()).toBe("!00000001");
  });
});

describe("node ids", () => {
  it("parses numbers and !hex", () => {
    expect(parseNodeNum(42)).toBe(42);
    expect(parseNodeNum("!0000002a")).toBe(42);
    expect(parseNodeNum("42")).toBe(42);
    expect(parseNodeNum(-1)).toBeUndefined();
    expect(parseNodeNum(1.5)).toBeUndefined();
    expect(parseNodeNum("!zz")).toBeUndefined();
  });

  it("formats padded ids", () => {
    expect(formatNodeId(42)).toBe("!0000002a");
  });

  it("maps gateway ids to numbers", () => {
    expect(gatewayNumFromId("!a1b2c3d4")).toBe(0xa1b2c3d4);
    expect(gatewayNumFromId("a1b2c3d4")).toBeUndefined();
    expect(gatewayNumFromId("")).toBeUndefined();
  });

  it("takes the last node marker from the topic", () => {
    expect(gatewayIdFromTopic("msh/EU/2/json/!0000aaaa/LongFast/!0000bbbb")).toBe("!0000bbbb");
    expect(gatewayIdFromTopic("msh/EU/2/json/!/x")).toBe("");
  });
});
