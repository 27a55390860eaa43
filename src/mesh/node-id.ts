export const BROADCAST_NODE_NUM = 0xffffffff;

const NODE_ID_PATTERN = /^![0-9a-f]{1,8}$/i;

/** Accepts a node number or its `!hex` form. */
export function parseNodeNum(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isInteger(value) && value >= 0 && value <= BROADCAST_NODE_NUM ? value : undefined;
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  if (NODE_ID_PATTERN.test(trimmed)) {
    return Number.parseInt(trimmed.slice(1), 16);
  }
  if (/^\d+$/.test(trimmed)) {
    const parsed = Number(trimmed);
    return parsed <= BROADCAST_NODE_NUM ? parsed : undefined;
  }
  return undefined;
}

export function formatNodeId(num: number): string {
  return `!${(num >>> 0).toString(16).padStart(8, "0")}`;
}

/** Numeric address of a `!hex` gateway id, or undefined when it cannot be routed. */
export function gatewayNumFromId(gatewayId: string): number | undefined {
  return NODE_ID_PATTERN.test(gatewayId) ? Number.parseInt(gatewayId.slice(1), 16) : undefined;
}

/** Last topic segment carrying a node marker, e.g. `msh/EU/2/json/LongFast/!a1b2c3d4`. */
export function gatewayIdFromTopic(topic: string): string {
  const segments = topic.split("/");
  for (let i = segments.length - 1; i >= 0; i -= 1) {
    const segment = segments[i];
    if (segment.startsWith("!") && segment.length > 1) {
      return segment;
    }
  }
  return "";
}
