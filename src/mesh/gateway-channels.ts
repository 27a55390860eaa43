/**
 * Per-gateway channel index, learned from inbound traffic so replies stay on
 * the channel the conversation happened on. Also remembers which gateway a
 * node was last heard through, for sends that are not replies.
 */
export class GatewayChannelMap {
  private readonly channels = new Map<string, number>();
  private readonly nodeGateways = new Map<number, string>();

  constructor(private readonly defaultChannel = 0) {}

  /** Returns true when the stored value changed. */
  learn(gatewayId: string, channel: number): boolean {
    if (!gatewayId) {
      return false;
    }
    const prev = this.channels.get(gatewayId);
    this.channels.set(gatewayId, channel);
    return prev !== channel;
  }

  channelFor(gatewayId: string): number {
    return this.channels.get(gatewayId) ?? this.defaultChannel;
  }

  rememberNode(nodeId: number, gatewayId: string): void {
    if (gatewayId) {
      this.nodeGateways.set(nodeId, gatewayId);
    }
  }

  gatewayForNode(nodeId: number): string | undefined {
    return this.nodeGateways.get(nodeId);
  }

  firstGateway(): string | undefined {
    for (const gatewayId of this.channels.keys()) {
      return gatewayId;
    }
    for (const gatewayId of this.nodeGateways.values()) {
      return gatewayId;
    }
    return undefined;
  }
}
