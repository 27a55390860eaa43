import { connectAsync } from "mqtt";
import type { MeshPublisher } from "../infra/outbound/deliver.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";

export type MqttTransportOptions = {
  host: string;
  port: number;
  username?: string;
  password?: string;
  clientId?: string;
  /** Subscription filter, e.g. `msh/#`. */
  rootFilter: string;
  onMessage: (topic: string, payload: Uint8Array) => Promise<void>;
  log?: SubsystemLogger;
};

export type MqttTransport = MeshPublisher & {
  close: () => Promise<void>;
};

const RECONNECT_PERIOD_MS = 5_000;

/**
 * Connects, subscribes to the root filter and hands every message to
 * `onMessage`. Reconnects and resubscription are left to the mqtt client.
 */
export async function startMqttTransport(opts: MqttTransportOptions): Promise<MqttTransport> {
  const log = opts.log ?? createSubsystemLogger("transport/mqtt");
  const url = `mqtt://${opts.host}:${opts.port}`;
  const client = await connectAsync(url, {
    username: opts.username || undefined,
    password: opts.password || undefined,
    clientId: opts.clientId,
    reconnectPeriod: RECONNECT_PERIOD_MS,
  });
  log.info(`connected to ${url}`);

  client.on("message", (topic, payload) => {
    void opts.onMessage(topic, payload).catch((err: unknown) => {
      log.error("message handler failed", { topic, error: formatErrorMessage(err) });
    });
  });
  client.on("reconnect", () => {
    log.info("reconnecting");
  });
  client.on("offline", () => {
    log.warn("broker offline");
  });
  client.on("error", (err) => {
    log.warn("mqtt error", { error: formatErrorMessage(err) });
  });

  await client.subscribeAsync(opts.rootFilter);
  log.info(`subscribed to ${opts.rootFilter}`);

  return {
    publish: async (topic, payload) => {
      await client.publishAsync(topic, payload);
    },
    close: async () => {
      await client.endAsync();
      log.info("disconnected");
    },
  };
}
