import type { MeshPublisher } from "../infra/outbound/deliver.js";
import { createGeminiBackend } from "../ai/gemini.js";
import { createDispatcher } from "../auto-reply/dispatch.js";
import {
  assertRunnableConfig,
  resolveDownlinkTopic,
  resolveEmailSettings,
  resolveStatePaths,
  type EmailSettings,
  type MeshRelayConfig,
} from "../config/config.js";
import { createInboxMonitor } from "../email/inbox.js";
import { createReplyRelayPoller } from "../email/relay-poller.js";
import { createEmailService, type RelayEmailService } from "../email/service.js";
import { createSmtpTransport, type MailTransport } from "../email/smtp.js";
import { EmailStore } from "../email/store.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createOutboundSender } from "../infra/outbound/deliver.js";
import { configureLogging, createSubsystemLogger } from "../logging/subsystem.js";
import { redactEmailAddress } from "../logging/redact-email.js";
import { GatewayChannelMap } from "../mesh/gateway-channels.js";
import { createMeshRouter } from "../mesh/router.js";
import { KnownSenders } from "../sessions/known-senders.js";
import { SessionStore } from "../sessions/store.js";
import { startMqttTransport, type MqttTransport } from "../transport/mqtt.js";
import { createWeatherBackend } from "../weather/backend.js";

const log = createSubsystemLogger("relay");

export type MeshRelayHandle = {
  stop: () => Promise<void>;
};

type EmailRuntime = {
  service: RelayEmailService;
  store: EmailStore;
  transport: MailTransport;
  settings: EmailSettings;
};

async function startEmail(config: MeshRelayConfig, storeFile: string): Promise<EmailRuntime | undefined> {
  const settings = resolveEmailSettings(config);
  if (!settings) {
    log.info("email disabled (no address/password configured)");
    return undefined;
  }
  const store = new EmailStore(storeFile);
  store.load();
  const pruned = await store.pruneOlderThan();
  if (pruned > 0) {
    log.info(`pruned ${pruned} old email record(s)`);
  }
  const transport = createSmtpTransport(settings);
  const service = createEmailService({ store, transport, botAddress: settings.address });
  log.info("email enabled", { address: redactEmailAddress(settings.address) });
  return { service, store, transport, settings };
}

/**
 * Builds every service from the validated config, connects to the broker and
 * starts the background loops. Fatal config problems throw before anything
 * connects.
 */
export async function startMeshRelay(params: {
  config: MeshRelayConfig;
  env?: NodeJS.ProcessEnv;
}): Promise<MeshRelayHandle> {
  const { config } = params;
  const { aiApiKey } = assertRunnableConfig(config);
  configureLogging(config.logging);

  const paths = resolveStatePaths(config, params.env);
  const knownSenders = new KnownSenders(paths.knownSendersFile);
  knownSenders.load();
  const gateways = new GatewayChannelMap(config.mesh.defaultChannelIndex);
  const sessions = new SessionStore({
    sessionTimeoutMs: config.sessions.timeoutSeconds * 1000,
    sweepIntervalMs: config.sessions.cleanupIntervalSeconds * 1000,
  });
  const email = await startEmail(config, paths.emailStoreFile);

  let transport: MqttTransport | undefined;
  const publisher: MeshPublisher = {
    publish: (topic, payload) => {
      if (!transport) {
        throw new Error("MQTT transport is not connected");
      }
      return transport.publish(topic, payload);
    },
  };
  const outbound = createOutboundSender({
    publisher,
    gateways,
    topic: resolveDownlinkTopic(config),
    maxBytes: config.chunking.maxBytes,
    chunkDelayMs: Math.round(config.chunking.delaySeconds * 1000),
  });

  const dispatcher = createDispatcher({
    sessions,
    outbound,
    gateways,
    knownSenders,
    ai: createGeminiBackend({
      apiKey: aiApiKey,
      model: config.ai.model,
      timeoutMs: config.ai.requestTimeoutMs,
      maxHistoryTurns: config.ai.maxHistoryTurns,
    }),
    weather: createWeatherBackend({
      userAgent: config.weather.userAgent,
      timeoutMs: config.weather.requestTimeoutMs,
    }),
    email: email?.service,
    weatherWaitSeconds: config.weather.waitSeconds,
  });
  const router = createMeshRouter({ dispatcher, gateways });

  transport = await startMqttTransport({
    host: config.mqtt.host,
    port: config.mqtt.port,
    username: config.mqtt.username,
    password: config.mqtt.password,
    clientId: config.mqtt.clientId,
    rootFilter: config.mqtt.rootFilter,
    onMessage: router.handleMessage,
  });

  const poller = email
    ? createReplyRelayPoller({
        email: email.service,
        outbound,
        gateways,
        fallbackGatewayId: config.mesh.fallbackGatewayId,
        intervalMs: email.settings.pollMs,
      })
    : undefined;
  const inbox = email
    ? createInboxMonitor({ settings: email.settings, ingest: email.service.ingestInbound })
    : undefined;
  poller?.start();
  inbox?.start();
  log.info("meshrelay running");

  return {
    stop: async () => {
      inbox?.stop();
      poller?.stop();
      dispatcher.dispose();
      await dispatcher.idle();
      outbound.dispose();
      try {
        await transport?.close();
      } catch (err) {
        log.warn("mqtt close failed", { error: formatErrorMessage(err) });
      }
      email?.transport.close();
      await Promise.all([knownSenders.flush(), email?.store.flush()]);
      log.info("meshrelay stopped");
    },
  };
}
