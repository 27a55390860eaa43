import type { AiBackend } from "../ai/gemini.js";
import type { EmailService } from "../email/types.js";
import type { OutboundSender } from "../infra/outbound/deliver.js";
import type { MeshRoute } from "../infra/outbound/route.js";
import type { GatewayChannelMap } from "../mesh/gateway-channels.js";
import type { NormalizedMessage } from "../mesh/normalize.js";
import type { Coordinates } from "../mesh/position.js";
import type { SessionStore } from "../sessions/store.js";
import type { WeatherBackend } from "../weather/backend.js";
import { formatErrorMessage } from "../infra/errors.js";
import { KeyedSerialQueue } from "../infra/keyed-queue.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { redactEmailAddress } from "../logging/redact-email.js";
import { formatCoordinates } from "../mesh/position.js";
import { DEFAULT_WEATHER_WAIT_SECONDS } from "../sessions/store.js";
import {
  BOT_INTRO,
  formatEmailDetails,
  formatForecastMessages,
  formatThreadEntry,
  HELP_TEXT,
  PUBLIC_NUDGES,
  replies,
  replySubject,
  type NudgeKind,
} from "./replies.js";

export type DispatcherDeps = {
  sessions: SessionStore;
  outbound: OutboundSender;
  gateways: GatewayChannelMap;
  knownSenders: { mark: (nodeId: number) => boolean };
  ai: AiBackend;
  weather: WeatherBackend;
  /** Absent when the bot has no mailbox configured. */
  email?: EmailService;
  weatherWaitSeconds?: number;
  log?: SubsystemLogger;
};

export type Dispatcher = {
  /** Handles one inbound text message. Never rejects. */
  dispatch: (message: NormalizedMessage) => Promise<void>;
  /** GPS side-channel: a position report seen from `senderId`. Never rejects. */
  handlePosition: (senderId: number, gatewayId: string, coords: Coordinates) => Promise<void>;
  /** Resolves when all queued per-user work has settled. */
  idle: () => Promise<void>;
  dispose: () => void;
};

type Command =
  | { kind: "bot" }
  | { kind: "help" }
  | { kind: "ai"; args: string }
  | { kind: "weather"; args: string }
  | { kind: "email-get" | "email-thread" | "email-debug" | "email-reply" | "email"; args: string };

// Order matters: the bare /email prefix must come after its subcommands.
const PRIVATE_COMMANDS: Array<{ prefix: string; kind: Command["kind"] }> = [
  { prefix: "/bot", kind: "bot" },
  { prefix: "/help", kind: "help" },
  { prefix: "/ai", kind: "ai" },
  { prefix: "/weather", kind: "weather" },
  { prefix: "/email get", kind: "email-get" },
  { prefix: "/email thread", kind: "email-thread" },
  { prefix: "/email debug", kind: "email-debug" },
  { prefix: "/email reply", kind: "email-reply" },
  { prefix: "/email", kind: "email" },
];

const PUBLIC_COMMANDS: Array<{ prefix: string; nudge: NudgeKind }> = [
  { prefix: "/bot", nudge: "bot" },
  { prefix: "/ai", nudge: "bot" },
  { prefix: "/weather", nudge: "weather" },
  { prefix: "/help", nudge: "help" },
  { prefix: "/email", nudge: "email" },
];

// Shared by the public and private paths: "/helpme" is neither a nudge nor a command.
function hasCommandPrefix(lower: string, prefix: string): boolean {
  return lower.startsWith(prefix) && (lower.length === prefix.length || /\s/.test(lower.charAt(prefix.length)));
}

export function parseCommand(text: string): Command | null {
  const trimmed = text.trim();
  const lower = trimmed.toLowerCase();
  for (const { prefix, kind } of PRIVATE_COMMANDS) {
    if (hasCommandPrefix(lower, prefix)) {
      const args = trimmed.slice(prefix.length).trim();
      return kind === "bot" || kind === "help" ? { kind } : { kind, args };
    }
  }
  return null;
}

export function matchPublicNudge(text: string): NudgeKind | null {
  const lower = text.trim().toLowerCase();
  return PUBLIC_COMMANDS.find(({ prefix }) => hasCommandPrefix(lower, prefix))?.nudge ?? null;
}

function isPlausibleAddress(value: string): boolean {
  return value.includes("@") && value.includes(".");
}

/**
 * Per-user command state machine. Work for one user runs strictly in order
 * through a keyed queue; collaborator failures become one reply line and
 * never escape.
 */
export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const log = deps.log ?? createSubsystemLogger("dispatch");
  const { sessions, outbound } = deps;
  const waitSeconds = deps.weatherWaitSeconds ?? DEFAULT_WEATHER_WAIT_SECONDS;
  const queue = new KeyedSerialQueue();
  const fallbackTimers = new Map<string, ReturnType<typeof setTimeout>>();
  let disposed = false;

  const guarded = (userId: string, task: () => Promise<void>): Promise<void> =>
    queue.run(userId, task).catch((err: unknown) => {
      log.error("dispatch failed", { userId, error: formatErrorMessage(err) });
    });

  const send = (route: MeshRoute, text: string) => outbound.sendChunked(route, text);

  // ---------- weather ----------

  const sendForecast = async (route: MeshRoute, lat: number, lon: number, label: string) => {
    try {
      const forecast = await deps.weather.fetchForecast(lat, lon);
      outbound.sendSeries(route, formatForecastMessages(label, forecast));
    } catch (err) {
      log.warn("forecast fetch failed", { error: formatErrorMessage(err) });
      send(route, replies.weatherFailed(formatErrorMessage(err)));
    }
  };

  /** Resolves `query`; on success caches it, clears the wait and sends the forecast. */
  const resolveAndForecast = async (userId: string, route: MeshRoute, query: string) => {
    let place: Awaited<ReturnType<WeatherBackend["resolveLocation"]>> = null;
    try {
      place = await deps.weather.resolveLocation(query);
    } catch (err) {
      log.warn("location lookup failed", { error: formatErrorMessage(err) });
    }
    if (!place) {
      send(route, replies.locationParseError);
      return;
    }
    sessions.cacheLocation(userId, place.lat, place.lon, place.label);
    sessions.clearWeatherWait(userId);
    await sendForecast(route, place.lat, place.lon, place.label);
  };

  const armFallback = (userId: string, route: MeshRoute) => {
    if (disposed) {
      return;
    }
    const existing = fallbackTimers.get(userId);
    if (existing) {
      clearTimeout(existing);
    }
    const timer = setTimeout(() => {
      fallbackTimers.delete(userId);
      void guarded(userId, async () => {
        if (!sessions.hasPendingWeatherRequest(userId)) {
          return;
        }
        sessions.clearWeatherWait(userId);
        send(route, replies.gpsTimeout);
      });
    }, waitSeconds * 1000);
    fallbackTimers.set(userId, timer);
  };

  const handleWeather = async (userId: string, route: MeshRoute, args: string) => {
    if (args.toLowerCase() === "clear") {
      sessions.clearCachedLocation(userId);
      send(route, replies.locationCleared);
      return;
    }
    if (args) {
      await resolveAndForecast(userId, route, args);
      return;
    }
    const cached = sessions.getCachedLocation(userId);
    if (cached) {
      sessions.clearWeatherWait(userId);
      await sendForecast(route, cached.lat, cached.lon, cached.label);
      return;
    }
    send(route, replies.gpsRequested);
    outbound.requestPosition(route);
    sessions.setWeatherWait(userId, true, waitSeconds);
    armFallback(userId, route);
  };

  // ---------- email ----------

  const handleEmailCompose = (userId: string, route: MeshRoute, args: string) => {
    sessions.clearAllEmailState(userId);
    const space = args.indexOf(" ");
    if (!args || space === -1) {
      send(route, replies.emailUsage);
      return;
    }
    const recipientEmail = args.slice(0, space);
    const subject = args.slice(space + 1).trim();
    if (!isPlausibleAddress(recipientEmail)) {
      send(route, replies.emailInvalidAddress);
      return;
    }
    sessions.setEmailDraft(userId, { recipientEmail, subject });
    send(route, replies.emailDraft(recipientEmail, subject));
  };

  /** Looks up an email the requester owns; replies and returns undefined otherwise. */
  const lookupOwned = async (email: EmailService, route: MeshRoute, id: string) => {
    let record: Awaited<ReturnType<EmailService["getEmail"]>>;
    try {
      record = await email.getEmail(id);
    } catch (err) {
      send(route, replies.emailLookupFailed(formatErrorMessage(err)));
      return undefined;
    }
    if (!record) {
      send(route, replies.emailNotFound(id));
      return undefined;
    }
    if (record.senderNodeId !== route.destination) {
      log.info("email access denied", { id, requester: route.destination });
      send(route, replies.emailForbidden);
      return undefined;
    }
    return record;
  };

  const handleEmailReply = async (email: EmailService, userId: string, route: MeshRoute, id: string) => {
    sessions.clearAllEmailState(userId);
    if (!id) {
      send(route, replies.replyUsage);
      return;
    }
    const original = await lookupOwned(email, route, id);
    if (!original) {
      return;
    }
    const subject = replySubject(original.subject);
    sessions.setEmailDraft(userId, { recipientEmail: original.senderEmail, subject, replyToId: id });
    send(route, replies.replyDraft(original.senderEmail, subject));
  };

  const handleEmailRead = async (
    email: EmailService,
    route: MeshRoute,
    sub: "get" | "thread" | "debug",
    id: string,
  ) => {
    if (!id) {
      send(route, replies.emailIdRequired(sub));
      return;
    }
    const record = await lookupOwned(email, route, id);
    if (!record) {
      return;
    }
    try {
      if (sub === "get") {
        send(route, formatEmailDetails(record));
      } else if (sub === "debug") {
        send(route, await email.debugThreading(id));
      } else {
        const thread = await email.getThread(id);
        if (thread.length === 0) {
          send(route, replies.threadNotFound(id));
          return;
        }
        outbound.sendSeries(route, [
          replies.threadHeader(id),
          ...thread.map((entry, index) => formatThreadEntry(entry, index + 1)),
        ]);
      }
    } catch (err) {
      send(route, replies.emailLookupFailed(formatErrorMessage(err)));
    }
  };

  const handleEmailBody = async (email: EmailService, userId: string, route: MeshRoute, body: string) => {
    const draft = sessions.getEmailDraft(userId);
    if (!draft) {
      sessions.clearAllEmailState(userId);
      send(route, replies.draftMissing);
      return;
    }
    try {
      const id = await email.sendEmail({
        senderNodeId: route.destination,
        recipientEmail: draft.recipientEmail,
        subject: draft.subject,
        body,
        replyToId: draft.replyToId,
      });
      send(route, replies.emailSent(id));
    } catch (err) {
      log.warn("email send failed", {
        to: redactEmailAddress(draft.recipientEmail),
        error: formatErrorMessage(err),
      });
      send(route, replies.emailFailed(formatErrorMessage(err)));
    } finally {
      sessions.clearAllEmailState(userId);
    }
  };

  // ---------- routing ----------

  const runCommand = async (userId: string, route: MeshRoute, command: Command) => {
    switch (command.kind) {
      case "bot":
        send(route, BOT_INTRO);
        return;
      case "help":
        send(route, HELP_TEXT);
        return;
      case "ai": {
        if (!command.args) {
          send(route, replies.aiUsage);
          return;
        }
        try {
          send(route, await deps.ai.generateReply(userId, command.args));
        } catch (err) {
          log.warn("ai request failed", { error: formatErrorMessage(err) });
          send(route, replies.aiFailed(formatErrorMessage(err)));
        }
        return;
      }
      case "weather":
        await handleWeather(userId, route, command.args);
        return;
      default:
        break;
    }

    const email = deps.email;
    if (!email) {
      send(route, replies.emailDisabled);
      return;
    }
    const id = command.args.toUpperCase();
    switch (command.kind) {
      case "email-get":
        await handleEmailRead(email, route, "get", id);
        return;
      case "email-thread":
        await handleEmailRead(email, route, "thread", id);
        return;
      case "email-debug":
        await handleEmailRead(email, route, "debug", id);
        return;
      case "email-reply":
        await handleEmailReply(email, userId, route, id);
        return;
      case "email":
        handleEmailCompose(userId, route, command.args);
        return;
    }
  };

  const handlePrivate = async (message: NormalizedMessage, senderId: number) => {
    const userId = String(senderId);
    const route: MeshRoute = { gatewayId: message.gatewayId, destination: senderId };
    const command = parseCommand(message.text);
    if (command) {
      sessions.createOrRefresh(userId);
      deps.knownSenders.mark(senderId);
      deps.gateways.rememberNode(senderId, message.gatewayId);
      log.debug("command", { from: senderId, kind: command.kind });
      await runCommand(userId, route, command);
      return;
    }
    if (sessions.hasPendingWeatherRequest(userId)) {
      await resolveAndForecast(userId, route, message.text.trim());
      return;
    }
    if (deps.email && sessions.isWaitingForEmailBody(userId)) {
      await handleEmailBody(deps.email, userId, route, message.text);
    }
  };

  return {
    dispatch: (message) => {
      if (message.isPublic) {
        const nudge = matchPublicNudge(message.text);
        if (nudge) {
          outbound.sendBroadcast(message.gatewayId, PUBLIC_NUDGES[nudge]);
        }
        return Promise.resolve();
      }
      const senderId = message.senderId;
      return guarded(String(senderId), () => handlePrivate(message, senderId));
    },
    handlePosition: (senderId, gatewayId, coords) => {
      const userId = String(senderId);
      return guarded(userId, async () => {
        if (!sessions.isWithinWeatherWindow(userId)) {
          return;
        }
        let label: string | null = null;
        try {
          label = await deps.weather.reverseLabel(coords.lat, coords.lon);
        } catch (err) {
          log.warn("reverse geocode failed", { error: formatErrorMessage(err) });
        }
        // A typed location may have won while the lookup was in flight.
        if (!sessions.hasPendingWeatherRequest(userId)) {
          return;
        }
        const resolved = label ?? formatCoordinates(coords.lat, coords.lon);
        sessions.cacheLocation(userId, coords.lat, coords.lon, resolved);
        sessions.clearWeatherWait(userId);
        log.info("gps fix received", { from: senderId });
        await sendForecast({ gatewayId, destination: senderId }, coords.lat, coords.lon, resolved);
      });
    },
    idle: () => queue.idle(),
    dispose: () => {
      disposed = true;
      for (const timer of fallbackTimers.values()) {
        clearTimeout(timer);
      }
      fallbackTimers.clear();
    },
  };
}
