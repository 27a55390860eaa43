import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("sessions");

export const DEFAULT_SESSION_TIMEOUT_MS = 3_600_000;
export const DEFAULT_SESSION_SWEEP_INTERVAL_MS = 300_000;
export const DEFAULT_WEATHER_WAIT_SECONDS = 20;

export type UserSession = {
  userId: string;
  createdAt: number;
  lastActivity: number;
  active: boolean;
};

export type WeatherFlow =
  | { state: "idle" }
  | { state: "awaiting-location"; requestedAt: number; deadline: number };

export type CachedLocation = {
  lat: number;
  lon: number;
  label: string;
};

export type EmailDraft = {
  recipientEmail: string;
  subject: string;
  replyToId?: string;
};

export type EmailFlow = { state: "idle" } | { state: "awaiting-body"; draft: EmailDraft };

export type SessionStoreOptions = {
  sessionTimeoutMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
};

const IDLE_WEATHER: WeatherFlow = { state: "idle" };
const IDLE_EMAIL: EmailFlow = { state: "idle" };

/**
 * All per-user conversational state. Every method is a synchronous map
 * mutation; callers serialize per user, so no method needs to be re-entrant.
 */
export class SessionStore {
  private readonly sessions = new Map<string, UserSession>();
  private readonly weather = new Map<string, WeatherFlow>();
  private readonly locations = new Map<string, CachedLocation>();
  private readonly email = new Map<string, EmailFlow>();
  private readonly sessionTimeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private lastSweepAt: number;

  constructor(opts: SessionStoreOptions = {}) {
    this.sessionTimeoutMs = opts.sessionTimeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.sweepIntervalMs = opts.sweepIntervalMs ?? DEFAULT_SESSION_SWEEP_INTERVAL_MS;
    this.now = opts.now ?? Date.now;
    this.lastSweepAt = this.now();
  }

  // ---------- sessions ----------

  private isUsable(session: UserSession, now: number): boolean {
    return session.active && now - session.lastActivity <= this.sessionTimeoutMs;
  }

  createOrRefresh(userId: string): UserSession {
    const now = this.now();
    this.sweepExpired();
    const existing = this.sessions.get(userId);
    if (existing && this.isUsable(existing, now)) {
      existing.lastActivity = now;
      return existing;
    }
    const session: UserSession = { userId, createdAt: now, lastActivity: now, active: true };
    this.sessions.set(userId, session);
    log.debug("session started", { userId });
    return session;
  }

  /** Reading an expired session marks it inactive and returns nothing. */
  get(userId: string): UserSession | undefined {
    const session = this.sessions.get(userId);
    if (!session) {
      return undefined;
    }
    const now = this.now();
    if (!this.isUsable(session, now)) {
      session.active = false;
      return undefined;
    }
    session.lastActivity = now;
    return session;
  }

  endSession(userId: string): boolean {
    const session = this.sessions.get(userId);
    if (!session) {
      return false;
    }
    session.active = false;
    return true;
  }

  activeSessionCount(): number {
    const now = this.now();
    let count = 0;
    for (const session of this.sessions.values()) {
      if (this.isUsable(session, now)) {
        count += 1;
      }
    }
    return count;
  }

  /**
   * Drops expired sessions. Throttled to one pass per sweep interval unless
   * forced; runs opportunistically from `createOrRefresh`.
   */
  sweepExpired(opts: { force?: boolean } = {}): number {
    const now = this.now();
    if (!opts.force && now - this.lastSweepAt < this.sweepIntervalMs) {
      return 0;
    }
    this.lastSweepAt = now;
    let removed = 0;
    for (const [userId, session] of this.sessions) {
      if (!this.isUsable(session, now)) {
        this.sessions.delete(userId);
        removed += 1;
      }
    }
    if (removed > 0) {
      log.info("swept expired sessions", { removed });
    }
    return removed;
  }

  describeSession(userId: string): string {
    const session = this.sessions.get(userId);
    if (!session) {
      return `user ${userId}: no session`;
    }
    const now = this.now();
    const ageSeconds = Math.round((now - session.createdAt) / 1000);
    const idleSeconds = Math.round((now - session.lastActivity) / 1000);
    const status = this.isUsable(session, now) ? "active" : "expired";
    return `user ${userId}: ${status}, age ${ageSeconds}s, idle ${idleSeconds}s`;
  }

  // ---------- weather ----------

  getWeatherFlow(userId: string): WeatherFlow {
    return this.weather.get(userId) ?? IDLE_WEATHER;
  }

  setWeatherWait(userId: string, on: boolean, timeoutSeconds = DEFAULT_WEATHER_WAIT_SECONDS): void {
    if (!on) {
      this.weather.delete(userId);
      return;
    }
    const now = this.now();
    this.weather.set(userId, {
      state: "awaiting-location",
      requestedAt: now,
      deadline: now + timeoutSeconds * 1000,
    });
  }

  /** True while a location request is outstanding, even past its window. */
  hasPendingWeatherRequest(userId: string): boolean {
    return this.getWeatherFlow(userId).state === "awaiting-location";
  }

  isWithinWeatherWindow(userId: string): boolean {
    const flow = this.getWeatherFlow(userId);
    return flow.state === "awaiting-location" && this.now() <= flow.deadline;
  }

  clearWeatherWait(userId: string): void {
    this.weather.delete(userId);
  }

  cacheLocation(userId: string, lat: number, lon: number, label: string): void {
    this.locations.set(userId, { lat, lon, label });
  }

  getCachedLocation(userId: string): CachedLocation | undefined {
    return this.locations.get(userId);
  }

  clearCachedLocation(userId: string): void {
    this.locations.delete(userId);
    this.weather.delete(userId);
  }

  // ---------- email ----------

  getEmailFlow(userId: string): EmailFlow {
    return this.email.get(userId) ?? IDLE_EMAIL;
  }

  setEmailDraft(userId: string, draft: EmailDraft): void {
    this.email.set(userId, { state: "awaiting-body", draft: { ...draft } });
  }

  getEmailDraft(userId: string): EmailDraft | undefined {
    const flow = this.getEmailFlow(userId);
    return flow.state === "awaiting-body" ? flow.draft : undefined;
  }

  /** Waiting needs a draft to send; turning the wait on without one is a no-op. */
  setEmailBodyWait(userId: string, on: boolean): void {
    if (!on) {
      this.email.delete(userId);
      return;
    }
    if (this.getEmailFlow(userId).state !== "awaiting-body") {
      log.warn("ignoring email body wait without a draft", { userId });
    }
  }

  isWaitingForEmailBody(userId: string): boolean {
    return this.getEmailFlow(userId).state === "awaiting-body";
  }

  clearAllEmailState(userId: string): void {
    this.email.delete(userId);
  }
}
