import { Logger, type ILogObj } from "tslog";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "pretty" | "json";

type LogMeta = Record<string, unknown>;

export type SubsystemLogger = {
  subsystem: string;
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
  child: (name: string) => SubsystemLogger;
};

type LoggingSettings = {
  level: LogLevel;
  format: LogFormat;
};

// tslog numbering: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal.
const LEVEL_IDS: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  silent: 7,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_IDS, value);
}

function resolveEnvLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = env.MESHRELAY_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

let settings: LoggingSettings = { level: resolveEnvLevel(), format: "pretty" };
let generation = 0;
let root: Logger<ILogObj> | null = null;
const children = new Map<string, { generation: number; logger: Logger<ILogObj> }>();

function isTestRun(): boolean {
  return Boolean(process.env.VITEST) || process.env.NODE_ENV === "test";
}

function resolveRoot(): Logger<ILogObj> {
  if (!root) {
    root = new Logger<ILogObj>({
      name: "meshrelay",
      type: isTestRun() ? "hidden" : settings.format,
      minLevel: LEVEL_IDS[settings.level],
    });
  }
  return root;
}

function resolveChild(subsystem: string): Logger<ILogObj> {
  const cached = children.get(subsystem);
  if (cached && cached.generation === generation) {
    return cached.logger;
  }
  const logger = resolveRoot().getSubLogger({ name: subsystem });
  children.set(subsystem, { generation, logger });
  return logger;
}

/**
 * Applies logging settings to every subsystem logger, including ones created
 * before the config was loaded.
 */
export function configureLogging(next: Partial<LoggingSettings>): void {
  settings = { ...settings, ...next };
  generation += 1;
  root = null;
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: "debug" | "info" | "warn" | "error", message: string, meta?: LogMeta) => {
    const logger = resolveChild(subsystem);
    if (meta && Object.keys(meta).length > 0) {
      logger[level](message, meta);
    } else {
      logger[level](message);
    }
  };
  return {
    subsystem,
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
