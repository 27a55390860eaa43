import type { ZodIssue } from "zod";
import { readJsonFile } from "../infra/json-file.js";
import { formatErrorMessage } from "../infra/errors.js";
import { resolveConfigPath, resolveStateFile } from "./paths.js";
import { MeshRelayConfigSchema, type MeshRelayConfig } from "./schema.js";

export type { MeshRelayConfig } from "./schema.js";

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join("\n")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

type EnvOverride = {
  env: string[];
  path: [string, string];
  kind: "string" | "number" | "secret";
};

// First listed variable wins; GMAIL_* are accepted for existing deployments.
const ENV_OVERRIDES: EnvOverride[] = [
  { env: ["MQTT_HOST"], path: ["mqtt", "host"], kind: "string" },
  { env: ["MQTT_PORT"], path: ["mqtt", "port"], kind: "number" },
  { env: ["MQTT_USER"], path: ["mqtt", "username"], kind: "string" },
  { env: ["MQTT_PASS"], path: ["mqtt", "password"], kind: "secret" },
  { env: ["ROOT_FILTER"], path: ["mqtt", "rootFilter"], kind: "string" },
  { env: ["CHUNK_BYTES"], path: ["chunking", "maxBytes"], kind: "number" },
  { env: ["CHUNK_DELAY_SECONDS"], path: ["chunking", "delaySeconds"], kind: "number" },
  { env: ["DEFAULT_REGION"], path: ["mesh", "region"], kind: "string" },
  { env: ["DEFAULT_VERSION"], path: ["mesh", "version"], kind: "string" },
  { env: ["DEFAULT_CHANNEL_INDEX"], path: ["mesh", "defaultChannelIndex"], kind: "number" },
  { env: ["FALLBACK_GATEWAY_ID"], path: ["mesh", "fallbackGatewayId"], kind: "string" },
  { env: ["GEMINI_API_KEY"], path: ["ai", "apiKey"], kind: "secret" },
  { env: ["GEMINI_MODEL"], path: ["ai", "model"], kind: "string" },
  { env: ["EMAIL_ADDRESS", "GMAIL_EMAIL"], path: ["email", "address"], kind: "string" },
  { env: ["EMAIL_PASSWORD", "GMAIL_AUTH_CREDENTIALS"], path: ["email", "password"], kind: "secret" },
  { env: ["SMTP_HOST"], path: ["email", "smtpHost"], kind: "string" },
  { env: ["SMTP_PORT"], path: ["email", "smtpPort"], kind: "number" },
  { env: ["IMAP_HOST"], path: ["email", "imapHost"], kind: "string" },
  { env: ["IMAP_PORT"], path: ["email", "imapPort"], kind: "number" },
  { env: ["EMAIL_POLL_SECONDS"], path: ["email", "pollSeconds"], kind: "number" },
  { env: ["KNOWN_SENDERS_FILE"], path: ["state", "knownSendersFile"], kind: "string" },
  { env: ["EMAIL_STORE_FILE"], path: ["state", "emailStoreFile"], kind: "string" },
  { env: ["MESHRELAY_LOG_LEVEL"], path: ["logging", "level"], kind: "string" },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * Pasted credentials often carry line breaks (`\r` from env files); they are
 * stripped wherever they appear. Inner spaces stay: app passwords come in groups.
 */
export function normalizeSecret(raw: string): string | undefined {
  return raw.replace(/[\r\n\u2028\u2029]+/g, "").trim() || undefined;
}

function coerceEnvValue(raw: string, kind: EnvOverride["kind"]): unknown {
  if (kind === "secret") {
    return normalizeSecret(raw);
  }
  const trimmed = raw.trim();
  if (!trimmed) {
    return undefined;
  }
  if (kind === "number") {
    const parsed = Number(trimmed);
    // Leave unparsable values as strings so the schema reports them with a path.
    return Number.isFinite(parsed) ? parsed : trimmed;
  }
  return trimmed;
}

export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const next: Record<string, unknown> = { ...raw };
  for (const override of ENV_OVERRIDES) {
    const source = override.env.find((name) => env[name] !== undefined);
    const rawValue = source ? env[source] : undefined;
    if (rawValue === undefined) {
      continue;
    }
    const value = coerceEnvValue(rawValue, override.kind);
    if (value === undefined) {
      continue;
    }
    const [section, key] = override.path;
    const current = next[section];
    next[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  }
  return next;
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
  return `${where}: ${issue.message}`;
}

export function validateConfig(raw: unknown): MeshRelayConfig {
  const result = MeshRelayConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid meshrelay config", result.error.issues.map(formatIssue));
  }
  return result.data;
}

export type LoadConfigOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadedConfig = {
  config: MeshRelayConfig;
  configPath: string;
  fileFound: boolean;
};

/**
 * Loads the JSON5 config file (if any), layers environment overrides on top
 * and validates the result. A missing file means defaults plus environment.
 */
export function loadConfig(opts: LoadConfigOptions = {}): LoadedConfig {
  const env = opts.env ?? process.env;
  const configPath = opts.configPath ?? resolveConfigPath(env);
  let fileValue: unknown;
  try {
    fileValue = readJsonFile(configPath);
  } catch (err) {
    throw new ConfigError(`Failed to read config ${configPath}: ${formatErrorMessage(err)}`);
  }
  if (fileValue !== undefined && !isRecord(fileValue)) {
    throw new ConfigError(`Config ${configPath} must contain an object`);
  }
  const base: Record<string, unknown> = isRecord(fileValue) ? fileValue : {};
  const merged = applyEnvOverrides(base, env);
  return { config: validateConfig(merged), configPath, fileFound: fileValue !== undefined };
}

/** Conditions that make `run` pointless; checked before any service is built. */
export function assertRunnableConfig(config: MeshRelayConfig): { aiApiKey: string } {
  const aiApiKey = config.ai.apiKey;
  if (!aiApiKey) {
    throw new ConfigError("Missing AI API key", [
      "ai.apiKey: set it in the config file or via GEMINI_API_KEY",
    ]);
  }
  return { aiApiKey };
}

export type EmailSettings = {
  address: string;
  password: string;
  smtpHost: string;
  smtpPort: number;
  imapHost: string;
  imapPort: number;
  pollMs: number;
};

export function resolveEmailSettings(config: MeshRelayConfig): EmailSettings | undefined {
  const { address, password } = config.email;
  if (!address || !password) {
    return undefined;
  }
  return {
    address,
    password,
    smtpHost: config.email.smtpHost,
    smtpPort: config.email.smtpPort,
    imapHost: config.email.imapHost,
    imapPort: config.email.imapPort,
    pollMs: Math.round(config.email.pollSeconds * 1000),
  };
}

export type StatePaths = {
  knownSendersFile: string;
  emailStoreFile: string;
};

export function resolveStatePaths(
  config: MeshRelayConfig,
  env: NodeJS.ProcessEnv = process.env,
): StatePaths {
  return {
    knownSendersFile: resolveStateFile(config.state.knownSendersFile, "known-senders.json", env),
    emailStoreFile: resolveStateFile(config.state.emailStoreFile, "emails.json", env),
  };
}

export function resolveDownlinkTopic(config: MeshRelayConfig): string {
  return `msh/${config.mesh.region}/${config.mesh.version}/json/mqtt/`;
}
