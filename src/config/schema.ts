import { z } from "zod";

const PortSchema = z.number().int().min(1).max(65535);

const MqttSchema = z
  .object({
    host: z.string().min(1).default("localhost"),
    port: PortSchema.default(1883),
    username: z.string().optional(),
    password: z.string().optional(),
    rootFilter: z.string().min(1).default("msh/#"),
    clientId: z.string().optional(),
  })
  .strict();

const MeshSchema = z
  .object({
    region: z.string().min(1).default("EU"),
    version: z.string().min(1).default("2"),
    defaultChannelIndex: z.number().int().min(0).default(0),
    /** Gateway used for reply notifications when the requester was never heard from. */
    fallbackGatewayId: z
      .string()
      .regex(/^![0-9a-fA-F]{1,8}$/, "must look like !a1b2c3d4")
      .optional(),
  })
  .strict();

const ChunkingSchema = z
  .object({
    maxBytes: z.number().int().min(4).default(180),
    delaySeconds: z.number().min(0).default(1.2),
  })
  .strict();

const SessionsSchema = z
  .object({
    timeoutSeconds: z.number().int().positive().default(3600),
    cleanupIntervalSeconds: z.number().int().positive().default(300),
  })
  .strict();

const WeatherSchema = z
  .object({
    waitSeconds: z.number().positive().default(20),
    requestTimeoutMs: z.number().int().positive().default(12_000),
    userAgent: z.string().min(1).default("meshrelay/0.1 (mesh weather bot)"),
  })
  .strict();

const AiSchema = z
  .object({
    apiKey: z.string().optional(),
    model: z.string().min(1).default("gemini-1.5-flash"),
    maxHistoryTurns: z.number().int().positive().default(20),
    requestTimeoutMs: z.number().int().positive().default(30_000),
  })
  .strict();

const EmailSchema = z
  .object({
    address: z.string().optional(),
    password: z.string().optional(),
    smtpHost: z.string().min(1).default("smtp.gmail.com"),
    smtpPort: PortSchema.default(465),
    imapHost: z.string().min(1).default("imap.gmail.com"),
    imapPort: PortSchema.default(993),
    pollSeconds: z.number().positive().default(30),
  })
  .strict();

const StateSchema = z
  .object({
    knownSendersFile: z.string().optional(),
    emailStoreFile: z.string().optional(),
  })
  .strict();

const LoggingSchema = z
  .object({
    level: z
      .union([
        z.literal("debug"),
        z.literal("info"),
        z.literal("warn"),
        z.literal("error"),
        z.literal("silent"),
      ])
      .default("info"),
    format: z.union([z.literal("pretty"), z.literal("json")]).default("pretty"),
  })
  .strict();

export const MeshRelayConfigSchema = z
  .object({
    mqtt: MqttSchema.default({}),
    mesh: MeshSchema.default({}),
    chunking: ChunkingSchema.default({}),
    sessions: SessionsSchema.default({}),
    weather: WeatherSchema.default({}),
    ai: AiSchema.default({}),
    email: EmailSchema.default({}),
    state: StateSchema.default({}),
    logging: LoggingSchema.default({}),
  })
  .strict()
  .superRefine((cfg, ctx) => {
    const hasAddress = Boolean(cfg.email.address);
    const hasPassword = Boolean(cfg.email.password);
    if (hasAddress !== hasPassword) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["email", hasAddress ? "password" : "address"],
        message: "email needs both an address and a password",
      });
    }
    if (cfg.email.address && !/^[^@\s]+@[^@\s]+\.[^@\s]+$/.test(cfg.email.address)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["email", "address"],
        message: "not a valid email address",
      });
    }
  });

export type MeshRelayConfig = z.infer<typeof MeshRelayConfigSchema>;
export type MeshRelayConfigInput = z.input<typeof MeshRelayConfigSchema>;
