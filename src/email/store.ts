import { z } from "zod";
import { formatErrorMessage } from "../infra/errors.js";
import { createSerialFileWriter, readJsonFile } from "../infra/json-file.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { redactEmailAddress } from "../logging/redact-email.js";
import {
  INVALID_NODE_ID,
  UNPROCESSED_NODE_ID,
  type EmailRecord,
  type InboundMail,
} from "./types.js";

const log = createSubsystemLogger("email/store");

export const MESSAGE_ID_DOMAIN = "meshtastic.local";
export const DEFAULT_EMAIL_RETENTION_DAYS = 30;

const DAY_MS = 24 * 3_600_000;
const ID_LETTERS = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const MAX_ID_ATTEMPTS = 1000;
const LOCAL_MESSAGE_ID_RE = /^<([A-Z]{2}\d{3})(?:\.[0-9a-f]+)?@meshtastic\.local>$/i;

const EmailRecordSchema = z.object({
  id: z.string().min(1),
  senderNodeId: z.number().int(),
  senderEmail: z.string(),
  recipientEmail: z.string(),
  subject: z.string(),
  body: z.string(),
  timestamp: z.number(),
  direction: z.enum(["outgoing", "incoming"]),
  replyToId: z.string().min(1).optional(),
  messageId: z.string().min(1).optional(),
});

const EmailStoreFileSchema = z.object({
  version: z.literal(1),
  emails: z.array(z.unknown()),
});

export type EmailStoreOptions = {
  now?: () => number;
  /** Uniform [0, 1) source for short ids. */
  random?: () => number;
};

export function localMessageId(id: string): string {
  return `<${id}@${MESSAGE_ID_DOMAIN}>`;
}

/** Pulls the bare address out of `Name <addr>` (or returns the input trimmed). */
export function extractAddress(value: string): string {
  const match = value.match(/<([^<>\s]+@[^<>\s]+)>/);
  return (match?.[1] ?? value).trim().toLowerCase();
}

/** Lowercased subject with every `re:` removed. */
export function normalizeReplySubject(subject: string): string {
  return subject.toLowerCase().replaceAll("re:", "").trim();
}

/**
 * Email records keyed by short id, persisted as `{ version: 1, emails: [...] }`.
 * Memory is authoritative; writes are serialized and failures only logged.
 */
export class EmailStore {
  private readonly records = new Map<string, EmailRecord>();
  private readonly writer: ReturnType<typeof createSerialFileWriter>;
  private readonly now: () => number;
  private readonly random: () => number;

  constructor(
    private readonly filePath: string,
    opts: EmailStoreOptions = {},
  ) {
    this.writer = createSerialFileWriter(filePath);
    this.now = opts.now ?? Date.now;
    this.random = opts.random ?? Math.random;
  }

  load(): number {
    let raw: unknown;
    try {
      raw = readJsonFile(this.filePath);
    } catch (err) {
      throw new Error(`Failed to parse email store at ${this.filePath}: ${formatErrorMessage(err)}`, {
        cause: err,
      });
    }
    if (raw === undefined) {
      return 0;
    }
    const parsed = EmailStoreFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Unsupported email store format at ${this.filePath}`);
    }
    let skipped = 0;
    for (const entry of parsed.data.emails) {
      const record = EmailRecordSchema.safeParse(entry);
      if (!record.success) {
        skipped += 1;
        continue;
      }
      const value: EmailRecord = record.data;
      if (!value.messageId) {
        value.messageId = localMessageId(value.id);
      }
      this.records.set(value.id, value);
    }
    if (skipped > 0) {
      log.warn(`skipped ${skipped} malformed email record(s)`, { path: this.filePath });
    }
    log.info(`loaded ${this.records.size} email record(s)`);
    return this.records.size;
  }

  get size(): number {
    return this.records.size;
  }

  get(id: string): EmailRecord | undefined {
    return this.records.get(id);
  }

  list(): EmailRecord[] {
    return [...this.records.values()];
  }

  /** Two uppercase letters and three digits, unique within the store. */
  generateId(): string {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
      const letters = Array.from({ length: 2 }, () => ID_LETTERS[this.pick(26)]).join("");
      const digits = String(this.pick(1000)).padStart(3, "0");
      const id = `${letters}${digits}`;
      if (!this.records.has(id)) {
        return id;
      }
    }
    throw new Error("Could not allocate a unique email id");
  }

  async add(record: EmailRecord): Promise<void> {
    this.records.set(record.id, record);
    await this.persist();
  }

  /** Stores an inbound message; `replyToId` is undefined when nothing matched. */
  async addIncoming(mail: InboundMail, botAddress: string, replyToId?: string): Promise<EmailRecord> {
    const id = this.generateId();
    const record: EmailRecord = {
      id,
      senderNodeId: UNPROCESSED_NODE_ID,
      senderEmail: mail.fromAddress,
      recipientEmail: botAddress,
      subject: mail.subject,
      body: mail.text,
      timestamp: this.now(),
      direction: "incoming",
      replyToId,
      messageId: mail.messageId || localMessageId(id),
    };
    await this.add(record);
    return record;
  }

  findByMessageId(messageId: string): EmailRecord | undefined {
    const wanted = messageId.trim();
    if (!wanted) {
      return undefined;
    }
    for (const record of this.records.values()) {
      if (record.messageId === wanted) {
        return record;
      }
    }
    const local = wanted.match(LOCAL_MESSAGE_ID_RE);
    return local?.[1] ? this.records.get(local[1].toUpperCase()) : undefined;
  }

  /** Oldest ancestor reachable through `replyToId`; the id itself when it has none. */
  findRootId(id: string): string {
    let root = id;
    let current: string | undefined = id;
    const visited = new Set<string>();
    while (current && !visited.has(current)) {
      const record = this.records.get(current);
      if (!record) {
        break;
      }
      visited.add(current);
      root = current;
      current = record.replyToId;
    }
    return root;
  }

  /** Ancestors of `id` plus every record replying to one of them, oldest first. */
  getThread(id: string): EmailRecord[] {
    const members = new Map<string, EmailRecord>();
    let current: string | undefined = id;
    while (current && !members.has(current)) {
      const record = this.records.get(current);
      if (!record) {
        break;
      }
      members.set(current, record);
      current = record.replyToId;
    }
    const ancestors = new Set(members.keys());
    for (const record of this.records.values()) {
      if (record.replyToId && ancestors.has(record.replyToId)) {
        members.set(record.id, record);
      }
    }
    return [...members.values()].sort((a, b) => a.timestamp - b.timestamp);
  }

  debugThreading(id: string): string {
    if (!this.records.has(id)) {
      return `Email ${id} not found`;
    }
    const lines: string[] = [];
    const visited = new Set<string>();
    let current: string | undefined = id;
    while (current && !visited.has(current)) {
      const record = this.records.get(current);
      if (!record) {
        break;
      }
      visited.add(current);
      lines.push(
        `ID: ${record.id}, Message-ID: ${record.messageId ?? "-"}, Reply-To: ${record.replyToId ?? "-"}`,
      );
      current = record.replyToId;
    }
    return `Email Thread Chain:\n${lines.join("\n")}`;
  }

  /**
   * Incoming, unrelayed records that point at another email. Unlinked
   * incoming records are marked invalid on the way.
   */
  async getPendingReplies(): Promise<EmailRecord[]> {
    const pending: EmailRecord[] = [];
    let invalidated = 0;
    for (const record of this.records.values()) {
      if (record.direction !== "incoming" || record.senderNodeId !== UNPROCESSED_NODE_ID) {
        continue;
      }
      if (record.replyToId) {
        pending.push(record);
      } else {
        record.senderNodeId = INVALID_NODE_ID;
        invalidated += 1;
      }
    }
    if (invalidated > 0) {
      log.info(`marked ${invalidated} unlinked incoming email(s) as invalid`);
      await this.persist();
    }
    return pending;
  }

  async markReplyProcessed(id: string, nodeId: number): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) {
      return false;
    }
    record.senderNodeId = nodeId;
    await this.persist();
    return true;
  }

  async pruneOlderThan(days = DEFAULT_EMAIL_RETENTION_DAYS): Promise<number> {
    const cutoff = this.now() - days * DAY_MS;
    let pruned = 0;
    for (const [id, record] of this.records) {
      if (record.timestamp < cutoff) {
        this.records.delete(id);
        pruned += 1;
      }
    }
    if (pruned > 0) {
      log.info(`pruned ${pruned} email(s) older than ${days} day(s)`);
      await this.persist();
    }
    return pruned;
  }

  /**
   * Finds the email an inbound message answers. Tries the bot's own header,
   * then the threading headers, then a subject match against emails sent to
   * the replying address (newest first).
   */
  findReplyTarget(mail: InboundMail): EmailRecord | undefined {
    const headerId = mail.headerEmailId?.trim();
    if (headerId) {
      const byHeader = this.records.get(headerId);
      if (byHeader) {
        return byHeader;
      }
    }

    const threadIds = [mail.inReplyTo, ...[...mail.references].reverse()];
    for (const candidate of threadIds) {
      const byThread = candidate ? this.findByMessageId(candidate) : undefined;
      if (byThread) {
        return byThread;
      }
    }

    const from = extractAddress(mail.fromAddress);
    const subject = normalizeReplySubject(mail.subject);
    if (!from || !subject) {
      return undefined;
    }
    const sent = this.list()
      .filter((record) => record.direction === "outgoing")
      .sort((a, b) => b.timestamp - a.timestamp);
    for (const record of sent) {
      const original = record.subject.toLowerCase().trim();
      if (!original || extractAddress(record.recipientEmail) !== from) {
        continue;
      }
      if (subject === original || subject.includes(original)) {
        log.debug("matched reply by subject", {
          id: record.id,
          from: redactEmailAddress(from),
        });
        return record;
      }
    }
    return undefined;
  }

  flush(): Promise<void> {
    return this.writer.flush();
  }

  private pick(bound: number): number {
    return Math.min(bound - 1, Math.floor(this.random() * bound));
  }

  private async persist(): Promise<void> {
    try {
      await this.writer.write(() => ({ version: 1, emails: this.list() }));
    } catch (err) {
      log.warn("failed to persist email store", {
        path: this.filePath,
        error: formatErrorMessage(err),
      });
    }
  }
}
