import { ImapFlow } from "imapflow";
import mailparser, { type ParsedMail } from "mailparser";
import type { EmailSettings } from "../config/config.js";
import { formatErrorMessage } from "../infra/errors.js";
import { createIntervalTask, type IntervalTask } from "../infra/interval-task.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { EMAIL_ID_HEADER } from "./service.js";
import type { InboundMail } from "./types.js";

export type InboxMonitorOptions = {
  settings: EmailSettings;
  ingest: (mail: InboundMail) => Promise<unknown>;
  log?: SubsystemLogger;
};

function headerText(parsed: ParsedMail, name: string): string | undefined {
  const value = parsed.headers.get(name.toLowerCase());
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function toReferenceList(value: string | string[] | undefined): string[] {
  if (!value) {
    return [];
  }
  const list = Array.isArray(value) ? value : value.split(/\s+/);
  return list.map((entry) => entry.trim()).filter(Boolean);
}

export function toInboundMail(parsed: ParsedMail): InboundMail | null {
  const fromAddress = parsed.from?.value[0]?.address?.trim();
  if (!fromAddress) {
    return null;
  }
  return {
    fromAddress,
    subject: parsed.subject ?? "",
    text: parsed.text ?? "",
    messageId: parsed.messageId?.trim() || undefined,
    inReplyTo: parsed.inReplyTo?.trim() || undefined,
    references: toReferenceList(parsed.references),
    headerEmailId: headerText(parsed, EMAIL_ID_HEADER),
  };
}

/**
 * Polls the INBOX for unseen messages, hands each to `ingest` and flags it
 * seen. One IMAP connection per poll.
 */
export function createInboxMonitor(opts: InboxMonitorOptions): IntervalTask & {
  checkOnce: () => Promise<number>;
} {
  const log = opts.log ?? createSubsystemLogger("email/inbox");
  const { settings } = opts;

  const checkOnce = async (): Promise<number> => {
    const client = new ImapFlow({
      host: settings.imapHost,
      port: settings.imapPort,
      secure: settings.imapPort === 993,
      auth: { user: settings.address, pass: settings.password },
      logger: false,
    });
    let ingested = 0;
    await client.connect();
    try {
      const lock = await client.getMailboxLock("INBOX");
      try {
        const found = await client.search({ seen: false }, { uid: true });
        const uids = Array.isArray(found) ? found : [];
        for (const uid of uids) {
          const message = await client.fetchOne(String(uid), { source: true }, { uid: true });
          const source = message ? message.source : undefined;
          if (source) {
            try {
              const mail = toInboundMail(await mailparser.simpleParser(source));
              if (mail) {
                await opts.ingest(mail);
                ingested += 1;
              }
            } catch (err) {
              log.warn("failed to ingest message", { uid, error: formatErrorMessage(err) });
            }
          }
          await client.messageFlagsAdd(String(uid), ["\\Seen"], { uid: true });
        }
      } finally {
        lock.release();
      }
    } finally {
      await client.logout();
    }
    if (ingested > 0) {
      log.info(`ingested ${ingested} new message(s)`);
    }
    return ingested;
  };

  const task = createIntervalTask({
    name: "inbox poll",
    intervalMs: settings.pollMs,
    run: async () => {
      await checkOnce();
    },
    log,
  });
  return { ...task, checkOnce };
}
