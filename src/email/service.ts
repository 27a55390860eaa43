import crypto from "node:crypto";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { redactEmailAddress } from "../logging/redact-email.js";
import type { MailTransport } from "./smtp.js";
import { extractAddress, localMessageId, MESSAGE_ID_DOMAIN, type EmailStore } from "./store.js";
import type { EmailRecord, EmailService, InboundMail, SendEmailParams } from "./types.js";

const log = createSubsystemLogger("email/relay");

export const SENDER_ID_HEADER = "X-Meshtastic-Sender-ID";
export const EMAIL_ID_HEADER = "X-Meshtastic-Email-ID";
export const FOOTER_SENTINEL = "This message was forwarded from a bot on the Meshtastic network";

const SYSTEM_SENDER_MARKERS = ["no-reply", "noreply", "mailer-daemon", "postmaster"];

export function formatFooter(senderNodeId: number): string {
  return (
    `\n\n---\n${FOOTER_SENTINEL}.\n` +
    `Originally crafted by Meshtastic user ID: ${senderNodeId}\n` +
    "You can reply to this email to send a message back to the Meshtastic user."
  );
}

export function meshSenderAddress(senderNodeId: number): string {
  return `user_${senderNodeId}@${MESSAGE_ID_DOMAIN}`;
}

export type RelayEmailService = EmailService & {
  /** Stores an inbound message and links it to the email it answers. */
  ingestInbound: (mail: InboundMail) => Promise<EmailRecord | null>;
};

export type EmailServiceOptions = {
  store: EmailStore;
  transport: MailTransport;
  botAddress: string;
  now?: () => number;
  randomHex?: () => string;
};

export function createEmailService(opts: EmailServiceOptions): RelayEmailService {
  const { store, transport } = opts;
  const botAddress = opts.botAddress.trim().toLowerCase();
  const now = opts.now ?? Date.now;
  const randomHex = opts.randomHex ?? (() => crypto.randomBytes(4).toString("hex"));

  // Replies always thread against the first email of the conversation.
  const resolveThreadRoot = (replyToId: string): string => {
    const rootId = store.findRootId(replyToId);
    return store.get(rootId)?.messageId ?? localMessageId(rootId);
  };

  const sendEmail = async (params: SendEmailParams): Promise<string> => {
    const id = store.generateId();
    const messageId = `<${id}.${randomHex()}@${MESSAGE_ID_DOMAIN}>`;
    const threadRoot = params.replyToId ? resolveThreadRoot(params.replyToId) : undefined;

    await transport.sendMail({
      from: opts.botAddress,
      to: params.recipientEmail,
      subject: params.subject,
      text: `${params.body}${formatFooter(params.senderNodeId)}`,
      messageId,
      headers: {
        [SENDER_ID_HEADER]: String(params.senderNodeId),
        [EMAIL_ID_HEADER]: id,
      },
      inReplyTo: threadRoot,
      references: threadRoot,
    });

    await store.add({
      id,
      senderNodeId: params.senderNodeId,
      senderEmail: meshSenderAddress(params.senderNodeId),
      recipientEmail: params.recipientEmail,
      subject: params.subject,
      body: params.body.trim(),
      timestamp: now(),
      direction: "outgoing",
      replyToId: params.replyToId,
      messageId,
    });
    log.info(`email ${id} sent`, {
      to: redactEmailAddress(params.recipientEmail),
      replyTo: params.replyToId,
    });
    return id;
  };

  const ingestInbound = async (mail: InboundMail): Promise<EmailRecord | null> => {
    const from = extractAddress(mail.fromAddress);
    if (!from || from === botAddress) {
      return null;
    }
    if (SYSTEM_SENDER_MARKERS.some((marker) => from.includes(marker))) {
      log.debug("ignoring system email", { from: redactEmailAddress(from) });
      return null;
    }
    const target = store.findReplyTarget(mail);
    const record = await store.addIncoming({ ...mail, fromAddress: from }, botAddress, target?.id);
    if (target) {
      log.info(`stored reply ${record.id} to email ${target.id}`, {
        from: redactEmailAddress(from),
      });
    } else {
      log.info(`stored unlinked email ${record.id}`, { from: redactEmailAddress(from) });
    }
    return record;
  };

  return {
    sendEmail,
    getEmail: async (id) => store.get(id),
    getThread: async (id) => store.getThread(id),
    debugThreading: async (id) => store.debugThreading(id),
    getPendingReplies: () => store.getPendingReplies(),
    markReplyProcessed: async (id, nodeId) => {
      await store.markReplyProcessed(id, nodeId);
    },
    ingestInbound,
  };
}
