export type EmailDirection = "outgoing" | "incoming";

/** Incoming records that are not yet relayed carry this node id. */
export const UNPROCESSED_NODE_ID = 0;
/** Incoming records that could not be linked to an outgoing email. */
export const INVALID_NODE_ID = -1;

export type EmailRecord = {
  id: string;
  /**
   * Outgoing: the mesh node that wrote it. Incoming: the node it was relayed
   * to, or UNPROCESSED_NODE_ID / INVALID_NODE_ID.
   */
  senderNodeId: number;
  senderEmail: string;
  recipientEmail: string;
  subject: string;
  body: string;
  /** Epoch milliseconds. */
  timestamp: number;
  direction: EmailDirection;
  replyToId?: string;
  messageId?: string;
};

export type SendEmailParams = {
  senderNodeId: number;
  recipientEmail: string;
  subject: string;
  body: string;
  replyToId?: string;
};

/** A parsed inbound message, independent of the mailbox library. */
export type InboundMail = {
  fromAddress: string;
  subject: string;
  text: string;
  messageId?: string;
  inReplyTo?: string;
  references: string[];
  /** Value of the X-Meshtastic-Email-ID header, when the reply kept it. */
  headerEmailId?: string;
};

/** What the dispatcher and the reply relay need from the email side. */
export type EmailService = {
  /** Resolves with the new record id; rejects with a readable reason. */
  sendEmail: (params: SendEmailParams) => Promise<string>;
  getEmail: (id: string) => Promise<EmailRecord | undefined>;
  getThread: (id: string) => Promise<EmailRecord[]>;
  debugThreading: (id: string) => Promise<string>;
  getPendingReplies: () => Promise<EmailRecord[]>;
  markReplyProcessed: (id: string, nodeId: number) => Promise<void>;
};
