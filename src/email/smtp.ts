import nodemailer from "nodemailer";
import type { EmailSettings } from "../config/config.js";

export type OutgoingMail = {
  from: string;
  to: string;
  subject: string;
  text: string;
  messageId: string;
  headers: Record<string, string>;
  inReplyTo?: string;
  references?: string;
};

export type MailTransport = {
  sendMail: (mail: OutgoingMail) => Promise<void>;
  close: () => void;
};

/** SMTP over implicit TLS on 465, STARTTLS elsewhere. */
export function createSmtpTransport(settings: EmailSettings): MailTransport {
  const transporter = nodemailer.createTransport({
    host: settings.smtpHost,
    port: settings.smtpPort,
    secure: settings.smtpPort === 465,
    auth: { user: settings.address, pass: settings.password },
  });
  return {
    sendMail: async (mail) => {
      await transporter.sendMail({
        from: mail.from,
        to: mail.to,
        subject: mail.subject,
        text: mail.text,
        messageId: mail.messageId,
        headers: mail.headers,
        inReplyTo: mail.inReplyTo,
        references: mail.references,
      });
    },
    close: () => transporter.close(),
  };
}
