import type { EmailRecord } from "../email/types.js";
import type { Forecast } from "../weather/backend.js";

export const BOT_INTRO =
  "Hi! I'm your Gemini bot. Use /ai <question>, /weather, or /email commands. (/weather clear for new weather request)";

const HELP_LINES = [
  "/ai <question> — ask the AI (context-aware).",
  "/weather — try GPS, then ask for a typed location.",
  "/weather <lat,lon> — override with coordinates.",
  "/weather <City[, Country]> — override with place name.",
  "/weather clear — forget cached location.",
  "/email <email> <subject> — send an email.",
  "/email get <id> — view email details.",
  "/email thread <id> — view complete email conversation.",
  "/email reply <id> — reply to an email (subject auto-generated).",
  "/email debug <id> — debug email threading information.",
  "/bot — brief intro and tips.",
];

export const HELP_TEXT = `Commands:\n${HELP_LINES.join("\n")}`;

export const PUBLIC_NUDGES = {
  bot: "Please DM me and use /ai, /weather, or /email there. For help: send /help in DM.",
  weather: "Please DM me and send /weather (optionally add 'lat,lon' or 'City, Country').",
  help: "Help is available via DM. Send /help to me in a private message.",
  email:
    "Please DM me and send /email <recipient_email> <subject> to send an email. Use /email reply <id> to maintain email threads.",
} as const;

export type NudgeKind = keyof typeof PUBLIC_NUDGES;

export const replies = {
  aiUsage: "Send /ai followed by your question.",
  aiFailed: (reason: string) => `AI request failed: ${reason}`,

  locationCleared: "Location cleared. Send /weather again (or provide a new location).",
  locationParseError: "Sorry, I couldn't parse that location. Try 'lat,lon' or 'City, Country'.",
  gpsRequested:
    "Requesting your node GPS… If it doesn't arrive in ~20s, I'll ask for a typed location.",
  gpsTimeout: "No GPS received. Please send a location (e.g. 'lat,lon' or 'City, Country').",
  weatherFailed: (reason: string) => `Weather lookup failed: ${reason}`,

  emailDisabled: "Email is not configured on this bot.",
  emailUsage: "Email syntax: /email <recipient_email> <subject>\nExample: /email user@example.com Hello there",
  emailInvalidAddress: "Please provide a valid email address.",
  emailDraft: (to: string, subject: string) =>
    `Email draft prepared:\nTo: ${to}\nSubject: ${subject}\n\nNow send me the email body content.`,
  replyDraft: (to: string, subject: string) =>
    `Reply email draft prepared:\nTo: ${to}\nSubject: ${subject}\n\nNow send me the reply body content.`,
  draftMissing: "No email draft found. Please start over with /email command.",
  replyUsage: "Please provide email ID: /email reply <email_id>",
  emailIdRequired: (sub: "get" | "thread" | "debug") =>
    `Please provide an email ID: /email ${sub} <email_id>`,
  emailSent: (id: string) =>
    `Email sent successfully!\nEmail ID: ${id}\n\nYou can use /email get ${id} to view this email later.`,
  emailFailed: (reason: string) => `Failed to send email: ${reason}`,
  emailNotFound: (id: string) => `Email with ID ${id} not found.`,
  emailForbidden: "You don't have access to this email.",
  threadNotFound: (id: string) => `No thread found for email ${id}`,
  threadHeader: (id: string) => `Email Thread for ${id}:`,
  emailLookupFailed: (reason: string) => `Email lookup failed: ${reason}`,
} as const;

export function formatForecastMessages(label: string, forecast: Forecast): [string, string] {
  return [
    `Weather for ${label}\nNext 6 hours:\n${forecast.hourly.join("\n")}`,
    `Next 3 days:\n${forecast.daily.join("\n")}`,
  ];
}

const pad2 = (value: number) => String(value).padStart(2, "0");

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatEmailTimestamp(ms: number): string {
  const d = new Date(ms);
  return (
    `${d.getUTCFullYear()}-${pad2(d.getUTCMonth() + 1)}-${pad2(d.getUTCDate())} ` +
    `${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}:${pad2(d.getUTCSeconds())}`
  );
}

export function formatEmailDetails(email: EmailRecord): string {
  return [
    `Email ID: ${email.id}`,
    `Direction: ${email.direction === "outgoing" ? "Sent" : "Received"}`,
    `Timestamp: ${formatEmailTimestamp(email.timestamp)}`,
    `From: ${email.senderEmail}`,
    `To: ${email.recipientEmail}`,
    `Subject: ${email.subject}`,
    `Body:\n${email.body}`,
  ].join("\n");
}

export function formatThreadEntry(email: EmailRecord, index: number): string {
  const arrow = email.direction === "outgoing" ? "→" : "←";
  return (
    `${index}. ${arrow} ${email.id} - ${email.subject}\n` +
    `   From: ${email.senderEmail}\n` +
    `   To: ${email.recipientEmail}\n` +
    `   Time: ${formatEmailTimestamp(email.timestamp)}`
  );
}

/** `Re: <subject>` unless it already is a reply; empty subjects become `Re: Message`. */
export function replySubject(original: string): string {
  const trimmed = original.trim();
  if (!trimmed) {
    return "Re: Message";
  }
  return trimmed.toLowerCase().startsWith("re: ") ? trimmed : `Re: ${trimmed}`;
}
