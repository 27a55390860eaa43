import crypto from "node:crypto";

const HASH_CHARS = 8;

function hashToken(value: string): string {
  return `sha256:${crypto.createHash("sha256").update(value).digest("hex").slice(0, HASH_CHARS)}`;
}

/**
 * Log-safe form of an email address: the mailbox is hashed, the domain stays
 * readable. Strings that are not addresses are hashed whole.
 */
export function redactEmailAddress(value: string | undefined): string {
  const trimmed = value?.trim().toLowerCase();
  if (!trimmed) {
    return "-";
  }
  const at = trimmed.lastIndexOf("@");
  if (at <= 0 || at === trimmed.length - 1) {
    return hashToken(trimmed);
  }
  return `${hashToken(trimmed.slice(0, at))}@${trimmed.slice(at + 1)}`;
}
