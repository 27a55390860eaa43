import { FOOTER_SENTINEL } from "./service.js";

const HEADER_LINE_RE = /^(from|sent|to|subject|date|message-id|in-reply-to|references):/i;
const ATTRIBUTION_RE = /^on\s.*wrote:\s*$|wrote:\s*$/i;
const FALLBACK_CHARS = 200;
const MIN_CLEAN_CHARS = 5;

/**
 * Reduces an email reply to the text the person actually wrote: quoted
 * history, attribution lines, header echoes and our own footer are removed.
 */
export function cleanReplyBody(body: string): string {
  if (!body) {
    return "";
  }
  const sentinel = FOOTER_SENTINEL.toLowerCase();
  const kept: string[] = [];
  for (const line of body.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.toLowerCase().includes(sentinel)) {
      break;
    }
    if (!trimmed || trimmed.startsWith(">")) {
      continue;
    }
    if (HEADER_LINE_RE.test(trimmed) || ATTRIBUTION_RE.test(trimmed)) {
      continue;
    }
    kept.push(line.trimEnd());
  }
  // Separator that precedes the footer.
  while (kept.length > 0 && /^-{2,}$/.test(kept[kept.length - 1]?.trim() ?? "")) {
    kept.pop();
  }
  const result = kept.join("\n").trim();
  if (result.length >= MIN_CLEAN_CHARS) {
    return result;
  }
  const fallback = body.slice(0, FALLBACK_CHARS).trim();
  return body.length > FALLBACK_CHARS ? `${fallback}...` : fallback;
}
