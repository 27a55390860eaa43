export const DEFAULT_CHUNK_MAX_BYTES = 180;
export const DEFAULT_CHUNK_MIN_BYTES = 10;

// A single UTF-8 encoded code point can take four bytes.
const MIN_CHUNK_LIMIT = 4;
const SENTENCE_END = /[.!?]\s+/g;

export type ChunkOptions = {
  /** Floor for every chunk but the last; capped at `maxBytes - 4`. */
  minBytes?: number;
};

export function utf8ByteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

function fits(text: string, maxBytes: number): boolean {
  return utf8ByteLength(text) <= maxBytes;
}

/** Longest prefix of `text` whose UTF-8 encoding fits in `maxBytes`; never cuts a code point. */
export function truncateUtf8(text: string, maxBytes: number): string {
  if (fits(text, maxBytes)) {
    return text;
  }
  const codePoints = Array.from(text);
  const offsets: number[] = [0];
  let total = 0;
  for (const cp of codePoints) {
    total += utf8ByteLength(cp);
    offsets.push(total);
  }
  let lo = 0;
  let hi = codePoints.length;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (offsets[mid] <= maxBytes) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return codePoints.slice(0, lo).join("");
}

/**
 * Sentence-like segments. Each keeps its terminal punctuation plus one
 * separator: `\n` when the original whitespace held a line break, else a space.
 */
function splitSentences(text: string): string[] {
  const segments: string[] = [];
  let start = 0;
  for (const match of text.matchAll(SENTENCE_END)) {
    const index = match.index ?? 0;
    const separator = match[0].slice(1).includes("\n") ? "\n" : " ";
    segments.push(`${text.slice(start, index + 1)}${separator}`);
    start = index + match[0].length;
  }
  if (start < text.length) {
    segments.push(text.slice(start));
  }
  return segments;
}

function trailingSeparator(segment: string): string {
  if (segment.endsWith("\n")) {
    return "\n";
  }
  return segment.endsWith(" ") ? " " : "";
}

function splitOversizedWord(word: string, maxBytes: number): string[] {
  const parts: string[] = [];
  let remaining = word;
  while (remaining) {
    const head = truncateUtf8(remaining, maxBytes);
    parts.push(head);
    remaining = remaining.slice(head.length);
  }
  return parts;
}

/** Greedy word packing. `open` is unflushed text the first words may join. */
function splitByWords(text: string, maxBytes: number, open = ""): string[] {
  const pieces: string[] = [];
  let current = open.trimEnd();
  let joiner = trailingSeparator(open) || " ";
  for (const word of text.split(/\s+/)) {
    if (!word) {
      continue;
    }
    const candidate = current ? `${current}${joiner}${word}` : word;
    joiner = " ";
    if (fits(candidate, maxBytes)) {
      current = candidate;
      continue;
    }
    if (current) {
      pieces.push(current);
    }
    if (fits(word, maxBytes)) {
      current = word;
      continue;
    }
    const parts = splitOversizedWord(word, maxBytes);
    pieces.push(...parts.slice(0, -1));
    current = parts[parts.length - 1] ?? "";
  }
  if (current) {
    pieces.push(current);
  }
  return pieces;
}

/** Shortest prefix of `word` that takes at least `bytes` bytes. */
function prefixOfAtLeast(word: string, bytes: number): string {
  let prefix = "";
  for (const cp of word) {
    prefix += cp;
    if (utf8ByteLength(prefix) >= bytes) {
      break;
    }
  }
  return prefix;
}

/**
 * Moves words from the front of `next` onto `short` until it reaches `minBytes`.
 * When the leading word cannot join whole, only enough of it to reach the
 * floor is taken.
 */
function borrowLeadingWords(
  short: string,
  next: string,
  maxBytes: number,
  minBytes: number,
): [string, string] {
  let head = short;
  let rest = next;
  while (utf8ByteLength(head) < minBytes) {
    const match = /^(\S+)(?:\s+([\s\S]+))?$/.exec(rest);
    if (!match) {
      break;
    }
    const word = match[1];
    const whole = `${head} ${word}`;
    if (match[2] !== undefined && fits(whole, maxBytes)) {
      head = whole;
      rest = match[2];
      continue;
    }
    const prefix = prefixOfAtLeast(word, minBytes - utf8ByteLength(head) - 1);
    const partial = `${head} ${prefix}`;
    if (prefix.length < word.length && fits(partial, maxBytes)) {
      head = partial;
      rest = rest.slice(prefix.length);
    }
    break;
  }
  return [head, rest];
}

function finalizeChunks(raw: string[], maxBytes: number, minBytes: number): string[] {
  const bounded = raw.flatMap((chunk) => {
    const trimmed = chunk.trim();
    if (!trimmed) {
      return [];
    }
    return fits(trimmed, maxBytes) ? [trimmed] : splitByWords(trimmed, maxBytes);
  });

  const merged: string[] = [];
  for (const chunk of bounded) {
    const prev = merged[merged.length - 1];
    if (prev === undefined || utf8ByteLength(prev) >= minBytes) {
      merged.push(chunk);
      continue;
    }
    if (fits(`${prev} ${chunk}`, maxBytes)) {
      merged[merged.length - 1] = `${prev} ${chunk}`;
      continue;
    }
    const [head, rest] = borrowLeadingWords(prev, chunk, maxBytes, minBytes);
    merged[merged.length - 1] = head;
    merged.push(rest);
  }

  // A short tail may still lean on the chunk before it.
  if (merged.length > 1) {
    const last = merged[merged.length - 1];
    const prev = merged[merged.length - 2];
    if (utf8ByteLength(last) < minBytes && fits(`${prev} ${last}`, maxBytes)) {
      merged.splice(-2, 2, `${prev} ${last}`);
    }
  }
  return merged;
}

/**
 * Splits a reply into fragments that each fit one mesh text payload.
 *
 * Sentences are packed greedily; a sentence that cannot fit alone falls back
 * to word packing, and a word that cannot fit is split at code point
 * boundaries so nothing is dropped.
 */
export function chunkText(text: string, maxBytes: number, opts: ChunkOptions = {}): string[] {
  if (!Number.isInteger(maxBytes) || maxBytes < MIN_CHUNK_LIMIT) {
    throw new RangeError(`chunk limit must be an integer >= ${MIN_CHUNK_LIMIT} bytes`);
  }
  // Room for one more four-byte character keeps the floor reachable.
  const minBytes = Math.min(opts.minBytes ?? DEFAULT_CHUNK_MIN_BYTES, maxBytes - MIN_CHUNK_LIMIT);
  const trimmed = text.trim();
  if (!trimmed) {
    return [];
  }
  if (fits(trimmed, maxBytes)) {
    return [trimmed];
  }

  const raw: string[] = [];
  let current = "";
  const flush = () => {
    const done = current.trim();
    if (done) {
      raw.push(done);
    }
    current = "";
  };

  for (const segment of splitSentences(trimmed)) {
    const candidate = current + segment;
    if (fits(candidate.trimEnd(), maxBytes)) {
      current = candidate;
      continue;
    }
    if (fits(segment.trimEnd(), maxBytes)) {
      flush();
      current = segment;
      continue;
    }
    // Word packing starts from the open text so a short sentence is not left alone.
    const pieces = splitByWords(segment, maxBytes, current);
    current = "";
    raw.push(...pieces.slice(0, -1));
    // The last word-level piece stays open so the next sentence can join it.
    current = `${pieces[pieces.length - 1] ?? ""}${trailingSeparator(segment)}`;
  }
  flush();

  return finalizeChunks(raw, maxBytes, minBytes);
}

export type ChunkStats = {
  textLength: number;
  byteSize: number;
  chunkCount: number;
  chunkedBytes: number;
  efficiency: number;
  chunks: string[];
};

export function describeChunks(text: string, maxBytes: number, opts?: ChunkOptions): ChunkStats {
  const chunks = chunkText(text, maxBytes, opts);
  const byteSize = utf8ByteLength(text);
  const chunkedBytes = chunks.reduce((sum, chunk) => sum + utf8ByteLength(chunk), 0);
  return {
    textLength: Array.from(text).length,
    byteSize,
    chunkCount: chunks.length,
    chunkedBytes,
    efficiency: byteSize > 0 ? chunkedBytes / byteSize : 0,
    chunks,
  };
}
