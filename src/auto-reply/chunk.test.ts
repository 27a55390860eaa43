import { describe, expect, it } from "vitest";
import { chunkText, describeChunks, truncateUtf8, utf8ByteLength } from "./chunk.js";

const stripWhitespace = (value: string) => value.replace(/\s+/g, "");

describe("truncateUtf8", () => {
  it("cuts at code point boundaries", () => {
    expect(truncateUtf8("aé😀b", 3)).toBe("aé");
    expect(truncateUtf8("aé😀b", 6)).toBe("aé");
    expect(truncateUtf8("aé😀b", 7)).toBe("aé😀");
    expect(truncateUtf8("short", 10)).toBe("short");
  });
});

describe("chunkText", () => {
  it("returns the trimmed input when it already fits", () => {
    expect(chunkText("  hello world  ", 180)).toEqual(["hello world"]);
  });

  it("returns nothing for blank input", () => {
    expect(chunkText("", 180)).toEqual([]);
    expect(chunkText(" \n\t ", 180)).toEqual([]);
  });

  it("rejects limits that cannot hold a four-byte character", () => {
    expect(() => chunkText("anything", 3)).toThrow(RangeError);
  });

  it("packs whole sentences greedily", () => {
    const text = "First sentence here. Second one is here. Third!";
    expect(chunkText(text, 30)).toEqual(["First sentence here.", "Second one is here. Third!"]);
  });

  it("keeps line breaks between sentences and hard-splits oversized words", () => {
    const long = `${"x".repeat(30)}.`;
    const text = `Alpha beta.\nGamma delta.\n${long}`;
    expect(chunkText(text, 30)).toEqual(["Alpha beta.\nGamma delta.", "x".repeat(30), "."]);
  });

  it("never splits a four-byte character", () => {
    const chunks = chunkText("😀".repeat(10), 6);
    expect(chunks).toHaveLength(10);
    for (const chunk of chunks) {
      expect(chunk).toBe("😀");
      expect(Buffer.from(chunk, "utf8").toString("utf8")).toBe(chunk);
    }
  });

  it("bounds every chunk by encoded bytes, not characters", () => {
    const text =
      "Привет, как дела? Сегодня солнечно и тепло. Завтра обещают дождь, возьми зонт! Погода меняется быстро.";
    const chunks = chunkText(text, 40);
    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(utf8ByteLength(chunk)).toBeLessThanOrEqual(40);
      expect(chunk.trim()).toBe(chunk);
      expect(chunk.length).toBeGreaterThan(0);
    }
    expect(stripWhitespace(chunks.join(""))).toBe(stripWhitespace(text));
  });

  it("keeps a short opening sentence with the words that follow it", () => {
    const text = "Hi! This second sentence is long enough that it cannot share a packet with the greeting.";
    const chunks = chunkText(text, 60);
    expect(chunks).toEqual([
      "Hi! This second sentence is long enough that it cannot share",
      "a packet with the greeting.",
    ]);
    expect(utf8ByteLength(chunks[0] ?? "")).toBe(60);
  });

  it("lends leading words to a short chunk before a sentence that fits alone", () => {
    expect(chunkText("Ok. The quick brown fox jumps over it.", 36)).toEqual([
      "Ok. The quick",
      "brown fox jumps over it.",
    ]);
  });

  it("splits a word only when nothing else reaches the floor", () => {
    expect(chunkText(`Go! ${"z".repeat(20)} end of it.`, 20)).toEqual([
      "Go! zzzzzz",
      "z".repeat(14),
      "end of it.",
    ]);
  });

  it("keeps every chunk but the last at or above the floor", () => {
    const words = ["a", "to", "mesh", "node", "é", "😀", "ok.", "Hi!", "x".repeat(25)];
    for (let seed = 0; seed < 200; seed += 1) {
      const text = Array.from(
        { length: 5 + (seed % 30) },
        (_, i) => words[(seed * 7 + i * i) % words.length],
      ).join(" ");
      const maxBytes = 14 + (seed % 47);
      const chunks = chunkText(text, maxBytes);
      expect(stripWhitespace(chunks.join(""))).toBe(stripWhitespace(text));
      chunks.forEach((chunk, index) => {
        expect(utf8ByteLength(chunk)).toBeLessThanOrEqual(maxBytes);
        if (index < chunks.length - 1) {
          expect(utf8ByteLength(chunk)).toBeGreaterThanOrEqual(10);
        }
      });
    }
  });

  it("caps the floor four bytes below a small limit", () => {
    expect(chunkText("abc defghij", 8)).toEqual(["abc d", "efghij"]);
  });

  it("loses no content when a sentence needs word packing", () => {
    const text =
      "This single sentence has far too many words to fit into one small radio packet at all, " +
      "so it must be packed word by word and a supercalifragilisticexpialidocious word gets split.";
    const chunks = chunkText(text, 24);
    for (const chunk of chunks) {
      expect(utf8ByteLength(chunk)).toBeLessThanOrEqual(24);
    }
    expect(stripWhitespace(chunks.join(""))).toBe(stripWhitespace(text));
  });

  // Joined with "" the words on either side of a boundary would fuse, so
  // re-chunking rejoins with a space.
  it("does not fragment further when re-chunking its own output joined with spaces", () => {
    const text =
      "The mesh is quiet tonight. Two nodes checked in from the hills. " +
      "Battery levels look fine. Next report at dawn.";
    const first = chunkText(text, 40);
    const second = chunkText(first.join(" "), 40);
    expect(second.length).toBeLessThanOrEqual(first.length);
    expect(second).toEqual(first);
  });
});

describe("describeChunks", () => {
  it("reports sizes for the preview command", () => {
    expect(describeChunks("abc", 10)).toEqual({
      textLength: 3,
      byteSize: 3,
      chunkCount: 1,
      chunkedBytes: 3,
      efficiency: 1,
      chunks: ["abc"],
    });
  });

  it("counts characters separately from bytes", () => {
    const stats = describeChunks("é😀", 10);
    expect(stats.textLength).toBe(2);
    expect(stats.byteSize).toBe(6);
  });

  it("reports zero efficiency for empty text", () => {
    expect(describeChunks("", 10).efficiency).toBe(0);
  });
});
