import { describe, expect, it, vi } from "vitest";
import {
  BREVITY_PREAMBLE,
  collapseWhitespace,
  createGeminiBackend,
  GENERATION_CONFIG,
  trimToMaxChars,
} from "./gemini.js";

const noopLogger = {
  subsystem: "ai/gemini",
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  child: vi.fn(),
};

// 227 characters: long enough to skip the expansion request.
const LONG = "Mesh radios relay packets hop by hop. ".repeat(6).trim();

function geminiFetch(replies: Array<string | Response>) {
  return vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = replies.shift();
    if (next instanceof Response) {
      return next;
    }
    return new Response(
      JSON.stringify({ candidates: [{ content: { parts: [{ text: next ?? "" }] } }] }),
      { status: 200 },
    );
  });
}

type SentBody = {
  contents: Array<{ role: string; parts: Array<{ text: string }> }>;
  generationConfig: unknown;
};

function sentBody(fetchFn: ReturnType<typeof geminiFetch>, call: number): SentBody {
  return JSON.parse(String(fetchFn.mock.calls[call]?.[1]?.body)) as SentBody;
}

function setup(replies: Array<string | Response>, maxHistoryTurns = 20) {
  const fetchFn = geminiFetch(replies);
  const sleep = vi.fn(async (_ms: number) => undefined);
  const backend = createGeminiBackend({
    apiKey: "test-secret",
    timeoutMs: 1000,
    maxHistoryTurns,
    fetchFn,
    sleep,
    log: noopLogger,
  });
  return { fetchFn, sleep, backend };
}

describe("createGeminiBackend", () => {
  it("starts each chat with the brevity preamble", async () => {
    const { backend, fetchFn } = setup([LONG]);
    expect(await backend.generateReply("42", "How does mesh routing work?")).toBe(LONG);

    const [url, init] = fetchFn.mock.calls[0] ?? [];
    expect(url).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-flash:generateContent",
    );
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      "x-goog-api-key": "test-secret",
    });
    const body = sentBody(fetchFn, 0);
    expect(body.generationConfig).toEqual(GENERATION_CONFIG);
    expect(body.contents.map((turn) => turn.role)).toEqual(["user", "model", "user"]);
    expect(body.contents[0]?.parts[0]?.text).toBe(BREVITY_PREAMBLE);
    expect(body.contents[2]?.parts[0]?.text.startsWith("How does mesh routing work?\n\n(Reply concisely")).toBe(
      true,
    );
  });

  it("asks once for a longer answer when the reply is short", async () => {
    const { backend, fetchFn } = setup(["Short   answer.", LONG]);
    expect(await backend.generateReply("42", "Why?")).toBe(LONG);
    expect(fetchFn).toHaveBeenCalledTimes(2);
    const expand = sentBody(fetchFn, 1).contents;
    expect(expand).toHaveLength(5);
    expect(expand[3]?.parts[0]?.text).toBe("Short   answer.");
    expect(expand[4]?.parts[0]?.text.startsWith("Please expand the previous answer")).toBe(true);
  });

  it("keeps the short answer when expansion fails", async () => {
    const { backend } = setup(["Short   answer.", new Response("nope", { status: 500 })]);
    expect(await backend.generateReply("42", "Why?")).toBe("Short answer.");
  });

  it("trims long answers at a sentence boundary", async () => {
    const long = `${"a".repeat(590)}. ${"b".repeat(50)}`;
    const { backend } = setup([long]);
    expect(await backend.generateReply("42", "Tell me everything")).toBe(`${"a".repeat(590)}.`);
  });

  it("retries with a growing delay", async () => {
    const { backend, sleep } = setup([
      new Response("busy", { status: 503 }),
      new Response("busy", { status: 503 }),
      LONG,
    ]);
    expect(await backend.generateReply("42", "Hello")).toBe(LONG);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it("gives up after three attempts", async () => {
    const { backend, sleep } = setup([
      new Response("boom", { status: 500 }),
      new Response("boom", { status: 500 }),
      new Response("boom", { status: 500 }),
    ]);
    await expect(backend.generateReply("42", "Hello")).rejects.toThrow(
      "AI generation failed after 3 attempts: Gemini HTTP 500: boom",
    );
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it("keeps a capped history per user", async () => {
    const { backend, fetchFn } = setup([LONG, LONG, LONG, LONG], 1);
    await backend.generateReply("1", "first");
    await backend.generateReply("1", "second");
    await backend.generateReply("1", "third");
    await backend.generateReply("2", "other user");
    expect(sentBody(fetchFn, 1).contents).toHaveLength(5);
    expect(sentBody(fetchFn, 2).contents).toHaveLength(5);
    expect(sentBody(fetchFn, 2).contents[2]?.parts[0]?.text.startsWith("second")).toBe(true);
    expect(sentBody(fetchFn, 3).contents).toHaveLength(3);
  });

  it("surfaces blocked prompts as errors", async () => {
    const blocked = () =>
      new Response(JSON.stringify({ promptFeedback: { blockReason: "SAFETY" } }), { status: 200 });
    const { backend } = setup([blocked(), blocked(), blocked()]);
    await expect(backend.generateReply("42", "x")).rejects.toThrow("Gemini blocked the prompt: SAFETY");
  });
});

describe("reply shaping helpers", () => {
  it("collapses whitespace", () => {
    expect(collapseWhitespace("  a\n\n b\tc  ")).toBe("a b c");
  });

  it("hard-cuts text without boundaries", () => {
    expect(trimToMaxChars("x".repeat(20), 10)).toBe("x".repeat(10));
    expect(trimToMaxChars("short", 10)).toBe("short");
  });
});
