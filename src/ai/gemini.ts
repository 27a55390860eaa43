import { setTimeout as delay } from "node:timers/promises";
import { z } from "zod";
import { formatErrorMessage } from "../infra/errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import { fetchJsonWithTimeout } from "../utils/fetch-timeout.js";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com/v1beta";
export const DEFAULT_GEMINI_MODEL = "gemini-1.5-flash";

const MAX_ATTEMPTS = 3;
const RETRY_DELAY_MS = 1000;
const MIN_REPLY_CHARS = 200;
const MAX_REPLY_CHARS = 600;
const IDEAL_LOW = 250;
const IDEAL_HIGH = 450;

export const GENERATION_CONFIG = {
  temperature: 0.6,
  topP: 0.8,
  topK: 40,
  maxOutputTokens: 200,
} as const;

export const BREVITY_PREAMBLE = [
  "You are a Meshtastic DM bot with strict brevity rules.",
  `- Aim for ~${IDEAL_LOW}-${IDEAL_HIGH} characters total.`,
  `- Never under ${MIN_REPLY_CHARS} chars; never over ${MAX_REPLY_CHARS} chars.`,
  "- 1-3 short bullet points OR one concise paragraph.",
  "- No greetings/preamble/fluff; deliver facts/steps.",
  "- If listing steps, use '- <step>'.",
].join("\n");

const CONCISE_SUFFIX =
  `(Reply concisely per rules: ~${IDEAL_LOW}-${IDEAL_HIGH} chars total; never under ${MIN_REPLY_CHARS} ` +
  `or over ${MAX_REPLY_CHARS}; use 1-3 short bullets or a compact paragraph; no fluff.)`;

const EXPAND_PROMPT =
  `Please expand the previous answer to roughly ${IDEAL_LOW}-${IDEAL_HIGH} characters. ` +
  "Do not add fluff; add only essential specifics.";

const FALLBACK_REPLY = "I'm having trouble responding right now. Please try again.";

export type AiBackend = {
  generateReply: (userId: string, prompt: string) => Promise<string>;
};

type ChatTurn = {
  role: "user" | "model";
  parts: Array<{ text: string }>;
};

const GenerateContentResponseSchema = z
  .object({
    candidates: z
      .array(
        z
          .object({
            content: z
              .object({ parts: z.array(z.object({ text: z.string().optional() }).passthrough()).optional() })
              .passthrough()
              .optional(),
          })
          .passthrough(),
      )
      .optional(),
    promptFeedback: z.object({ blockReason: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type GeminiBackendOptions = {
  apiKey: string;
  model?: string;
  timeoutMs: number;
  /** User/model exchanges kept per user, not counting the preamble. */
  maxHistoryTurns: number;
  baseUrl?: string;
  fetchFn?: typeof fetch;
  sleep?: (ms: number) => Promise<unknown>;
  log?: SubsystemLogger;
};

export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

/** Cuts at the last sentence-ish boundary before `maxChars`, else hard-cuts. */
export function trimToMaxChars(text: string, maxChars = MAX_REPLY_CHARS): string {
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) {
    return trimmed;
  }
  let cut = -1;
  for (const boundary of [". ", "! ", "? ", "\n", " - "]) {
    const index = trimmed.lastIndexOf(boundary, maxChars - 1);
    if (index !== -1) {
      cut = Math.max(cut, index + boundary.trim().length);
    }
  }
  if (cut > 0) {
    return trimmed.slice(0, cut).trim();
  }
  return trimmed.slice(0, maxChars).trimEnd();
}

function userTurn(text: string): ChatTurn {
  return { role: "user", parts: [{ text }] };
}

function modelTurn(text: string): ChatTurn {
  return { role: "model", parts: [{ text }] };
}

/**
 * Gemini REST chat with a history per mesh user. Replies are kept within a
 * few mesh frames: short answers get one expansion request, long ones are
 * trimmed at a sentence boundary.
 */
export function createGeminiBackend(opts: GeminiBackendOptions): AiBackend {
  const log = opts.log ?? createSubsystemLogger("ai/gemini");
  const model = opts.model?.trim() || DEFAULT_GEMINI_MODEL;
  const baseUrl = (opts.baseUrl ?? GEMINI_BASE_URL).replace(/\/+$/, "");
  const sleep = opts.sleep ?? ((ms: number) => delay(ms));
  const histories = new Map<string, ChatTurn[]>();
  const preamble: ChatTurn[] = [userTurn(BREVITY_PREAMBLE), modelTurn("OK")];

  const historyFor = (userId: string): ChatTurn[] => {
    const existing = histories.get(userId);
    if (existing) {
      return existing;
    }
    const created = [...preamble];
    histories.set(userId, created);
    return created;
  };

  const remember = (userId: string, prompt: string, reply: string) => {
    const history = historyFor(userId);
    history.push(userTurn(prompt), modelTurn(reply));
    const limit = preamble.length + Math.max(1, opts.maxHistoryTurns) * 2;
    if (history.length > limit) {
      history.splice(preamble.length, history.length - limit);
    }
  };

  const request = async (contents: ChatTurn[]): Promise<string> => {
    const body = await fetchJsonWithTimeout({
      url: `${baseUrl}/models/${encodeURIComponent(model)}:generateContent`,
      init: {
        method: "POST",
        headers: { "Content-Type": "application/json", "x-goog-api-key": opts.apiKey },
        body: JSON.stringify({ contents, generationConfig: GENERATION_CONFIG }),
      },
      timeoutMs: opts.timeoutMs,
      label: "Gemini",
      fetchFn: opts.fetchFn,
    });
    const parsed = GenerateContentResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error("Gemini returned an unexpected response");
    }
    const blockReason = parsed.data.promptFeedback?.blockReason;
    if (blockReason) {
      throw new Error(`Gemini blocked the prompt: ${blockReason}`);
    }
    const parts = parsed.data.candidates?.[0]?.content?.parts ?? [];
    return parts
      .map((part) => part.text ?? "")
      .filter(Boolean)
      .join("\n");
  };

  const ensureLengthBounds = async (userId: string, first: string): Promise<string> => {
    let text = collapseWhitespace(first);
    if (text.length < MIN_REPLY_CHARS) {
      try {
        const expanded = collapseWhitespace(
          await request([...historyFor(userId), userTurn(EXPAND_PROMPT)]),
        );
        if (expanded) {
          remember(userId, EXPAND_PROMPT, expanded);
          text = expanded;
        }
      } catch (err) {
        log.warn("expansion request failed", { error: formatErrorMessage(err) });
      }
    }
    return text.length > MAX_REPLY_CHARS ? trimToMaxChars(text) : text;
  };

  const generateReply = async (userId: string, prompt: string): Promise<string> => {
    const concise = `${prompt}\n\n${CONCISE_SUFFIX}`;
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
      try {
        const raw = (await request([...historyFor(userId), userTurn(concise)])).trim();
        if (raw) {
          remember(userId, concise, raw);
          const bounded = await ensureLengthBounds(userId, raw);
          log.info(`reply ready (attempt ${attempt})`, { chars: bounded.length });
          return bounded;
        }
        log.warn(`empty reply (attempt ${attempt})`);
      } catch (err) {
        log.warn(`request failed (attempt ${attempt})`, { error: formatErrorMessage(err) });
        if (attempt >= MAX_ATTEMPTS) {
          throw new Error(
            `AI generation failed after ${MAX_ATTEMPTS} attempts: ${formatErrorMessage(err)}`,
            { cause: err },
          );
        }
        await sleep(RETRY_DELAY_MS * attempt);
      }
    }
    return FALLBACK_REPLY;
  };

  return { generateReply };
}
