import JSON5 from "json5";
import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";

function errorCode(err: unknown): string | null {
  return err && typeof err === "object" && "code" in err
    ? String((err as { code?: unknown }).code)
    : null;
}

/**
 * Reads a JSON (or JSON5) file. Returns `undefined` when the file does not
 * exist; parse errors are thrown so callers can decide how loud to be.
 */
export function readJsonFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return undefined;
    }
    throw err;
  }
  if (!raw.trim()) {
    return undefined;
  }
  return JSON5.parse(raw) as unknown;
}

/** Writes via temp file + rename so readers never see a partial file. */
export async function writeJsonFileAtomic(filePath: string, value: unknown): Promise<void> {
  const json = `${JSON.stringify(value, null, 2)}\n`;
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });

  // Windows: avoid atomic rename swaps (can be flaky under concurrent access).
  if (process.platform === "win32") {
    await fs.promises.writeFile(filePath, json, "utf-8");
    return;
  }

  const tmp = `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`;
  try {
    await fs.promises.writeFile(tmp, json, { mode: 0o600, encoding: "utf-8" });
    await fs.promises.rename(tmp, filePath);
  } finally {
    await fs.promises.rm(tmp, { force: true });
  }
}

/**
 * Serializes writes to one file. Each call snapshots the value when it runs,
 * so the last scheduled write always lands last.
 */
export function createSerialFileWriter(filePath: string) {
  let chain: Promise<void> = Promise.resolve();
  return {
    write(snapshot: () => unknown): Promise<void> {
      const next = chain.then(() => writeJsonFileAtomic(filePath, snapshot()));
      chain = next.catch(() => undefined);
      return next;
    },
    flush(): Promise<void> {
      return chain;
    },
  };
}
