import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import { formatChunkPreview, buildProgram } from "./program.js";

function createRuntime() {
  return {
    log: vi.fn(),
    error: vi.fn(),
    exit: vi.fn((code: number) => {
      throw new Error(`exit ${code}`);
    }),
    waitForShutdown: vi.fn(async () => "SIGTERM" as const),
  };
}

describe("formatChunkPreview", () => {
  it("summarises a single-frame reply", () => {
    expect(formatChunkPreview("hello world", 180)).toBe(
      [
        "chars: 11, bytes: 11, chunks: 1 (max 180 B)",
        "efficiency: 100.0%",
        "[1/1] hello world",
      ].join("\n"),
    );
  });
});

describe("meshrelay CLI", () => {
  it("prints a chunk preview", async () => {
    const runtime = createRuntime();
    await buildProgram(runtime).parseAsync(["node", "meshrelay", "chunk", "hello", "world"]);
    expect(runtime.log).toHaveBeenCalledWith(formatChunkPreview("hello world", 180));
  });

  it("rejects a bad --bytes value", async () => {
    const runtime = createRuntime();
    await expect(
      buildProgram(runtime).parseAsync(["node", "meshrelay", "chunk", "hi", "--bytes", "0"]),
    ).rejects.toThrow("exit 1");
    expect(runtime.error).toHaveBeenCalledWith('--bytes must be a positive integer (got "0")');
  });

  it("prints the config with secrets redacted", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "meshrelay-cli-"));
    try {
      const configPath = path.join(dir, "meshrelay.json5");
      await fs.writeFile(configPath, "{ ai: { apiKey: 'test-secret' }, mesh: { region: 'US' } }", "utf-8");
      const runtime = createRuntime();
      await buildProgram(runtime).parseAsync(["node", "meshrelay", "config", "--config", configPath]);
      expect(runtime.log).toHaveBeenNthCalledWith(1, `# ${configPath}`);
      const printed: unknown = JSON.parse(String(runtime.log.mock.calls[1]?.[0]));
      expect(printed).toMatchObject({ ai: { apiKey: "__REDACTED__" }, mesh: { region: "US" } });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
