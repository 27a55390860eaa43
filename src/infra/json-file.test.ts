import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createSerialFileWriter, readJsonFile, writeJsonFileAtomic } from "./json-file.js";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "meshrelay-json-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("json-file", () => {
  it("returns undefined for missing or blank files", async () => {
    expect(readJsonFile(path.join(dir, "missing.json"))).toBeUndefined();
    const blank = path.join(dir, "blank.json");
    await fs.writeFile(blank, "  \n", "utf-8");
    expect(readJsonFile(blank)).toBeUndefined();
  });

  it("reads JSON5 with comments and trailing commas", async () => {
    const file = path.join(dir, "conf.json5");
    await fs.writeFile(file, "{ // note\n  a: 1,\n  b: [2, 3,],\n}", "utf-8");
    expect(readJsonFile(file)).toEqual({ a: 1, b: [2, 3] });
  });

  it("throws on malformed content", async () => {
    const file = path.join(dir, "bad.json");
    await fs.writeFile(file, "{ nope", "utf-8");
    expect(() => readJsonFile(file)).toThrow();
  });

  it("writes atomically and creates parent directories", async () => {
    const file = path.join(dir, "nested", "out.json");
    await writeJsonFileAtomic(file, [1, 2]);
    expect(JSON.parse(await fs.readFile(file, "utf-8"))).toEqual([1, 2]);
    const leftovers = (await fs.readdir(path.dirname(file))).filter((f) => f.endsWith(".tmp"));
    expect(leftovers).toEqual([]);
  });

  it("keeps the last scheduled snapshot when writes overlap", async () => {
    const file = path.join(dir, "serial.json");
    const writer = createSerialFileWriter(file);
    let value = 1;
    const first = writer.write(() => ({ value }));
    value = 2;
    const second = writer.write(() => ({ value }));
    await Promise.all([first, second]);
    expect(JSON.parse(await fs.readFile(file, "utf-8"))).toEqual({ value: 2 });
  });
});
