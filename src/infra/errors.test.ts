import { describe, expect, it } from "vitest";
import { formatErrorMessage, toError } from "./errors.js";

describe("formatErrorMessage", () => {
  it("uses the message of Error instances", () => {
    expect(formatErrorMessage(new Error("boom"))).toBe("boom");
  });

  it("falls back to the error name when the message is empty", () => {
    expect(formatErrorMessage(new TypeError(""))).toBe("TypeError");
  });

  it("stringifies primitives and plain objects", () => {
    expect(formatErrorMessage("plain")).toBe("plain");
    expect(formatErrorMessage(42)).toBe("42");
    expect(formatErrorMessage({ code: "E1" })).toBe('{"code":"E1"}');
  });

  it("survives circular objects", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;
    expect(formatErrorMessage(circular)).toBe("[object Object]");
  });
});

describe("toError", () => {
  it("passes Error instances through", () => {
    const err = new Error("same");
    expect(toError(err)).toBe(err);
  });

  it("wraps other values", () => {
    expect(toError("nope").message).toBe("nope");
  });
});
