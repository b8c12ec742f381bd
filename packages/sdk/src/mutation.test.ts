import { describe, it, expect } from "vitest";
import {
  createKey,
  putMutation,
  deleteMutation,
  keyOf,
  keyId,
  sameKey,
  toTimestampMs,
  validateTimestamp,
} from "./mutation.js";
import { InvalidTimestampError } from "./errors.js";

const bytes = (text: string) => new TextEncoder().encode(text);

describe("createKey", () => {
  it("should encode text coordinates as UTF-8", () => {
    const key = createKey({ row: "é", family: "f", qualifier: "q", visibility: "v" });
    expect(key.row).toEqual(new Uint8Array([0xc3, 0xa9]));
    expect(key.family).toEqual(bytes("f"));
  });

  it("should default missing coordinates to empty", () => {
    const key = createKey({ row: "r" });
    expect(key.family).toEqual(new Uint8Array([]));
    expect(key.qualifier).toEqual(new Uint8Array([]));
    expect(key.visibility).toEqual(new Uint8Array([]));
  });

  it("should copy byte coordinates", () => {
    const row = new Uint8Array([1, 2]);
    const key = createKey({ row });
    row[0] = 9;
    expect(key.row).toEqual(new Uint8Array([1, 2]));
  });
});

describe("putMutation / deleteMutation", () => {
  const key = createKey({ row: "d1", family: "text", qualifier: "q", visibility: "public" });

  it("should build a put with value", () => {
    const mutation = putMutation(key, 1000, "hello");
    expect(mutation.kind).toBe("put");
    expect(mutation.timestampMs).toBe(1000);
    expect(mutation.value).toEqual(bytes("hello"));
    expect(sameKey(keyOf(mutation), key)).toBe(true);
  });

  it("should build a delete without value", () => {
    const mutation = deleteMutation(key, 2000);
    expect(mutation).toEqual({ kind: "delete", ...key, timestampMs: 2000 });
    expect("value" in mutation).toBe(false);
  });

  it("should reject invalid timestamps", () => {
    expect(() => putMutation(key, -1, "")).toThrow(InvalidTimestampError);
    expect(() => deleteMutation(key, 1.5)).toThrow(InvalidTimestampError);
    expect(() => validateTimestamp(Number.NaN)).toThrow(
      "Invalid timestamp: NaN (expected a non-negative integer of milliseconds)"
    );
  });
});

describe("keyId", () => {
  it("should join hex coordinates with slashes", () => {
    expect(keyId(createKey({ row: "a" }))).toBe("61///");
    expect(keyId(createKey({ row: "a", family: "b", qualifier: "c", visibility: "d" }))).toBe("61/62/63/64");
  });

  it("should distinguish keys that differ only in visibility", () => {
    const a = createKey({ row: "r", visibility: "x" });
    const b = createKey({ row: "r", visibility: "y" });
    expect(sameKey(a, b)).toBe(false);
  });
});

describe("toTimestampMs", () => {
  it("should convert a date to whole milliseconds", () => {
    expect(toTimestampMs(new Date(1700000000123))).toBe(1700000000123);
  });
});
