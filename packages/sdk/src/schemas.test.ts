import { describe, it, expect } from "vitest";
import { parseRevisionRequest, parseDeleteRequest } from "./schemas.js";
import { InvalidInputError } from "./errors.js";
import { decodeKeySet } from "./keyset.js";

const text = (value: Uint8Array) => new TextDecoder().decode(value);

function counterQualifiers() {
  let n = 0;
  return () => `q${++n}`;
}

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof InvalidInputError) {
      return err.issues;
    }
    throw err;
  }
  throw new Error("expected InvalidInputError");
}

describe("parseRevisionRequest", () => {
  it("should build components and views from JSON", () => {
    const revision = parseRevisionRequest(
      {
        timestampMs: 1700000000000,
        components: [
          {
            docId: "d1",
            componentType: "text",
            content: "hello",
            views: [{ lookupTerm: "hello", family: "idx" }],
          },
        ],
      },
      { generateQualifier: counterQualifiers() }
    );

    expect(revision.timestampMs).toBe(1700000000000);
    const mutations = revision.mutations();
    expect(mutations.map((m) => text(m.row))).toEqual(["hello", "d1", "d1"]);
    expect(mutations.map((m) => text(m.qualifier))).toEqual(["q1", "q2", "q2"]);
    expect(decodeKeySet(mutations[2]!.value)).toHaveLength(3);
  });

  it("should decode base64 byte fields", () => {
    const revision = parseRevisionRequest({
      timestampMs: 1,
      components: [{ docId: "d1", componentType: "blob", qualifier: "q", content: { base64: "aGVsbG8=" } }],
    });

    expect(text(revision.components[0]!.content)).toBe("hello");
  });

  it("should let an explicit timestamp override the request", () => {
    const revision = parseRevisionRequest({ timestampMs: 1, components: [] }, { timestampMs: 99 });
    expect(revision.timestampMs).toBe(99);
  });

  it("should fall back to the clock", () => {
    const revision = parseRevisionRequest({ components: [] }, { clock: () => 555 });
    expect(revision.timestampMs).toBe(555);
  });

  it("should reject unknown keys", () => {
    const issues = issuesOf(() =>
      parseRevisionRequest({ components: [{ docId: "d1", componentType: "text", extra: 1 }] })
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^components\.0: Unrecognized key/);
  });

  it("should require docId", () => {
    const issues = issuesOf(() => parseRevisionRequest({ components: [{ componentType: "text" }] }));
    expect(issues[0]).toMatch(/^components\.0\.docId: /);
  });

  it("should reject negative timestamps", () => {
    const issues = issuesOf(() => parseRevisionRequest({ timestampMs: -1, components: [] }));
    expect(issues[0]).toMatch(/^timestampMs: /);
  });

  it("should reject malformed base64", () => {
    const issues = issuesOf(() =>
      parseRevisionRequest({
        components: [{ docId: "d1", componentType: "text", content: { base64: "not base64!" } }],
      })
    );
    expect(issues).toEqual(["components.0.content.base64: must be canonical base64"]);
  });

  it("should report the root path for non-object input", () => {
    const issues = issuesOf(() => parseRevisionRequest("nope"));
    expect(issues[0]).toMatch(/^\(root\): /);
  });
});

describe("parseDeleteRequest", () => {
  it("should delete the keys recorded in base64 manifests", () => {
    const puts = parseRevisionRequest(
      {
        timestampMs: 10,
        components: [{ docId: "d1", componentType: "text", views: [{ lookupTerm: "hello" }] }],
      },
      { generateQualifier: counterQualifiers() }
    ).mutations();
    const manifest = Buffer.from(puts[2]!.value).toString("base64");

    const deletes = parseDeleteRequest({ timestampMs: 20, manifests: [manifest] }).mutations();

    expect(deletes.map((m) => [text(m.row), text(m.family), m.kind, m.timestampMs])).toEqual([
      ["hello", "", "delete", 20],
      ["d1", "text", "delete", 20],
      ["d1", "_meta\x00text", "delete", 20],
    ]);
  });

  it("should reject manifests that are not base64", () => {
    const issues = issuesOf(() => parseDeleteRequest({ manifests: ["%%%"] }));
    expect(issues).toEqual(["manifests.0: must be canonical base64"]);
  });
});
