/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { MalformedManifestError, InvalidInputError } from "@kvdoc/sdk";
import { CliError, mapSdkErrorToExitCode, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("bad manifest", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapSdkErrorToExitCode", () => {
    it("should map MalformedManifestError to exit code 2", () => {
      expect(mapSdkErrorToExitCode(new MalformedManifestError("truncated", 0))).toBe(2);
    });

    it("should map validation errors to exit code 1", () => {
      expect(mapSdkErrorToExitCode(new InvalidInputError(["components: Required"]))).toBe(1);
    });

    it("should prefer a CliError's own exit code", () => {
      expect(mapSdkErrorToExitCode(new CliError("x", { exitCode: 7 }))).toBe(7);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapSdkErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapSdkErrorToExitCode("string error")).toBe(1);
      expect(mapSdkErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      expect(formatCliError(new Error("test error"))).toBe("test error");
    });

    it("should truncate long messages", () => {
      const formatted = formatCliError(new Error("x".repeat(3000)));
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include cause in verbose mode", () => {
      const err = new MalformedManifestError("truncated", 1, { cause: new Error("index out of range") });
      const formatted = formatCliError(err, true);
      expect(formatted.split("\n").slice(0, 2)).toEqual([
        "Malformed manifest at index 1: truncated",
        "  Cause: index out of range",
      ]);
    });

    it("should not include cause or stack in non-verbose mode", () => {
      const err = new Error("test", { cause: new Error("hidden") });
      expect(formatCliError(err, false)).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
