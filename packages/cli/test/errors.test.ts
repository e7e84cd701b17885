/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import { DirectoryError, DocumentNotFoundError, ReadOnlyError } from "@strata/core";
import { CliError, formatCliError, mapStoreErrorToExitCode } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("not found", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapStoreErrorToExitCode", () => {
    it("should map a missing document to exit code 2", () => {
      expect(mapStoreErrorToExitCode(new DocumentNotFoundError("file_id=abc"))).toBe(2);
    });

    it("should map other store errors to exit code 1", () => {
      expect(mapStoreErrorToExitCode(new DirectoryError("/missing"))).toBe(1);
      expect(mapStoreErrorToExitCode(new ReadOnlyError("file:///data"))).toBe(1);
    });

    it("should keep the exit code of CLI and commander errors", () => {
      expect(mapStoreErrorToExitCode(new CliError("gone", { exitCode: 2 }))).toBe(2);
      expect(mapStoreErrorToExitCode(new InvalidArgumentError("bad"))).toBe(1);
      expect(mapStoreErrorToExitCode(new CommanderError(3, "custom", "custom"))).toBe(3);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(mapStoreErrorToExitCode(new Error("unknown"))).toBe(1);
      expect(mapStoreErrorToExitCode("string error")).toBe(1);
      expect(mapStoreErrorToExitCode(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      const err = new Error("test error");
      expect(formatCliError(err)).toBe("test error");
    });

    it("should truncate long messages", () => {
      const longMessage = "x".repeat(3000);
      const err = new Error(longMessage);
      const formatted = formatCliError(err);
      expect(formatted.length).toBeLessThan(2100);
      expect(formatted).toContain("(truncated)");
    });

    it("should include cause in verbose mode", () => {
      const err = new Error("wrapper", { cause: new Error("underlying") });

      const formatted = formatCliError(err, true);
      expect(formatted.split("\n").slice(0, 2)).toEqual(["wrapper", "  Cause: Error: underlying"]);
    });

    it("should include stack in verbose mode", () => {
      const err = new Error("test");
      const formatted = formatCliError(err, true);
      expect(formatted).toContain("Error: test");
    });

    it("should not include stack in non-verbose mode", () => {
      const err = new Error("test");
      const formatted = formatCliError(err, false);
      expect(formatted).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
