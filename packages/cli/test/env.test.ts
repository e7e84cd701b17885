/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { homedir } from "node:os";
import * as path from "node:path";
import { isVerbose, resolveRoot } from "../src/lib/env.js";

describe("environment resolution", () => {
  let originalEnv: string | undefined;

  beforeEach(() => {
    originalEnv = process.env.STRATA_ROOT;
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.STRATA_ROOT = originalEnv;
    } else {
      delete process.env.STRATA_ROOT;
    }
  });

  describe("resolveRoot", () => {
    it("should use CLI option when provided", () => {
      process.env.STRATA_ROOT = "/env/path";
      const result = resolveRoot("/cli/path");
      expect(result).toBe(path.resolve("/cli/path"));
    });

    it("should use STRATA_ROOT env var when CLI option not provided", () => {
      process.env.STRATA_ROOT = "/env/path";
      const result = resolveRoot();
      expect(result).toBe(path.resolve("/env/path"));
    });

    it("should use default ./data when neither provided", () => {
      delete process.env.STRATA_ROOT;
      const result = resolveRoot();
      expect(result).toBe(path.resolve("./data"));
    });

    it("should resolve relative paths to absolute", () => {
      const result = resolveRoot("./my-data");
      expect(path.isAbsolute(result)).toBe(true);
      expect(result).toContain("my-data");
    });

    it("should handle absolute paths", () => {
      const result = resolveRoot("/absolute/path");
      expect(result).toBe("/absolute/path");
    });
  });

  describe("tilde expansion", () => {
    it("should expand a leading ~ to the home directory", () => {
      expect(resolveRoot("~")).toBe(homedir());
      expect(resolveRoot("~/runs")).toBe(path.join(homedir(), "runs"));
    });

    it("should leave ~user paths alone", () => {
      expect(resolveRoot("~other/runs")).toBe(path.resolve("~other/runs"));
    });
  });

  describe("isVerbose", () => {
    afterEach(() => {
      delete process.env.STRATA_CLI_DEBUG;
    });

    it("should only turn on for STRATA_CLI_DEBUG=1", () => {
      delete process.env.STRATA_CLI_DEBUG;
      expect(isVerbose()).toBe(false);
      process.env.STRATA_CLI_DEBUG = "true";
      expect(isVerbose()).toBe(false);
      process.env.STRATA_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
