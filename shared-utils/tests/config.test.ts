import { afterEach, describe, expect, it } from "vitest";
import {
  createServiceConfig,
  parseEnvArray,
  parseEnvNumber,
  parseLogLevel,
} from "../src/config";

describe("Config utilities", () => {
  const original = { ...process.env };

  afterEach(() => {
    process.env = { ...original };
  });

  describe("parseLogLevel", () => {
    it("should accept known levels regardless of case", () => {
      expect(parseLogLevel("DEBUG")).toBe("debug");
      expect(parseLogLevel(" warn ")).toBe("warn");
    });

    it("should fall back to info", () => {
      expect(parseLogLevel(undefined)).toBe("info");
      expect(parseLogLevel("verbose")).toBe("info");
    });
  });

  describe("parseEnvNumber", () => {
    it("should read a numeric variable", () => {
      process.env.TEST_PORT = "8080";
      expect(parseEnvNumber("TEST_PORT", 3000)).toBe(8080);
    });

    it("should use the default when unset or blank", () => {
      delete process.env.TEST_PORT;
      expect(parseEnvNumber("TEST_PORT", 3000)).toBe(3000);
      process.env.TEST_PORT = "  ";
      expect(parseEnvNumber("TEST_PORT", 3000)).toBe(3000);
    });

    it("should throw on a non-numeric value", () => {
      process.env.TEST_PORT = "abc";
      expect(() => parseEnvNumber("TEST_PORT", 3000)).toThrow("Invalid number in TEST_PORT: abc");
    });
  });

  describe("parseEnvArray", () => {
    it("should split and trim comma-separated values", () => {
      process.env.TEST_ORIGINS = "http://a.test, http://b.test,,";
      expect(parseEnvArray("TEST_ORIGINS")).toEqual(["http://a.test", "http://b.test"]);
    });

    it("should return the default when unset", () => {
      delete process.env.TEST_ORIGINS;
      expect(parseEnvArray("TEST_ORIGINS", ["*"])).toEqual(["*"]);
    });
  });

  describe("createServiceConfig", () => {
    it("should read mode, log level and port", () => {
      process.env.MODE = "production";
      process.env.LOG_LEVEL = "error";
      process.env.PORT = "4000";

      expect(createServiceConfig(3004)).toEqual({
        mode: "production",
        logLevel: "error",
        port: 4000,
      });
    });

    it("should leave the port out without a default", () => {
      expect(createServiceConfig().port).toBeUndefined();
    });
  });
});
