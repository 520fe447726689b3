import { describe, expect, it } from "vitest";
import {
  createDatabaseConfig,
  createRedisConfig,
  createServiceConfig,
  parseEnvArray,
  parseEnvBoolean,
  parseEnvNumber,
} from "../src/config";

describe("config", () => {
  describe("createDatabaseConfig", () => {
    it("should default to the service's own database", () => {
      expect(createDatabaseConfig("ingestor", {})).toEqual({
        host: "localhost",
        port: 5432,
        user: "ingestor",
        password: "ingestor",
        name: "ingestor_dev",
      });
    });

    it("should treat empty values as unset", () => {
      expect(createDatabaseConfig("ingestor", { DB_HOST: "", DB_PORT: " " }).host).toBe(
        "localhost"
      );
      expect(createDatabaseConfig("ingestor", { DB_PORT: " " }).port).toBe(5432);
    });

    it("should read overrides from the environment", () => {
      const env = {
        DB_HOST: "db.internal",
        DB_PORT: "6543",
        DB_USER: "tracker",
        DB_PASSWORD: "test-secret",
        DB_NAME: "tracker_test",
      };

      expect(createDatabaseConfig("ingestor", env)).toEqual({
        host: "db.internal",
        port: 6543,
        user: "tracker",
        password: "test-secret",
        name: "tracker_test",
      });
    });

    it("should reject a port that is not a number", () => {
      expect(() => createDatabaseConfig("ingestor", { DB_PORT: "pg" })).toThrow(
        "Invalid number in DB_PORT: pg"
      );
    });
  });

  describe("createRedisConfig", () => {
    it("should read the URL with a local default", () => {
      expect(createRedisConfig({ REDIS_URL: "redis://cache.internal:6380" })).toEqual({
        url: "redis://cache.internal:6380",
      });
      expect(createRedisConfig({})).toEqual({ url: "redis://localhost:6379" });
    });
  });

  describe("createServiceConfig", () => {
    it("should prefer MODE over NODE_ENV", () => {
      expect(
        createServiceConfig({ MODE: "worker", NODE_ENV: "production", LOG_LEVEL: "debug" })
      ).toEqual({ mode: "worker", logLevel: "debug" });
      expect(createServiceConfig({ NODE_ENV: "test" })).toEqual({
        mode: "test",
        logLevel: "info",
      });
    });
  });

  describe("parseEnvArray", () => {
    it("should split, trim and drop empty entries", () => {
      expect(parseEnvArray("SOURCES", [], { SOURCES: " realestate, ,domain " })).toEqual([
        "realestate",
        "domain",
      ]);
    });

    it("should fall back to the default when unset", () => {
      expect(parseEnvArray("SOURCES", ["domain"], {})).toEqual(["domain"]);
    });
  });

  describe("parseEnvNumber", () => {
    it("should parse numbers and fall back on empty values", () => {
      expect(parseEnvNumber("RETRIES", 3, { RETRIES: "5" })).toBe(5);
      expect(parseEnvNumber("RETRIES", 3, { RETRIES: "" })).toBe(3);
      expect(parseEnvNumber("RETRIES", 3, {})).toBe(3);
    });

    it("should reject values that are not numbers", () => {
      expect(() => parseEnvNumber("RETRIES", 3, { RETRIES: "three" })).toThrow(
        "Invalid number in RETRIES: three"
      );
    });
  });

  describe("parseEnvBoolean", () => {
    it("should read common spellings of on and off", () => {
      expect(parseEnvBoolean("WATCH", false, { WATCH: "TRUE" })).toBe(true);
      expect(parseEnvBoolean("WATCH", false, { WATCH: "1" })).toBe(true);
      expect(parseEnvBoolean("WATCH", true, { WATCH: "no" })).toBe(false);
      expect(parseEnvBoolean("WATCH", true, {})).toBe(true);
    });

    it("should reject anything else", () => {
      expect(() => parseEnvBoolean("WATCH", false, { WATCH: "sometimes" })).toThrow(
        "Invalid boolean in WATCH: sometimes"
      );
    });
  });
});
