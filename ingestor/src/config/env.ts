import * as dotenv from "dotenv";
import * as path from "path";
import {
  createDatabaseConfig,
  createRedisConfig,
  createServiceConfig,
  parseEnvArray,
  parseEnvBoolean,
  parseEnvNumber,
} from "@listingtrail/shared-utils";

// Load environment variables from .env file
dotenv.config();

const service = createServiceConfig();

export const cfg = {
  mode: service.mode,
  logLevel: service.logLevel,
  store: (process.env.STORE ?? "MEMORY").toUpperCase(), // MEMORY|SQL
  inputDir:
    process.env.INPUT_DIR ?? path.join(__dirname, "../../fixtures"),
  sources: parseEnvArray("SOURCES"), // empty = every registered source
  watch: parseEnvBoolean("WATCH", false),
  pollIntervalMs: parseEnvNumber("POLL_INTERVAL_MS", 300000), // 5 minutes default
  maxRetries: parseEnvNumber("MAX_RETRIES", 3),
  backoffMs: parseEnvNumber("BACKOFF_MS", 5000),
  maxConflictRetries: parseEnvNumber("MAX_CONFLICT_RETRIES", 3),
  conflictRetryDelayMs: parseEnvNumber("CONFLICT_RETRY_DELAY_MS", 50),
  lockTimeoutMs: parseEnvNumber("LOCK_TIMEOUT_MS", 10000),
};

export const dbCfg = createDatabaseConfig("ingestor");

export const redisCfg = createRedisConfig();

export const busCfg = {
  adapter: (process.env.BUS_ADAPTER ?? "LOG").toUpperCase(), // LOG|MEMORY|REDIS
};

const STORES = ["MEMORY", "SQL"];
const BUSES = ["LOG", "MEMORY", "REDIS"];

// Validation
export function validateConfig(): void {
  if (!STORES.includes(cfg.store)) {
    throw new Error(`Unknown STORE: ${cfg.store} (expected ${STORES.join("|")})`);
  }

  if (!BUSES.includes(busCfg.adapter)) {
    throw new Error(
      `Unknown BUS_ADAPTER: ${busCfg.adapter} (expected ${BUSES.join("|")})`
    );
  }

  if (cfg.store === "SQL" && !dbCfg.host) {
    throw new Error("DB_HOST is required when using SQL store");
  }

  if (busCfg.adapter === "REDIS" && !redisCfg.url) {
    throw new Error("REDIS_URL is required when using REDIS bus");
  }

  if (cfg.lockTimeoutMs <= 0) {
    throw new Error("LOCK_TIMEOUT_MS must be positive");
  }
}
