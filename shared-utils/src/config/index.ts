/**
 * Environment-backed configuration shared by the listing trail services.
 * Every reader takes the environment as a parameter so tests can pass a
 * plain object.
 */

type Env = NodeJS.ProcessEnv;

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
}

export interface RedisConfig {
  url: string;
}

export interface ServiceConfig {
  mode: string;
  logLevel: string;
}

/**
 * Postgres connection settings. Credentials and database name default to
 * the service's own name.
 */
export function createDatabaseConfig(
  serviceName: string,
  env: Env = process.env
): DatabaseConfig {
  return {
    host: env.DB_HOST || "localhost",
    port: parseEnvNumber("DB_PORT", 5432, env),
    user: env.DB_USER || serviceName,
    password: env.DB_PASSWORD || serviceName,
    name: env.DB_NAME || `${serviceName}_dev`,
  };
}

export function createRedisConfig(env: Env = process.env): RedisConfig {
  return { url: env.REDIS_URL || "redis://localhost:6379" };
}

export function createServiceConfig(env: Env = process.env): ServiceConfig {
  return {
    mode: env.MODE || env.NODE_ENV || "development",
    logLevel: env.LOG_LEVEL || "info",
  };
}

/**
 * Parse comma-separated environment variable into array
 */
export function parseEnvArray(
  envVar: string,
  defaultValue: string[] = [],
  env: Env = process.env
): string[] {
  const value = env[envVar];
  if (!value) return defaultValue;

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}

export function parseEnvNumber(
  envVar: string,
  defaultValue: number,
  env: Env = process.env
): number {
  const value = env[envVar];
  if (value === undefined || value.trim() === "") return defaultValue;

  const num = Number(value);
  if (isNaN(num)) {
    throw new Error(`Invalid number in ${envVar}: ${value}`);
  }
  return num;
}

/**
 * "true"/"1"/"yes" (any case) turn a flag on, "false"/"0"/"no" off
 */
export function parseEnvBoolean(
  envVar: string,
  defaultValue: boolean,
  env: Env = process.env
): boolean {
  const value = env[envVar]?.trim().toLowerCase();
  if (!value) return defaultValue;

  if (["true", "1", "yes"].includes(value)) return true;
  if (["false", "0", "no"].includes(value)) return false;
  throw new Error(`Invalid boolean in ${envVar}: ${env[envVar]}`);
}
