/**
 * Shared configuration utilities
 */

import { LogLevel, parseLogLevel } from "../logger";

export interface RedisConfig {
  url: string;
  host?: string;
  port?: number;
}

export interface ServiceConfig {
  mode: string;
  logLevel: LogLevel;
}

/**
 * Create Redis configuration from environment variables
 */
export function createRedisConfig(): RedisConfig {
  const redisUrl = process.env.REDIS_URL ?? "redis://localhost:6379";

  try {
    const url = new URL(redisUrl);
    return {
      url: redisUrl,
      host: url.hostname,
      port: url.port ? parseInt(url.port, 10) : 6379,
    };
  } catch {
    // Fallback for non-URL format
    return {
      url: redisUrl,
      host: process.env.REDIS_HOST ?? "localhost",
      port: Number(process.env.REDIS_PORT ?? 6379),
    };
  }
}

/**
 * Create service configuration from environment variables
 */
export function createServiceConfig(): ServiceConfig {
  return {
    mode: process.env.MODE ?? process.env.NODE_ENV ?? "development",
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
  };
}

/**
 * Validate required environment variables
 */
export function validateRequiredEnv(requiredVars: string[]): void {
  const missing = requiredVars.filter((varName) => !process.env[varName]);

  if (missing.length > 0) {
    throw new Error(
      `Missing required environment variables: ${missing.join(", ")}`
    );
  }
}

/**
 * Read a numeric environment variable, rejecting garbage values
 */
export function parseEnvNumber(envVar: string, defaultValue: number): number {
  const raw = process.env[envVar];
  if (raw === undefined || raw.trim() === "") return defaultValue;

  const num = Number(raw);
  if (isNaN(num)) {
    throw new Error(`Invalid number in ${envVar}: ${raw}`);
  }
  return num;
}
