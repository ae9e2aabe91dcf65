import * as dotenv from "dotenv";
import {
  createRedisConfig,
  createServiceConfig,
  parseEnvNumber,
} from "@listing-sync/shared-utils";

// Load environment variables from .env file
dotenv.config();

export const serviceCfg = createServiceConfig();

export const cfg = {
  marketplaceUrl: process.env.MARKETPLACE_URL ?? "http://localhost:4100",
  apiBaseUrl: process.env.MARKETPLACE_API_URL ?? "http://localhost:4100/api/1",
  merchantId: process.env.MERCHANT_ID ?? "",
  apiToken: process.env.MARKETPLACE_API_TOKEN,
  requestTimeoutMs: parseEnvNumber("REQUEST_TIMEOUT_MS", 10000),
  processingPollMs: parseEnvNumber("PROCESSING_POLL_MS", 5000), // re-poll after a 202
  pendingTimeoutMs: parseEnvNumber("PENDING_TIMEOUT_MS", 120000), // give up on a request
  sweepIntervalMs: parseEnvNumber("SWEEP_INTERVAL_MS", 15000),
  refreshIntervalMs: parseEnvNumber("REFRESH_INTERVAL_MS", 300000), // 5 minutes default
  importPollMs: parseEnvNumber("IMPORT_POLL_MS", 10000),
  inventoryFile: process.env.INVENTORY_FILE, // JSON snapshot of the folder tree
};

export type MarketplaceConfig = typeof cfg;

export const busCfg = {
  adapter: process.env.BUS_ADAPTER ?? "MEMORY", // MEMORY or REDIS
  redis: createRedisConfig(),
};

export type BusSettings = typeof busCfg;

// Validation
export function validateConfig(
  config: MarketplaceConfig = cfg,
  bus: BusSettings = busCfg
): void {
  if (!config.merchantId) {
    throw new Error("MERCHANT_ID is required");
  }

  for (const [name, value] of [
    ["MARKETPLACE_URL", config.marketplaceUrl],
    ["MARKETPLACE_API_URL", config.apiBaseUrl],
  ]) {
    if (!URL.canParse(value)) {
      throw new Error(`${name} is not a valid URL: ${value}`);
    }
  }

  if (config.pendingTimeoutMs <= config.processingPollMs) {
    throw new Error(
      "PENDING_TIMEOUT_MS must be longer than PROCESSING_POLL_MS"
    );
  }

  if (bus.adapter !== "MEMORY" && bus.adapter !== "REDIS") {
    throw new Error(`Unknown BUS_ADAPTER: ${bus.adapter}`);
  }

  if (config.refreshIntervalMs < 60000) {
    console.warn(
      "Warning: Refresh interval is less than a minute, this may be too aggressive"
    );
  }
}
