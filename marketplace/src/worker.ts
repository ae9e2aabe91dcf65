/**
 * Long-running marketplace worker: one session kept fresh by periodic full
 * refreshes, with stuck requests swept and events forwarded to the bus.
 */

import {
  BusPort,
  ConsoleLogger,
  createBus,
  Logger,
} from "@listing-sync/shared-utils";
import { BusAdapter } from "./adapters/bus.adapter";
import { loadInventoryFile } from "./adapters/inventory.file";
import { MemoryInventory } from "./adapters/inventory.memory";
import { HttpMarketplaceApi } from "./adapters/marketplace.api";
import { busCfg, BusSettings, cfg, MarketplaceConfig, serviceCfg } from "./config/env";
import { MarketplaceStatus } from "./core/dto";
import { MarketplaceApiPort } from "./core/ports";
import { applySubstitutions } from "./core/urls";
import { MarketplaceSession } from "./session";

const NOT_MERCHANT_MESSAGE =
  "Account is not a merchant, create a store at [MARKETPLACE_CREATE_STORE_URL]";

export interface WorkerIntervals {
  refreshIntervalMs: number;
  sweepIntervalMs: number;
  importPollMs: number;
}

export class MarketplaceWorker {
  private timers: NodeJS.Timeout[] = [];
  private stopping = false;

  constructor(
    readonly session: MarketplaceSession,
    private intervals: WorkerIntervals,
    private logger: Logger,
    private bus?: BusAdapter
  ) {}

  async start(): Promise<MarketplaceStatus> {
    const status = await this.session.start();
    this.logger.info(`Session started with status ${status}`);

    if (status === "not_merchant") {
      this.logger.warn(
        applySubstitutions(NOT_MERCHANT_MESSAGE, this.session.substitutions)
      );
    }
    if (status !== "merchant") {
      this.logger.warn("Not a merchant session, periodic refresh disabled");
      return status;
    }

    this.every(this.intervals.refreshIntervalMs, () => {
      if (!this.session.driver.getAllListings()) {
        this.logger.debug("Skipping refresh, previous one still running");
      }
    });
    this.every(this.intervals.sweepIntervalMs, () => {
      const released = this.session.sweepExpired();
      if (released.length > 0) {
        this.logger.warn(`Released ${released.length} stuck request(s)`);
      }
    });
    this.every(this.intervals.importPollMs, () => {
      this.session.importer.update().catch((error: unknown) => {
        this.logger.error("Import status poll failed:", error);
      });
    });

    return status;
  }

  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;

    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];

    await this.session.close();
    if (this.bus) {
      await this.bus.close();
    }
    this.logger.info("Worker stopped");
  }

  private every(intervalMs: number, task: () => void): void {
    this.timers.push(setInterval(task, intervalMs));
  }
}

/**
 * Wire a worker from environment configuration
 */
export function createWorker(
  config: MarketplaceConfig = cfg,
  bus: BusSettings = busCfg,
  overrides: { api?: MarketplaceApiPort; sharedBus?: BusPort } = {}
): MarketplaceWorker {
  const logger = new ConsoleLogger("marketplace", serviceCfg.logLevel);

  const inventory = config.inventoryFile
    ? loadInventoryFile(config.inventoryFile)
    : new MemoryInventory();

  const api =
    overrides.api ??
    new HttpMarketplaceApi({
      apiBaseUrl: config.apiBaseUrl,
      merchantId: config.merchantId,
      apiToken: config.apiToken,
      requestTimeoutMs: config.requestTimeoutMs,
    });

  const sharedBus =
    overrides.sharedBus ??
    createBus(
      {
        type: bus.adapter === "REDIS" ? "redis" : "memory",
        serviceName: "marketplace",
        redisUrl: bus.redis.url,
      },
      logger.child("bus")
    );
  const events = new BusAdapter(sharedBus);

  const session = new MarketplaceSession({
    api,
    inventory,
    logger: logger.child("session"),
    marketplaceUrl: config.marketplaceUrl,
    processingPollMs: config.processingPollMs,
    pendingTimeoutMs: config.pendingTimeoutMs,
    events,
  });

  return new MarketplaceWorker(
    session,
    {
      refreshIntervalMs: config.refreshIntervalMs,
      sweepIntervalMs: config.sweepIntervalMs,
      importPollMs: config.importPollMs,
    },
    logger,
    events
  );
}
