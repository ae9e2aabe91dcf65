// Export types
export type {
  BaseEvent,
  BusConfig,
  BusPort,
  EventHandler,
  EventType,
  ListingErrorEvent,
  ListingsChangedEvent,
  ListingSyncEvent,
  MarketplaceStatusChangedEvent,
} from "./types";
export { EVENT_TYPES, isBaseEvent, isEventType } from "./types";

// Export implementations
export { createMemoryBus, MemoryBus } from "./memory-bus";
export { createRedisBus, RedisBus } from "./redis-bus";

import { Logger } from "../logger";
import { createMemoryBus } from "./memory-bus";
import { createRedisBus } from "./redis-bus";
import { BusConfig, BusPort } from "./types";

export interface BusFactoryConfig extends Partial<BusConfig> {
  type: "redis" | "memory";
  serviceName: string;
  redisUrl?: string;
}

/**
 * Factory function to create the appropriate bus based on configuration
 */
export function createBus(config: BusFactoryConfig, logger?: Logger): BusPort {
  switch (config.type) {
    case "redis":
      if (!config.redisUrl) {
        throw new Error("Redis URL is required for Redis bus");
      }
      return createRedisBus(
        {
          redisUrl: config.redisUrl,
          serviceName: config.serviceName,
          retryAttempts: config.retryAttempts,
        },
        logger
      );

    case "memory":
      return createMemoryBus(config.serviceName, logger);
  }
}
