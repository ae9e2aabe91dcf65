/**
 * Shared adapter utilities
 */

import { randomUUID } from "crypto";
import { BaseEvent, BusPort as SharedBusPort, EventType } from "../bus";

export const EVENT_SCHEMA_VERSION = "1.0.0";

/**
 * Base bus adapter class that handles common event envelope logic
 */
export abstract class BaseBusAdapter {
  constructor(protected sharedBus: SharedBusPort) {}

  /**
   * Wrap a payload in the shared bus envelope
   */
  protected toSharedEvent<T extends EventType, D>(
    type: T,
    data: D,
    version: string = EVENT_SCHEMA_VERSION
  ): BaseEvent & { type: T; data: D } {
    return {
      type,
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      version,
      data,
    };
  }

  /**
   * Close the underlying bus connection
   */
  async close(): Promise<void> {
    if (this.sharedBus.close) {
      return this.sharedBus.close();
    }
  }
}

/**
 * Generic bus adapter for components that only publish events
 */
export class PublisherBusAdapter extends BaseBusAdapter {
  async publish<T extends EventType, D>(
    type: T,
    data: D,
    version?: string
  ): Promise<void> {
    return this.sharedBus.publish(this.toSharedEvent(type, data, version));
  }
}
