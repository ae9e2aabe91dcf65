import { ConsoleLogger, Logger } from "../logger";
import { BaseEvent, BusPort, EventHandler, EventType } from "./types";

/**
 * In-memory bus implementation for testing and development
 *
 * This implementation:
 * - Keeps all events in memory
 * - Awaits every handler before publish resolves
 * - Isolates handler failures from each other
 */
export class MemoryBus implements BusPort {
  private handlers = new Map<EventType, EventHandler[]>();
  private publishedEvents: BaseEvent[] = [];
  private logger: Logger;

  constructor(serviceName: string = "memory-bus", logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(serviceName);
  }

  async subscribe(topic: EventType, handler: EventHandler): Promise<void> {
    const existing = this.handlers.get(topic);
    if (existing) {
      existing.push(handler);
      return;
    }

    this.handlers.set(topic, [handler]);
    this.logger.debug(`Subscribed to topic: ${topic}`);
  }

  async publish(event: BaseEvent): Promise<void> {
    this.logger.debug(`Publishing event: ${event.type} (${event.id})`);

    // Store the event for debugging/testing
    this.publishedEvents.push(event);

    const handlers = this.handlers.get(event.type) ?? [];

    const promises = handlers.map(async (handler) => {
      try {
        await handler(event);
      } catch (error) {
        this.logger.error(
          `Handler error for ${event.type} (${event.id}):`,
          error
        );
        // Don't throw - let other handlers continue
      }
    });

    await Promise.all(promises);
  }

  async close(): Promise<void> {
    this.logger.debug("Closing memory bus (clearing handlers)");
    this.handlers.clear();
    this.publishedEvents = [];
  }

  /**
   * Get all published events (useful for testing)
   */
  getPublishedEvents(): BaseEvent[] {
    return [...this.publishedEvents];
  }

  clearHistory(): void {
    this.publishedEvents = [];
  }

  getStatus() {
    return {
      subscribedTopics: Array.from(this.handlers.keys()),
      handlerCount: Array.from(this.handlers.values()).reduce(
        (sum, handlers) => sum + handlers.length,
        0
      ),
      publishedEventCount: this.publishedEvents.length,
    };
  }
}

export function createMemoryBus(
  serviceName?: string,
  logger?: Logger
): MemoryBus {
  return new MemoryBus(serviceName, logger);
}
