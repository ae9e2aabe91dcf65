import Redis from "ioredis";
import { ConsoleLogger, Logger } from "../logger";
import {
  BaseEvent,
  BusConfig,
  BusPort,
  EventHandler,
  EventType,
  isBaseEvent,
} from "./types";

/**
 * Redis bus implementation using pub/sub
 *
 * Separate connections are used for publishing and subscribing, since a
 * subscribed ioredis connection cannot issue other commands.
 */
export class RedisBus implements BusPort {
  private subscriber: Redis;
  private publisher: Redis;
  private handlers = new Map<EventType, EventHandler[]>();
  private deliveries = new Set<Promise<void>>();
  private isConnected = false;
  private logger: Logger;

  constructor(config: BusConfig, logger?: Logger) {
    this.logger = logger ?? new ConsoleLogger(config.serviceName);
    const retryAttempts = config.retryAttempts ?? 3;

    this.subscriber = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      lazyConnect: true,
    });

    this.publisher = new Redis(config.redisUrl, {
      enableReadyCheck: false,
      maxRetriesPerRequest: retryAttempts,
      lazyConnect: true,
    });

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.subscriber.on("connect", () => {
      this.logger.info("Redis subscriber connected");
      this.isConnected = true;
    });

    this.publisher.on("connect", () => {
      this.logger.info("Redis publisher connected");
    });

    this.subscriber.on("error", (error) => {
      this.logger.error("Redis subscriber error:", error);
      this.isConnected = false;
    });

    this.publisher.on("error", (error) => {
      this.logger.error("Redis publisher error:", error);
    });

    this.subscriber.on("close", () => {
      this.logger.info("Redis subscriber connection closed");
      this.isConnected = false;
    });

    this.subscriber.on("message", (channel: string, message: string) => {
      const delivery = this.handleMessage(channel, message).finally(() => {
        this.deliveries.delete(delivery);
      });
      this.deliveries.add(delivery);
    });
  }

  async subscribe(topic: EventType, handler: EventHandler): Promise<void> {
    const existing = this.handlers.get(topic);
    if (existing) {
      existing.push(handler);
      return;
    }

    this.handlers.set(topic, [handler]);
    await this.subscriber.subscribe(topic);
    this.logger.info(`Subscribed to topic: ${topic}`);
  }

  async publish(event: BaseEvent): Promise<void> {
    try {
      await this.publisher.publish(event.type, JSON.stringify(event));
      this.logger.debug(`Published event: ${event.type} (${event.id})`);
    } catch (error) {
      this.logger.error("Failed to publish event:", error);
      throw error;
    }
  }

  private async handleMessage(channel: string, message: string): Promise<void> {
    let event: unknown;
    try {
      event = JSON.parse(message);
    } catch (error) {
      this.logger.error(`Discarding unparseable message on ${channel}:`, error);
      return;
    }

    if (!isBaseEvent(event)) {
      this.logger.warn(`Discarding malformed event on ${channel}`);
      return;
    }

    const received = event;
    const handlers = this.handlers.get(received.type) ?? [];
    this.logger.debug(`Received event: ${channel} (${received.id})`);

    await Promise.all(
      handlers.map(async (handler) => {
        try {
          await handler(received);
        } catch (error) {
          this.logger.error(
            `Handler error for ${channel} (${received.id}):`,
            error
          );
        }
      })
    );
  }

  async close(): Promise<void> {
    this.logger.info("Closing Redis bus connections...");

    await Promise.all(this.deliveries);

    try {
      await Promise.all([this.subscriber.quit(), this.publisher.quit()]);
      this.logger.info("Redis bus connections closed");
    } catch (error) {
      this.logger.error("Error closing Redis connections:", error);
    }
  }

  isHealthy(): boolean {
    return this.isConnected;
  }

  getStatus() {
    return {
      connected: this.isConnected,
      subscriberStatus: this.subscriber.status,
      publisherStatus: this.publisher.status,
      subscribedTopics: Array.from(this.handlers.keys()),
    };
  }
}

export function createRedisBus(config: BusConfig, logger?: Logger): RedisBus {
  return new RedisBus(config, logger);
}
