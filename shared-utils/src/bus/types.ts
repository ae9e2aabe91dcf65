/**
 * Standard event types published by listing-sync sessions
 */
export type EventType =
  | "listings_changed"
  | "listing_error"
  | "marketplace_status_changed";

export const EVENT_TYPES: readonly EventType[] = [
  "listings_changed",
  "listing_error",
  "marketplace_status_changed",
];

/**
 * Base event interface that all events must implement
 */
export interface BaseEvent {
  type: EventType;
  id: string;
  timestamp: string;
  version?: string;
}

/**
 * Event handler function type
 */
export type EventHandler = (event: BaseEvent) => Promise<void>;

/**
 * Specific event interfaces
 */
export interface ListingsChangedEvent extends BaseEvent {
  type: "listings_changed";
  data: {
    source: string;
    listingCount: number;
  };
}

export interface ListingErrorEvent extends BaseEvent {
  type: "listing_error";
  data: {
    status: number;
    outcome: "client_error" | "server_error";
    reason: string;
    operation: string;
    folderId?: string;
    detail: unknown;
  };
}

export interface MarketplaceStatusChangedEvent extends BaseEvent {
  type: "marketplace_status_changed";
  data: {
    from: string;
    to: string;
  };
}

export type ListingSyncEvent =
  | ListingsChangedEvent
  | ListingErrorEvent
  | MarketplaceStatusChangedEvent;

export function isEventType(value: unknown): value is EventType {
  return (
    typeof value === "string" &&
    (EVENT_TYPES as readonly string[]).includes(value)
  );
}

/**
 * Narrow an untrusted payload (e.g. a Redis message) to a BaseEvent
 */
export function isBaseEvent(value: unknown): value is BaseEvent {
  if (typeof value !== "object" || value === null) return false;
  if (!("type" in value) || !("id" in value) || !("timestamp" in value)) {
    return false;
  }
  return (
    isEventType(value.type) &&
    typeof value.id === "string" &&
    typeof value.timestamp === "string"
  );
}

/**
 * Standard bus port interface
 */
export interface BusPort {
  /**
   * Subscribe to events of a specific type
   */
  subscribe(topic: EventType, handler: EventHandler): Promise<void>;

  /**
   * Publish an event to a topic
   */
  publish(event: BaseEvent): Promise<void>;

  /**
   * Close the bus connection and cleanup resources
   */
  close?(): Promise<void>;
}

/**
 * Bus configuration options
 */
export interface BusConfig {
  redisUrl: string;
  serviceName: string;
  retryAttempts?: number;
}
