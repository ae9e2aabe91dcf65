export * from "./core/dto";
export * from "./core/status-codes";
export * from "./core/listing-cache";
export * from "./core/pending-set";
export * from "./core/notifier";
export * from "./core/queries";
export * from "./core/payload";
export * from "./core/importer";
export * from "./core/urls";
export * from "./core/sync-driver";
export type {
  InventoryPort,
  ListingEventsPort,
  ListingPayload,
  MarketplaceApiPort,
} from "./core/ports";

export * from "./adapters/inventory.memory";
export * from "./adapters/inventory.file";
export * from "./adapters/marketplace.memory";
export * from "./adapters/marketplace.api";
export * from "./adapters/bus.adapter";

export * from "./session";
export { MarketplaceWorker, createWorker } from "./worker";
export type { WorkerIntervals } from "./worker";
