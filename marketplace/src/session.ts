import { Logger } from "@listing-sync/shared-utils";
import { ErrorReport, FolderId, MarketplaceStatus } from "./core/dto";
import { MarketplaceImporter } from "./core/importer";
import { ListingCache, ListingCacheReader } from "./core/listing-cache";
import { MarketplaceNotifier, StatusTransition, Unsubscribe } from "./core/notifier";
import { PendingSet } from "./core/pending-set";
import { InventoryPort, ListingEventsPort, MarketplaceApiPort } from "./core/ports";
import { ListingClassifier } from "./core/queries";
import { MarketplaceSyncDriver } from "./core/sync-driver";
import { MarketplaceSubstitutions, marketplaceSubstitutions } from "./core/urls";

export interface MarketplaceSessionOptions {
  api: MarketplaceApiPort;
  inventory: InventoryPort;
  logger: Logger;
  /** Public marketplace site, for links in user-facing messages */
  marketplaceUrl: string;
  processingPollMs: number;
  pendingTimeoutMs: number;
  /** Where session events are forwarded, e.g. the shared bus */
  events?: ListingEventsPort;
  now?: () => number;
}

/**
 * One marketplace session: owns the listing cache, the pending set and the
 * driver that keeps them in sync. Callers get the read-only cache view, the
 * classifier and the driver's operations.
 */
export class MarketplaceSession {
  readonly cache: ListingCacheReader;
  readonly classifier: ListingClassifier;
  readonly notifier: MarketplaceNotifier;
  readonly driver: MarketplaceSyncDriver;
  readonly importer: MarketplaceImporter;
  readonly substitutions: MarketplaceSubstitutions;

  private listingCache = new ListingCache();
  private pending: PendingSet;
  private deliveries = new Set<Promise<void>>();
  private subscriptions: Unsubscribe[] = [];
  private closed = false;

  constructor(private options: MarketplaceSessionOptions) {
    const logger = options.logger;
    this.pending = new PendingSet(options.now);
    this.notifier = new MarketplaceNotifier(logger);
    this.cache = this.listingCache;
    this.classifier = new ListingClassifier(
      this.listingCache,
      this.pending,
      options.inventory
    );
    this.driver = new MarketplaceSyncDriver(
      {
        api: options.api,
        inventory: options.inventory,
        cache: this.listingCache,
        pending: this.pending,
        notifier: this.notifier,
        logger,
      },
      {
        processingPollMs: options.processingPollMs,
        pendingTimeoutMs: options.pendingTimeoutMs,
      }
    );
    this.importer = new MarketplaceImporter(options.api, logger);
    this.substitutions = marketplaceSubstitutions(options);

    if (options.events) {
      this.forwardEvents(options.events);
    }
  }

  /**
   * Look up the merchant record and load the listings
   */
  async start(): Promise<MarketplaceStatus> {
    if (this.closed) {
      throw new Error("Marketplace session is closed");
    }
    return this.driver.initialize();
  }

  getStatus(): MarketplaceStatus {
    return this.driver.getStatus();
  }

  /**
   * Whether the cache changed since the last call; used by views that
   * rebuild lazily.
   */
  checkAndClearDirty(): boolean {
    return this.listingCache.checkAndClearDirty();
  }

  /** Ask views to refresh even though no listing changed */
  markDirty(): void {
    this.listingCache.markDirty();
  }

  sweepExpired(): FolderId[] {
    return this.driver.sweepExpired();
  }

  /** Wait for in-flight requests and pending event deliveries */
  async settled(): Promise<void> {
    await this.driver.settled();
    while (this.deliveries.size > 0) {
      await Promise.all(this.deliveries);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    await this.driver.close();
    await this.settled();
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    this.subscriptions = [];
    this.notifier.removeAll();
  }

  private forwardEvents(events: ListingEventsPort): void {
    this.subscriptions.push(
      this.notifier.onChanged(() => {
        this.deliver("listings_changed", () =>
          events.listingsChanged(this.listingCache.size())
        );
      }),
      this.notifier.onError((report: ErrorReport) => {
        this.deliver("listing_error", () => events.errorReported(report));
      }),
      this.notifier.onStatus(({ from, to }: StatusTransition) => {
        this.deliver("marketplace_status_changed", () =>
          events.statusChanged(from, to)
        );
      })
    );
  }

  private deliver(name: string, send: () => Promise<void>): void {
    const delivery = send()
      .catch((error: unknown) => {
        this.options.logger.error(`Failed to forward ${name}:`, error);
      })
      .finally(() => {
        this.deliveries.delete(delivery);
      });
    this.deliveries.add(delivery);
  }
}
