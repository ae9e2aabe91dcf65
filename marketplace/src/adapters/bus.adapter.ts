import {
  BusPort,
  ListingErrorEvent,
  ListingsChangedEvent,
  MarketplaceStatusChangedEvent,
  PublisherBusAdapter,
} from "@listing-sync/shared-utils";
import { ErrorReport, MarketplaceStatus } from "../core/dto";
import { ListingEventsPort } from "../core/ports";

/**
 * Publishes marketplace session events on the shared bus
 */
export class BusAdapter extends PublisherBusAdapter implements ListingEventsPort {
  constructor(
    sharedBus: BusPort,
    private source: string = "marketplace"
  ) {
    super(sharedBus);
  }

  async listingsChanged(listingCount: number): Promise<void> {
    const data: ListingsChangedEvent["data"] = {
      source: this.source,
      listingCount,
    };
    return this.publish("listings_changed", data);
  }

  async errorReported(report: ErrorReport): Promise<void> {
    const data: ListingErrorEvent["data"] = {
      status: report.status,
      outcome: report.outcome,
      reason: report.reason,
      operation: report.operation,
      detail: report.detail,
    };
    if (report.folderId !== undefined) data.folderId = report.folderId;
    return this.publish("listing_error", data);
  }

  async statusChanged(
    from: MarketplaceStatus,
    to: MarketplaceStatus
  ): Promise<void> {
    const data: MarketplaceStatusChangedEvent["data"] = { from, to };
    return this.publish("marketplace_status_changed", data);
  }
}
