import { Logger } from "@listing-sync/shared-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { MemoryInventory } from "../src/adapters/inventory.memory";
import { MemoryMarketplaceApi } from "../src/adapters/marketplace.memory";
import { ListingEventsPort } from "../src/core/ports";
import { MarketplaceSession } from "../src/session";

describe("MarketplaceSession", () => {
  let api: MemoryMarketplaceApi;
  let events: ListingEventsPort;
  let logger: Logger;
  let session: MarketplaceSession;

  beforeEach(() => {
    api = new MemoryMarketplaceApi({ firstListingId: 42 });
    api.seed({ listingId: 5, listingFolderId: "F1", versionFolderId: "V1", isActive: true });

    events = {
      listingsChanged: vi.fn().mockResolvedValue(undefined),
      errorReported: vi.fn().mockResolvedValue(undefined),
      statusChanged: vi.fn().mockResolvedValue(undefined),
    };
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    session = new MarketplaceSession({
      api,
      inventory: MemoryInventory.fromEntries([
        { id: "F1", parentId: null },
        { id: "V1", parentId: "F1" },
        { id: "item", parentId: "V1" },
      ]),
      logger,
      marketplaceUrl: "https://marketplace.test/",
      processingPollMs: 1000,
      pendingTimeoutMs: 10000,
      events,
    });
  });

  it("should start, load listings and forward events", async () => {
    expect(await session.start()).toBe("merchant");
    await session.settled();

    expect(session.cache.getListingId("F1")).toBe(5);
    expect(session.classifier.getActiveFolder("item")).toBe("V1");
    expect(events.statusChanged).toHaveBeenCalledWith("not_initialized", "initializing");
    expect(events.statusChanged).toHaveBeenCalledWith("initializing", "merchant");
    expect(events.listingsChanged).toHaveBeenCalledWith(1);
    expect(session.getStatus()).toBe("merchant");
  });

  it("should forward error reports", async () => {
    await session.start();
    await session.settled();
    api.respondNextWith(500, { error: "down" });

    session.driver.activateListing("F1", false);
    await session.settled();

    expect(events.errorReported).toHaveBeenCalledWith({
      status: 500,
      outcome: "server_error",
      reason: "server_down",
      operation: "update",
      folderId: "F1",
      detail: { error: "down" },
    });
  });

  it("should track the dirty flag of the cache", async () => {
    expect(session.checkAndClearDirty()).toBe(false);

    await session.start();
    await session.settled();
    expect(session.checkAndClearDirty()).toBe(true);
    expect(session.checkAndClearDirty()).toBe(false);

    session.markDirty();
    expect(session.checkAndClearDirty()).toBe(true);
  });

  it("should log forwarding failures", async () => {
    const failure = new Error("bus down");
    vi.mocked(events.listingsChanged).mockRejectedValue(failure);

    await session.start();
    await session.settled();

    expect(logger.error).toHaveBeenCalledWith("Failed to forward listings_changed:", failure);
  });

  it("should expose marketplace page links for messages", () => {
    expect(session.substitutions.MARKETPLACE_URL).toBe("https://marketplace.test/");
    expect(session.substitutions.MARKETPLACE_LOGIN_URL).toBe(
      "https://marketplace.test/signin"
    );
  });

  it("should refuse to start once closed", async () => {
    await session.close();

    expect(session.notifier.listenerCount("changed")).toBe(0);
    await expect(session.start()).rejects.toThrow("Marketplace session is closed");
  });
});
