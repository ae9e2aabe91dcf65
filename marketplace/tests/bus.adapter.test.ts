import { MemoryBus, silentLogger } from "@listing-sync/shared-utils";
import { beforeEach, describe, expect, it } from "vitest";
import { BusAdapter } from "../src/adapters/bus.adapter";

describe("BusAdapter", () => {
  let bus: MemoryBus;
  let adapter: BusAdapter;

  beforeEach(() => {
    bus = new MemoryBus("test", silentLogger);
    adapter = new BusAdapter(bus, "test-session");
  });

  it("should publish listings_changed with the listing count", async () => {
    await adapter.listingsChanged(3);

    const [event] = bus.getPublishedEvents();
    expect(event).toMatchObject({
      type: "listings_changed",
      version: "1.0.0",
      data: { source: "test-session", listingCount: 3 },
    });
    expect(typeof event.id).toBe("string");
    expect(typeof event.timestamp).toBe("string");
  });

  it("should publish error reports", async () => {
    await adapter.errorReported({
      status: 404,
      outcome: "client_error",
      reason: "not_found",
      operation: "update",
      folderId: "F1",
      detail: { error: "gone" },
    });
    await adapter.errorReported({
      status: 0,
      outcome: "server_error",
      reason: "transport",
      operation: "get_all",
      detail: null,
    });

    const events = bus.getPublishedEvents();
    expect(events[0]).toMatchObject({
      type: "listing_error",
      data: {
        status: 404,
        outcome: "client_error",
        reason: "not_found",
        operation: "update",
        folderId: "F1",
        detail: { error: "gone" },
      },
    });
    expect(events[1]).toMatchObject({ type: "listing_error" });
    expect(events[1]).not.toHaveProperty("data.folderId");
  });

  it("should publish status transitions to subscribers", async () => {
    const received: unknown[] = [];
    await bus.subscribe("marketplace_status_changed", async (event) => {
      received.push(event);
    });

    await adapter.statusChanged("initializing", "merchant");

    expect(received).toHaveLength(1);
    expect(received[0]).toMatchObject({ data: { from: "initializing", to: "merchant" } });
  });
});
