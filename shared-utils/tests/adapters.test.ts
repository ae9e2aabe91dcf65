import { describe, expect, it, vi } from "vitest";
import { BusPort, EVENT_SCHEMA_VERSION, PublisherBusAdapter } from "../src";

describe("PublisherBusAdapter", () => {
  const makeBus = (): BusPort => ({
    subscribe: vi.fn().mockResolvedValue(undefined),
    publish: vi.fn().mockResolvedValue(undefined),
    close: vi.fn().mockResolvedValue(undefined),
  });

  it("should wrap payloads in the event envelope", async () => {
    const bus = makeBus();
    const adapter = new PublisherBusAdapter(bus);

    await adapter.publish("listings_changed", { listingCount: 2 });

    expect(bus.publish).toHaveBeenCalledWith({
      type: "listings_changed",
      id: expect.any(String),
      timestamp: expect.any(String),
      version: EVENT_SCHEMA_VERSION,
      data: { listingCount: 2 },
    });
  });

  it("should honour an explicit schema version", async () => {
    const bus = makeBus();

    await new PublisherBusAdapter(bus).publish("listing_error", {}, "2.0.0");

    expect(vi.mocked(bus.publish).mock.calls[0][0].version).toBe("2.0.0");
  });

  it("should give every event its own id", async () => {
    const bus = makeBus();
    const adapter = new PublisherBusAdapter(bus);

    await adapter.publish("listings_changed", {});
    await adapter.publish("listings_changed", {});

    const [first, second] = vi.mocked(bus.publish).mock.calls.map(([event]) => event.id);
    expect(first).not.toBe(second);
  });

  it("should close the underlying bus", async () => {
    const bus = makeBus();

    await new PublisherBusAdapter(bus).close();

    expect(bus.close).toHaveBeenCalled();
  });
});
