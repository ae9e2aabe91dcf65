import { afterEach, describe, expect, it, vi } from "vitest";
import { MarketplaceConfig, validateConfig } from "../src/config/env";

describe("validateConfig", () => {
  const config: MarketplaceConfig = {
    marketplaceUrl: "https://marketplace.test",
    apiBaseUrl: "https://marketplace.test/api/1",
    merchantId: "test-merchant",
    apiToken: "test-secret",
    requestTimeoutMs: 10000,
    processingPollMs: 5000,
    pendingTimeoutMs: 120000,
    sweepIntervalMs: 15000,
    refreshIntervalMs: 300000,
    importPollMs: 10000,
    inventoryFile: undefined,
  };
  const bus = {
    adapter: "MEMORY",
    redis: { url: "redis://localhost:6379" },
  };

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should accept a complete configuration", () => {
    expect(() => validateConfig(config, bus)).not.toThrow();
  });

  it("should require a merchant id", () => {
    expect(() => validateConfig({ ...config, merchantId: "" }, bus)).toThrow(
      "MERCHANT_ID is required"
    );
  });

  it("should reject malformed urls", () => {
    expect(() => validateConfig({ ...config, apiBaseUrl: "nope" }, bus)).toThrow(
      "MARKETPLACE_API_URL is not a valid URL: nope"
    );
  });

  it("should require the pending timeout to outlast the poll interval", () => {
    expect(() =>
      validateConfig({ ...config, pendingTimeoutMs: 5000 }, bus)
    ).toThrow("PENDING_TIMEOUT_MS must be longer than PROCESSING_POLL_MS");
  });

  it("should reject unknown bus adapters", () => {
    expect(() => validateConfig(config, { ...bus, adapter: "KAFKA" })).toThrow(
      "Unknown BUS_ADAPTER: KAFKA"
    );
  });

  it("should warn about aggressive refresh intervals", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    validateConfig({ ...config, refreshIntervalMs: 1000 }, bus);

    expect(warn).toHaveBeenCalledWith(
      "Warning: Refresh interval is less than a minute, this may be too aggressive"
    );
  });
});
