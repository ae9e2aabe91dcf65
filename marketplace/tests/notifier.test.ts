import { Logger } from "@listing-sync/shared-utils";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { MarketplaceNotifier } from "../src/core/notifier";

describe("MarketplaceNotifier", () => {
  let logger: Logger;
  let notifier: MarketplaceNotifier;

  beforeEach(() => {
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    notifier = new MarketplaceNotifier(logger);
  });

  it("should stop calling a handler once unsubscribed", () => {
    const handler = vi.fn();
    const unsubscribe = notifier.onChanged(handler);

    notifier.emit("changed");
    unsubscribe();
    notifier.emit("changed");

    expect(handler).toHaveBeenCalledTimes(1);
    expect(notifier.listenerCount("changed")).toBe(0);
  });

  it("should keep notifying after a handler throws", () => {
    const failure = new Error("listener bug");
    const second = vi.fn();
    notifier.onStatus(() => {
      throw failure;
    });
    notifier.onStatus(second);

    notifier.emit("status", { from: "initializing", to: "merchant" });

    expect(second).toHaveBeenCalledWith({ from: "initializing", to: "merchant" });
    expect(logger.error).toHaveBeenCalledWith('Listener for "status" threw:', failure);
  });

  it("should pass error reports through", () => {
    const handler = vi.fn();
    notifier.onError(handler);
    const report = {
      status: 410,
      outcome: "server_error" as const,
      reason: "job_failed",
      operation: "create" as const,
      folderId: "F1",
      detail: null,
    };

    notifier.emit("error", report);

    expect(handler).toHaveBeenCalledWith(report);
  });

  it("should drop every handler on removeAll", () => {
    notifier.onChanged(vi.fn());
    notifier.onError(vi.fn());
    notifier.removeAll();

    expect(notifier.listenerCount("changed")).toBe(0);
    expect(notifier.listenerCount("error")).toBe(0);
  });
});
