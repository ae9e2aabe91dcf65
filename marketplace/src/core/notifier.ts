import { Logger } from "@listing-sync/shared-utils";
import { EventEmitter } from "events";
import { ErrorReport, MarketplaceStatus } from "./dto";

export type Unsubscribe = () => void;

/**
 * EventEmitter with a fixed event map. A throwing handler is logged and
 * skipped so the remaining handlers (and the emitter) carry on.
 */
export class TypedNotifier<TMap extends Record<string, unknown[]>> {
  private emitter = new EventEmitter();

  constructor(protected logger: Logger) {}

  on<K extends keyof TMap & string>(
    event: K,
    handler: (...args: TMap[K]) => void
  ): Unsubscribe {
    const guarded = (...args: TMap[K]) => {
      try {
        handler(...args);
      } catch (error) {
        this.logger.error(`Listener for "${event}" threw:`, error);
      }
    };

    this.emitter.on(event, guarded);
    return () => {
      this.emitter.off(event, guarded);
    };
  }

  emit<K extends keyof TMap & string>(event: K, ...args: TMap[K]): void {
    this.emitter.emit(event, ...args);
  }

  listenerCount(event: keyof TMap & string): number {
    return this.emitter.listenerCount(event);
  }

  removeAll(): void {
    this.emitter.removeAllListeners();
  }
}

export type StatusTransition = {
  from: MarketplaceStatus;
  to: MarketplaceStatus;
};

export type MarketplaceEventMap = {
  changed: [];
  error: [ErrorReport];
  status: [StatusTransition];
};

/**
 * Observer registry for cache changes, error reports and merchant status.
 * Events fire only once reconciliation has finished.
 */
export class MarketplaceNotifier extends TypedNotifier<MarketplaceEventMap> {
  onChanged(handler: () => void): Unsubscribe {
    return this.on("changed", handler);
  }

  onError(handler: (report: ErrorReport) => void): Unsubscribe {
    return this.on("error", handler);
  }

  onStatus(handler: (transition: StatusTransition) => void): Unsubscribe {
    return this.on("status", handler);
  }
}
