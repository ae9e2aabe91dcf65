import { Logger } from "@listing-sync/shared-utils";
import { ApiResponse, SyncOperation } from "./dto";
import { TypedNotifier, Unsubscribe } from "./notifier";
import { MarketplaceApiPort } from "./ports";
import {
  assertNever,
  classifyStatus,
  RemoteOutcome,
  StatusCodes,
} from "./status-codes";

/** Where the import session stands; separate from the merchant status */
export type ImportSessionState =
  | "not_initialized"
  | "initializing"
  | "ready"
  | "access_denied"
  | "unavailable";

export type ImportEventMap = {
  initError: [number, unknown];
  statusChanged: [boolean];
  statusReport: [number, unknown];
};

/**
 * Tracks the legacy bulk inventory import job: initialises the import
 * session, triggers an import and polls it until the server stops
 * answering 202.
 */
export class MarketplaceImporter {
  private initialized = false;
  private inProgress = false;
  private autoTrigger = false;
  private retriedAfterRedirect = false;
  private state: ImportSessionState = "not_initialized";
  private events: TypedNotifier<ImportEventMap>;

  constructor(
    private api: Pick<MarketplaceApiPort, "getImportStatus" | "triggerImport">,
    private logger: Logger
  ) {
    this.events = new TypedNotifier<ImportEventMap>(logger);
  }

  onInitError(handler: (status: number, body: unknown) => void): Unsubscribe {
    return this.events.on("initError", handler);
  }

  onStatusChanged(handler: (inProgress: boolean) => void): Unsubscribe {
    return this.events.on("statusChanged", handler);
  }

  onStatusReport(handler: (status: number, body: unknown) => void): Unsubscribe {
    return this.events.on("statusReport", handler);
  }

  isImportInProgress(): boolean {
    return this.inProgress;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  getState(): ImportSessionState {
    return this.state;
  }

  async initialize(): Promise<boolean> {
    if (this.initialized) return true;
    if (this.state === "initializing") return false;

    this.state = "initializing";
    const response = await this.request("import_status", () =>
      this.api.getImportStatus()
    );
    const outcome = classifyStatus(response.status);

    switch (outcome.kind) {
      case "success":
      case "processing":
        this.initialized = true;
        this.state = "ready";
        // A job started elsewhere may already be running
        this.setInProgress(outcome.kind === "processing");
        break;
      case "client_error":
        this.state = isAccessDenied(outcome) ? "access_denied" : "unavailable";
        this.events.emit("initError", response.status, response.body);
        return false;
      case "server_error":
        this.state = "unavailable";
        this.events.emit("initError", response.status, response.body);
        return false;
      default:
        assertNever(outcome);
    }

    if (this.autoTrigger) {
      this.autoTrigger = false;
      return this.triggerImport();
    }
    return true;
  }

  /**
   * Start an import. Before initialisation the import is queued and
   * initialisation is started instead.
   */
  async triggerImport(): Promise<boolean> {
    if (!this.initialized) {
      this.autoTrigger = true;
      return this.initialize();
    }
    if (this.inProgress) {
      this.logger.warn("Import already in progress");
      return false;
    }

    const response = await this.request("import_trigger", () =>
      this.api.triggerImport()
    );
    const outcome = classifyStatus(response.status);

    switch (outcome.kind) {
      case "success":
      case "processing":
        this.retriedAfterRedirect = false;
        this.setInProgress(true);
        return true;
      case "client_error":
        if (this.shouldReinitialize(outcome)) {
          return this.reinitializeAndTriggerImport();
        }
        this.events.emit("statusReport", response.status, response.body);
        return false;
      case "server_error":
        this.events.emit("statusReport", response.status, response.body);
        return false;
      default:
        return assertNever(outcome);
    }
  }

  /**
   * Poll the running import once. Does nothing when no import is running.
   */
  async update(): Promise<void> {
    if (!this.inProgress) return;

    const response = await this.request("import_status", () =>
      this.api.getImportStatus()
    );
    const outcome = classifyStatus(response.status);

    switch (outcome.kind) {
      case "processing":
        return;
      case "success":
      case "server_error":
        this.setInProgress(false);
        this.events.emit("statusReport", response.status, response.body);
        return;
      case "client_error":
        if (this.shouldReinitialize(outcome)) {
          this.setInProgress(false);
          await this.reinitializeAndTriggerImport();
          return;
        }
        this.setInProgress(false);
        this.events.emit("statusReport", response.status, response.body);
        return;
      default:
        assertNever(outcome);
    }
  }

  /** The import session expired: start over once, then give up */
  private async reinitializeAndTriggerImport(): Promise<boolean> {
    this.retriedAfterRedirect = true;
    this.initialized = false;
    this.state = "not_initialized";
    this.autoTrigger = true;
    this.logger.info("Import session expired, re-initialising");
    return this.initialize();
  }

  private shouldReinitialize(
    outcome: Extract<RemoteOutcome, { kind: "client_error" }>
  ): boolean {
    return (
      !this.retriedAfterRedirect &&
      (outcome.status === StatusCodes.REDIRECT ||
        outcome.status === StatusCodes.UNAUTHORIZED)
    );
  }

  private setInProgress(inProgress: boolean): void {
    if (this.inProgress === inProgress) return;
    this.inProgress = inProgress;
    this.events.emit("statusChanged", inProgress);
  }

  private async request(
    operation: SyncOperation,
    call: () => Promise<ApiResponse>
  ): Promise<ApiResponse> {
    try {
      return await call();
    } catch (error) {
      this.logger.warn(`Import ${operation} request failed:`, error);
      return {
        status: StatusCodes.TRANSPORT_FAILURE,
        body: { message: error instanceof Error ? error.message : String(error) },
      };
    }
  }
}

function isAccessDenied(
  outcome: Extract<RemoteOutcome, { kind: "client_error" }>
): boolean {
  return (
    outcome.reason === "unauthorized" ||
    outcome.reason === "forbidden" ||
    outcome.reason === "not_found"
  );
}
