import { Logger } from "@listing-sync/shared-utils";
import {
  ApiResponse,
  ErrorReport,
  FolderId,
  MarketplaceStatus,
  NO_LISTING_ID,
  RemoteListing,
  SyncOperation,
} from "./dto";
import { ListingCache } from "./listing-cache";
import { MarketplaceNotifier } from "./notifier";
import { parseListingsBody } from "./payload";
import { PendingSet } from "./pending-set";
import { InventoryPort, ListingPayload, MarketplaceApiPort } from "./ports";
import {
  assertNever,
  classifyStatus,
  FailureOutcome,
  StatusCodes,
} from "./status-codes";

const TIMEOUT_OUTCOME: FailureOutcome = {
  kind: "server_error",
  status: StatusCodes.JOB_TIMEOUT,
  reason: "timeout",
};

const MALFORMED_OUTCOME: FailureOutcome = {
  kind: "client_error",
  status: StatusCodes.MALFORMED,
  reason: "malformed",
};

export interface SyncDriverDependencies {
  api: MarketplaceApiPort;
  inventory: InventoryPort;
  cache: ListingCache;
  pending: PendingSet;
  notifier: MarketplaceNotifier;
  logger: Logger;
}

export interface SyncDriverOptions {
  /** Delay before re-polling a request the server answered with 202 */
  processingPollMs: number;
  /** How long a request may stay pending before it is given up */
  pendingTimeoutMs: number;
}

/**
 * One remote request and what to do with its answer. A folder request is
 * keyed by its folder; a null folder is the bulk refresh.
 */
type SyncRequest = {
  seq: number;
  operation: SyncOperation;
  folderId: FolderId | null;
  call: () => Promise<ApiResponse>;
  /** Apply server listings to the cache; returns whether anything changed */
  reconcile: (listings: RemoteListing[], request: SyncRequest) => boolean;
  needsListings: boolean;
};

/**
 * Issues listing operations against the marketplace and reconciles the
 * answers into the listing cache.
 *
 * Every public operation returns synchronously: false when it was refused
 * (bad local state or folder already busy), true once the request is on its
 * way. Results arrive later through the notifier.
 */
export class MarketplaceSyncDriver {
  private status: MarketplaceStatus = "not_initialized";
  private seq = 0;
  private folderFlights = new Map<FolderId, { seq: number; operation: SyncOperation }>();
  private bulkFlight: number | null = null;
  /** Sequence of the last answer applied for each folder */
  private lastReconciled = new Map<FolderId, number>();
  private inFlight = new Set<Promise<void>>();
  /** Scheduled follow-up polls and the folder they belong to */
  private pollTimers = new Map<NodeJS.Timeout, FolderId | null>();

  constructor(
    private deps: SyncDriverDependencies,
    private options: SyncDriverOptions
  ) {}

  getStatus(): MarketplaceStatus {
    return this.status;
  }

  getListingFolder(listingId: number): FolderId | null {
    return this.deps.cache.folderFor(listingId);
  }

  // ===== Initialization =====

  /**
   * Query the merchant record and, for a merchant, load all listings.
   */
  async initialize(): Promise<MarketplaceStatus> {
    if (this.status === "initializing") {
      return this.status;
    }

    this.setStatus("initializing");
    const response = await this.invoke("merchant", () =>
      this.deps.api.getMerchant()
    );
    const outcome = classifyStatus(response.status);

    switch (outcome.kind) {
      case "success":
        this.setStatus("merchant");
        this.getAllListings();
        break;
      case "client_error":
        if (outcome.reason === "not_found") {
          this.setStatus("not_merchant");
        } else {
          this.setStatus("connection_failure");
          this.report(outcome, "merchant", null, response.body);
        }
        break;
      case "processing":
        // A merchant lookup has no job to wait for
        this.setStatus("connection_failure");
        break;
      case "server_error":
        this.setStatus("connection_failure");
        this.report(outcome, "merchant", null, response.body);
        break;
      default:
        assertNever(outcome);
    }

    return this.status;
  }

  // ===== High level operations =====

  getAllListings(): boolean {
    if (this.deps.pending.isUpdating()) {
      this.deps.logger.debug("Full listing refresh already in progress");
      return false;
    }

    this.deps.pending.setUpdating(true);
    this.bulkFlight = this.nextSeq();
    this.send({
      seq: this.bulkFlight,
      operation: "get_all",
      folderId: null,
      call: () => this.deps.api.getListings(),
      reconcile: (listings, request) => this.applyListings(listings, request),
      needsListings: true,
    });
    return true;
  }

  createListing(folderId: FolderId): boolean {
    if (this.isBusy(folderId, "create")) return false;

    const { cache, inventory } = this.deps;
    if (cache.has(folderId)) {
      return this.refuse("create", folderId, "folder is already listed");
    }
    if (cache.listingForVersionFolder(folderId) !== null) {
      return this.refuse("create", folderId, "folder is a version folder");
    }
    if (!inventory.folderExists(folderId)) {
      return this.refuse("create", folderId, "folder is not in the inventory");
    }

    return this.start("create", folderId, {
      call: () =>
        this.deps.api.createListing({
          listingFolderId: folderId,
          versionFolderId: null,
        }),
      reconcile: (listings, request) => this.applyListings(listings, request),
    });
  }

  activateListing(folderId: FolderId, activate: boolean): boolean {
    const payload = this.currentPayload(folderId, "update");
    if (!payload) return false;

    return this.start("update", folderId, {
      call: () =>
        this.deps.api.updateListing({ ...payload, isActive: activate }),
      reconcile: (listings, request) => this.applyListings(listings, request),
    });
  }

  clearListing(folderId: FolderId): boolean {
    const payload = this.currentPayload(folderId, "delete");
    if (!payload) return false;

    return this.start("delete", folderId, {
      call: () => this.deps.api.deleteListing(payload.listingId),
      reconcile: () => this.deps.cache.remove(folderId),
      needsListings: false,
    });
  }

  setVersionFolder(folderId: FolderId, versionId: FolderId | null): boolean {
    const payload = this.currentPayload(folderId, "update");
    if (!payload) return false;

    if (versionId !== null) {
      const { cache, inventory } = this.deps;
      const owner = cache.listingForVersionFolder(versionId);
      if (versionId === folderId || cache.has(versionId)) {
        return this.refuse("update", folderId, "version folder is a listing folder");
      }
      if (owner !== null && owner !== folderId) {
        return this.refuse("update", folderId, "version folder belongs to another listing");
      }
      if (!inventory.folderExists(versionId)) {
        return this.refuse("update", folderId, "version folder is not in the inventory");
      }
    }

    // A listing without content cannot stay published
    const isActive = versionId === null ? false : payload.isActive;

    return this.start("update", folderId, {
      call: () =>
        this.deps.api.updateListing({
          ...payload,
          versionFolderId: versionId,
          isActive,
        }),
      reconcile: (listings, request) => this.applyListings(listings, request),
    });
  }

  associateListing(folderId: FolderId, listingId: number): boolean {
    if (this.isBusy(folderId, "associate")) return false;

    const { cache, inventory } = this.deps;
    if (!Number.isInteger(listingId) || listingId <= NO_LISTING_ID) {
      return this.refuse("associate", folderId, `invalid listing id ${listingId}`);
    }
    if (cache.has(folderId)) {
      return this.refuse("associate", folderId, "folder is already listed");
    }
    if (cache.listingForVersionFolder(folderId) !== null) {
      return this.refuse("associate", folderId, "folder is a version folder");
    }
    if (cache.folderFor(listingId) !== null) {
      return this.refuse(
        "associate",
        folderId,
        `listing ${listingId} is bound to another folder`
      );
    }
    if (!inventory.folderExists(folderId)) {
      return this.refuse("associate", folderId, "folder is not in the inventory");
    }

    return this.start("associate", folderId, {
      call: () =>
        this.deps.api.associateListing({
          listingId,
          listingFolderId: folderId,
          versionFolderId: null,
          isActive: false,
        }),
      reconcile: (listings, request) => this.applyListings(listings, request),
    });
  }

  getListing(folderId: FolderId): boolean {
    const payload = this.currentPayload(folderId, "get_one");
    if (!payload) return false;

    return this.start("get_one", folderId, {
      call: () => this.deps.api.getListing(payload.listingId),
      reconcile: (listings, request) => this.applyListings(listings, request),
    });
  }

  // ===== Pending maintenance =====

  /**
   * Give up on requests that have been pending longer than the configured
   * timeout. Each one is reported as a 499 timeout and a late answer to it
   * is ignored. Returns the folders released.
   */
  sweepExpired(): FolderId[] {
    const { pending } = this.deps;
    const released = pending.expired(this.options.pendingTimeoutMs);

    for (const folderId of released) {
      const flight = this.folderFlights.get(folderId);
      pending.end(folderId);
      this.folderFlights.delete(folderId);
      this.cancelPolls(folderId);
      this.report(
        TIMEOUT_OUTCOME,
        flight?.operation ?? "get_one",
        folderId,
        { message: "no response from the marketplace" }
      );
    }

    if (pending.isUpdateExpired(this.options.pendingTimeoutMs)) {
      pending.setUpdating(false);
      this.bulkFlight = null;
      this.cancelPolls(null);
      this.report(TIMEOUT_OUTCOME, "get_all", null, {
        message: "no response from the marketplace",
      });
    }

    return released;
  }

  /**
   * Resolves once every request currently in flight has been reconciled
   */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  /**
   * Stop scheduled polls, wait for outstanding responses and release every
   * folder still waiting on a poll
   */
  async close(): Promise<void> {
    for (const timer of this.pollTimers.keys()) {
      clearTimeout(timer);
    }
    this.pollTimers.clear();
    await this.settled();

    this.deps.pending.clear();
    this.folderFlights.clear();
    this.bulkFlight = null;
    this.lastReconciled.clear();
  }

  // ===== Request plumbing =====

  private start(
    operation: SyncOperation,
    folderId: FolderId,
    request: Pick<SyncRequest, "call" | "reconcile"> &
      Partial<Pick<SyncRequest, "needsListings">>
  ): boolean {
    const seq = this.nextSeq();
    this.deps.pending.begin(folderId);
    this.folderFlights.set(folderId, { seq, operation });

    this.send({
      seq,
      operation,
      folderId,
      call: request.call,
      reconcile: request.reconcile,
      needsListings: request.needsListings ?? true,
    });
    return true;
  }

  private send(request: SyncRequest): void {
    const flight = this.execute(request).finally(() => {
      this.inFlight.delete(flight);
    });
    this.inFlight.add(flight);
  }

  private async execute(request: SyncRequest): Promise<void> {
    const response = await this.invoke(request.operation, request.call);

    try {
      this.handleResponse(request, response);
    } catch (error) {
      this.deps.logger.error(
        `Failed to reconcile ${request.operation} response:`,
        error
      );
      this.finish(request);
      this.report(
        { kind: "server_error", status: response.status, reason: "unexpected" },
        request.operation,
        request.folderId,
        { message: error instanceof Error ? error.message : String(error) }
      );
    }
  }

  /**
   * Run a remote call, turning a rejected promise into a transport failure
   */
  private async invoke(
    operation: SyncOperation,
    call: () => Promise<ApiResponse>
  ): Promise<ApiResponse> {
    try {
      return await call();
    } catch (error) {
      this.deps.logger.warn(`Marketplace ${operation} request failed:`, error);
      return {
        status: StatusCodes.TRANSPORT_FAILURE,
        body: { message: error instanceof Error ? error.message : String(error) },
      };
    }
  }

  private handleResponse(request: SyncRequest, response: ApiResponse): void {
    if (this.isSuperseded(request)) {
      this.deps.logger.debug(
        `Dropping stale ${request.operation} response for ${request.folderId ?? "all listings"}`
      );
      return;
    }

    const outcome = classifyStatus(response.status);

    switch (outcome.kind) {
      case "success": {
        const listings = request.needsListings
          ? parseListingsBody(response.body)
          : [];
        if (listings === null) {
          this.finish(request);
          this.report(
            MALFORMED_OUTCOME,
            request.operation,
            request.folderId,
            response.body
          );
          return;
        }

        const changed = request.reconcile(listings, request);
        if (request.folderId !== null) {
          this.lastReconciled.set(request.folderId, request.seq);
        }
        this.finish(request);
        this.deps.logger.debug(
          `${request.operation} reconciled (${response.status}) for ${request.folderId ?? "all listings"}`
        );
        if (changed) {
          this.deps.notifier.emit("changed");
        }
        return;
      }
      case "processing":
        this.scheduleFollowUp(request);
        return;
      case "client_error":
      case "server_error":
        this.finish(request);
        this.report(outcome, request.operation, request.folderId, response.body);
        return;
      default:
        assertNever(outcome);
    }
  }

  /**
   * The server accepted the request but is still working on it: keep the
   * folder pending and poll for the result.
   */
  private scheduleFollowUp(request: SyncRequest): void {
    const followUp = this.followUpFor(request);

    this.deps.logger.info(
      `${request.operation} still processing for ${request.folderId ?? "all listings"}, polling in ${this.options.processingPollMs}ms`
    );

    const timer = setTimeout(() => {
      this.pollTimers.delete(timer);
      this.send(followUp);
    }, this.options.processingPollMs);
    this.pollTimers.set(timer, request.folderId);
  }

  /**
   * The poll that settles a processing request. A delete polls its listing
   * until the server no longer has it; anything else polls the listing, or
   * every listing while the id is not known yet.
   */
  private followUpFor(request: SyncRequest): SyncRequest {
    const listingId =
      request.folderId === null
        ? NO_LISTING_ID
        : this.deps.cache.getListingId(request.folderId);

    if (listingId === NO_LISTING_ID) {
      return {
        ...request,
        operation: "get_all",
        call: () => this.deps.api.getListings(),
        reconcile: (listings, current) => this.applyListings(listings, current),
        needsListings: true,
      };
    }

    if (request.operation === "delete") {
      return {
        ...request,
        call: () => this.confirmDeleted(listingId),
      };
    }

    return {
      ...request,
      operation: "get_one",
      call: () => this.deps.api.getListing(listingId),
      reconcile: (listings, current) => this.applyListings(listings, current),
      needsListings: true,
    };
  }

  /**
   * Fetch a listing being deleted and answer in delete terms: gone means
   * done, still there means still processing
   */
  private async confirmDeleted(listingId: number): Promise<ApiResponse> {
    const response = await this.deps.api.getListing(listingId);
    const outcome = classifyStatus(response.status);

    if (outcome.kind === "client_error" && outcome.reason === "not_found") {
      return { status: StatusCodes.DONE, body: response.body };
    }
    if (outcome.kind === "success") {
      return { status: StatusCodes.PROCESSING, body: response.body };
    }
    return response;
  }

  private cancelPolls(folderId: FolderId | null): void {
    for (const [timer, owner] of this.pollTimers) {
      if (owner === folderId) {
        clearTimeout(timer);
        this.pollTimers.delete(timer);
      }
    }
  }

  /**
   * Upsert every listing the server returned. Listings the server did not
   * mention are left alone, and so are folders of other requests still in
   * flight or answered after this request was sent.
   */
  private applyListings(listings: RemoteListing[], request: SyncRequest): boolean {
    let changed = false;
    for (const listing of listings) {
      if (this.isNewerThan(listing.listingFolderId, request)) {
        this.deps.logger.debug(
          `Ignoring listing ${listing.listingId}: folder ${listing.listingFolderId} has newer state`
        );
        continue;
      }

      const applied = this.deps.cache.upsert(
        listing.listingFolderId,
        listing.listingId,
        listing.versionFolderId,
        listing.isActive,
        listing.editUrl
      );
      if (applied) {
        changed = true;
      } else {
        this.deps.logger.warn(
          `Ignoring listing ${listing.listingId}: folder ${listing.listingFolderId} conflicts with a version folder`
        );
      }
    }
    return changed;
  }

  private isNewerThan(folderId: FolderId, request: SyncRequest): boolean {
    if (folderId === request.folderId) return false;
    return (
      this.folderFlights.has(folderId) ||
      (this.lastReconciled.get(folderId) ?? 0) > request.seq
    );
  }

  /** A newer request for the same target, or a sweep, replaced this one */
  private isSuperseded(request: SyncRequest): boolean {
    if (request.folderId === null) {
      return this.bulkFlight !== request.seq;
    }
    return this.folderFlights.get(request.folderId)?.seq !== request.seq;
  }

  /** Clear the pending mark of the request that is still current */
  private finish(request: SyncRequest): void {
    if (request.folderId === null) {
      if (this.bulkFlight === request.seq) {
        this.bulkFlight = null;
        this.deps.pending.setUpdating(false);
      }
      return;
    }

    if (this.folderFlights.get(request.folderId)?.seq === request.seq) {
      this.folderFlights.delete(request.folderId);
      this.deps.pending.end(request.folderId);
    }
  }

  // ===== Helpers =====

  /**
   * Busy and existence checks shared by operations on a known listing;
   * returns the listing's current state or null if the call is refused.
   */
  private currentPayload(
    folderId: FolderId,
    operation: SyncOperation
  ): ListingPayload | null {
    if (this.isBusy(folderId, operation)) return null;

    const record = this.deps.cache.get(folderId);
    if (!record) {
      this.refuse(operation, folderId, "folder is not listed");
      return null;
    }
    if (record.listingId === NO_LISTING_ID) {
      this.refuse(operation, folderId, "listing id is not known yet");
      return null;
    }

    return {
      listingId: record.listingId,
      listingFolderId: record.listingFolderId,
      versionFolderId: record.versionFolderId,
      isActive: record.isActive,
    };
  }

  private isBusy(folderId: FolderId, operation: SyncOperation): boolean {
    if (!this.deps.pending.isPending(folderId)) return false;
    this.deps.logger.warn(
      `Refusing ${operation} on ${folderId}: a request is already pending`
    );
    return true;
  }

  private refuse(operation: SyncOperation, folderId: FolderId, reason: string): false {
    this.deps.logger.debug(`Refusing ${operation} on ${folderId}: ${reason}`);
    return false;
  }

  private report(
    outcome: FailureOutcome,
    operation: SyncOperation,
    folderId: FolderId | null,
    detail: unknown
  ): void {
    const report: ErrorReport = {
      status: outcome.status,
      outcome: outcome.kind,
      reason: outcome.reason,
      operation,
      detail,
    };
    if (folderId !== null) report.folderId = folderId;

    this.deps.logger.warn(
      `Marketplace ${operation} failed with ${outcome.status} (${outcome.reason})`
    );
    this.deps.notifier.emit("error", report);
  }

  private setStatus(to: MarketplaceStatus): void {
    const from = this.status;
    if (from === to) return;

    this.status = to;
    this.deps.logger.info(`Marketplace status: ${from} → ${to}`);
    this.deps.notifier.emit("status", { from, to });
  }

  private nextSeq(): number {
    this.seq += 1;
    return this.seq;
  }
}
