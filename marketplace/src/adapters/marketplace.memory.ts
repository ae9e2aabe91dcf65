import { ApiResponse, FolderId } from "../core/dto";
import { toListingsBody, toWireListing } from "../core/payload";
import { ListingPayload, MarketplaceApiPort } from "../core/ports";
import { StatusCodes } from "../core/status-codes";

type StoredListing = ListingPayload & { editUrl: string };

/**
 * In-process marketplace. Keeps listings in a map, assigns ids and answers
 * with the same bodies as the real service. Test hooks queue canned
 * answers and record the calls made.
 */
export class MemoryMarketplaceApi implements MarketplaceApiPort {
  private listings = new Map<number, StoredListing>();
  private nextListingId: number;
  private overrides: ApiResponse[] = [];
  private importPollsRemaining = 0;
  private calls: string[] = [];

  constructor(
    private options: {
      isMerchant?: boolean;
      firstListingId?: number;
      editUrlBase?: string;
      /** Number of 202 answers an import yields before completing */
      importPolls?: number;
    } = {}
  ) {
    this.nextListingId = options.firstListingId ?? 1;
  }

  async getMerchant(): Promise<ApiResponse> {
    return this.answer("getMerchant", () =>
      this.options.isMerchant === false
        ? { status: StatusCodes.NOT_FOUND, body: { error: "not a merchant" } }
        : { status: StatusCodes.DONE, body: { merchant: true } }
    );
  }

  async getListings(): Promise<ApiResponse> {
    return this.answer("getListings", () =>
      this.ok(Array.from(this.listings.values()))
    );
  }

  async getListing(listingId: number): Promise<ApiResponse> {
    return this.answer("getListing", () => {
      const listing = this.listings.get(listingId);
      return listing ? this.ok([listing]) : this.notFound(listingId);
    });
  }

  async createListing(listing: {
    listingFolderId: FolderId;
    versionFolderId: FolderId | null;
  }): Promise<ApiResponse> {
    return this.answer("createListing", () => {
      if (this.findByFolder(listing.listingFolderId)) {
        return {
          status: StatusCodes.MALFORMED,
          body: { error: `folder ${listing.listingFolderId} is already listed` },
        };
      }

      const created = this.store({
        listingId: this.nextListingId++,
        listingFolderId: listing.listingFolderId,
        versionFolderId: listing.versionFolderId,
        isActive: false,
      });
      return { status: StatusCodes.CREATED, body: this.body([created]) };
    });
  }

  async updateListing(listing: ListingPayload): Promise<ApiResponse> {
    return this.answer("updateListing", () => {
      if (!this.listings.has(listing.listingId)) {
        return this.notFound(listing.listingId);
      }
      return this.ok([this.store(listing)]);
    });
  }

  async associateListing(listing: ListingPayload): Promise<ApiResponse> {
    return this.answer("associateListing", () => {
      const existing = this.listings.get(listing.listingId);
      if (!existing) return this.notFound(listing.listingId);

      return this.ok([
        this.store({
          ...listing,
          isActive: existing.isActive && listing.versionFolderId !== null,
        }),
      ]);
    });
  }

  async deleteListing(listingId: number): Promise<ApiResponse> {
    return this.answer("deleteListing", () => {
      const listing = this.listings.get(listingId);
      if (!listing) return this.notFound(listingId);

      this.listings.delete(listingId);
      return this.ok([listing]);
    });
  }

  async getImportStatus(): Promise<ApiResponse> {
    return this.answer("getImportStatus", () => {
      if (this.importPollsRemaining > 0) {
        this.importPollsRemaining -= 1;
        return { status: StatusCodes.PROCESSING, body: { state: "processing" } };
      }
      return { status: StatusCodes.DONE, body: { state: "idle" } };
    });
  }

  async triggerImport(): Promise<ApiResponse> {
    return this.answer("triggerImport", () => {
      this.importPollsRemaining = this.options.importPolls ?? 1;
      return { status: StatusCodes.CREATED, body: { state: "queued" } };
    });
  }

  // ===== Test helpers =====

  /** Answer the next call with this response instead of the normal one */
  respondNextWith(status: number, body: unknown = {}): void {
    this.overrides.push({ status, body });
  }

  seed(listing: ListingPayload & { editUrl?: string }): void {
    this.store(listing, listing.editUrl);
    this.nextListingId = Math.max(this.nextListingId, listing.listingId + 1);
  }

  remove(listingId: number): void {
    this.listings.delete(listingId);
  }

  has(listingId: number): boolean {
    return this.listings.has(listingId);
  }

  getCalls(): string[] {
    return [...this.calls];
  }

  // ===== Internals =====

  private answer(name: string, build: () => ApiResponse): ApiResponse {
    this.calls.push(name);
    return this.overrides.shift() ?? build();
  }

  private store(listing: ListingPayload, editUrl?: string): StoredListing {
    const stored: StoredListing = {
      ...listing,
      editUrl:
        editUrl ??
        `${this.options.editUrlBase ?? "https://marketplace.test"}/listings/${listing.listingId}/edit`,
    };
    this.listings.set(listing.listingId, stored);
    return stored;
  }

  private findByFolder(folderId: FolderId): StoredListing | undefined {
    return Array.from(this.listings.values()).find(
      (listing) => listing.listingFolderId === folderId
    );
  }

  private body(listings: StoredListing[]) {
    return toListingsBody(
      listings.map((listing) => toWireListing(listing, listing.editUrl))
    );
  }

  private ok(listings: StoredListing[]): ApiResponse {
    return { status: StatusCodes.DONE, body: this.body(listings) };
  }

  private notFound(listingId: number): ApiResponse {
    return {
      status: StatusCodes.NOT_FOUND,
      body: { error: `listing ${listingId} not found` },
    };
  }
}
