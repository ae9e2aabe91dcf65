import { ApiResponse, ErrorReport, FolderId, MarketplaceStatus } from "./dto";

// Local inventory tree (read-only for us)
export interface InventoryPort {
  folderExists(id: FolderId): boolean;
  getParent(id: FolderId): FolderId | null;
  /** Ancestors of `id`, nearest first, excluding `id` itself */
  getAncestry(id: FolderId): FolderId[];
}

export type ListingPayload = {
  listingId: number;
  listingFolderId: FolderId;
  versionFolderId: FolderId | null;
  isActive: boolean;
};

/**
 * Remote marketplace API. Every call resolves with the raw status and body;
 * a rejected promise means the request never completed.
 */
export interface MarketplaceApiPort {
  getMerchant(): Promise<ApiResponse>;
  getListings(): Promise<ApiResponse>;
  getListing(listingId: number): Promise<ApiResponse>;
  createListing(listing: {
    listingFolderId: FolderId;
    versionFolderId: FolderId | null;
  }): Promise<ApiResponse>;
  updateListing(listing: ListingPayload): Promise<ApiResponse>;
  associateListing(listing: ListingPayload): Promise<ApiResponse>;
  deleteListing(listingId: number): Promise<ApiResponse>;

  // Legacy inventory import job
  getImportStatus(): Promise<ApiResponse>;
  triggerImport(): Promise<ApiResponse>;
}

// Outbound events (bus forwarding)
export interface ListingEventsPort {
  listingsChanged(listingCount: number): Promise<void>;
  errorReported(report: ErrorReport): Promise<void>;
  statusChanged(from: MarketplaceStatus, to: MarketplaceStatus): Promise<void>;
}
