export type FolderId = string;

/** Listing id used while the remote id is not known yet */
export const NO_LISTING_ID = 0;

/**
 * One reconciled listing: what we currently believe the remote service holds
 * for a local listing folder.
 */
export type ListingRecord = {
  listingFolderId: FolderId;    // map key, immutable
  listingId: number;            // NO_LISTING_ID until the server assigns one
  versionFolderId: FolderId | null;
  isActive: boolean;
  editUrl: string;
};

/** A listing as the remote service describes it */
export type RemoteListing = {
  listingId: number;
  listingFolderId: FolderId;
  versionFolderId: FolderId | null;
  isActive: boolean;
  editUrl?: string;
};

export type MarketplaceStatus =
  | "not_initialized"
  | "initializing"
  | "connection_failure"
  | "merchant"
  | "not_merchant";

export type SyncOperation =
  | "merchant"
  | "get_all"
  | "get_one"
  | "create"
  | "update"
  | "associate"
  | "delete"
  | "import_status"
  | "import_trigger";

/** Raw answer from the remote service, before classification */
export type ApiResponse = {
  status: number;
  body: unknown;
};

export type ErrorReport = {
  status: number;
  outcome: "client_error" | "server_error";
  reason: string;
  operation: SyncOperation;
  folderId?: FolderId;
  detail: unknown;
};
