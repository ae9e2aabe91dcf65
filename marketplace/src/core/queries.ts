import { FolderId } from "./dto";
import { ListingCacheReader } from "./listing-cache";
import { PendingSet } from "./pending-set";
import { InventoryPort } from "./ports";

export type PendingReader = Pick<PendingSet, "isPending" | "isUpdating">;

/**
 * Read-only questions about inventory folders, answered from the last
 * reconciled cache state. Safe to call while requests are in flight.
 */
export class ListingClassifier {
  constructor(
    private cache: ListingCacheReader,
    private pending: PendingReader,
    private inventory: InventoryPort
  ) {}

  isListed(folderId: FolderId): boolean {
    return this.cache.has(folderId);
  }

  isListedAndActive(folderId: FolderId): boolean {
    return this.isListed(folderId) && this.cache.getActivationState(folderId);
  }

  isVersionFolder(folderId: FolderId): boolean {
    return this.cache.listingForVersionFolder(folderId) !== null;
  }

  /**
   * The active version folder containing `itemId` (the item itself counts),
   * or null when the item is not inside published content.
   */
  getActiveFolder(itemId: FolderId): FolderId | null {
    for (const folderId of [itemId, ...this.inventory.getAncestry(itemId)]) {
      const listingFolderId = this.cache.listingForVersionFolder(folderId);
      if (listingFolderId !== null && this.cache.getActivationState(listingFolderId)) {
        return folderId;
      }
    }
    return null;
  }

  isInActiveFolder(itemId: FolderId): boolean {
    return this.getActiveFolder(itemId) !== null;
  }

  isUpdating(folderId: FolderId): boolean {
    return this.pending.isPending(folderId) || this.pending.isUpdating();
  }
}
