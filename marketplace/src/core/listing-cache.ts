import { FolderId, ListingRecord, NO_LISTING_ID } from "./dto";

/**
 * Read-only view of the listing cache handed to everything outside the
 * sync driver.
 */
export interface ListingCacheReader {
  get(folderId: FolderId): ListingRecord | null;
  has(folderId: FolderId): boolean;
  records(): ListingRecord[];
  size(): number;
  isEmpty(): boolean;

  getActivationState(folderId: FolderId): boolean;
  getListingId(folderId: FolderId): number;
  getVersionFolder(folderId: FolderId): FolderId | null;
  getListingUrl(folderId: FolderId): string;

  /** Reverse lookup: listing folder bound to a remote listing id */
  folderFor(listingId: number): FolderId | null;
  /** Listing folder whose version folder is `folderId`, if any */
  listingForVersionFolder(folderId: FolderId): FolderId | null;
}

/**
 * Session cache of listing records keyed by listing folder.
 *
 * Two reverse indexes are kept alongside the records so that a listing id
 * and a version folder each resolve to exactly one listing folder.
 */
export class ListingCache implements ListingCacheReader {
  private items = new Map<FolderId, ListingRecord>();
  private byListingId = new Map<number, FolderId>();
  private byVersionFolder = new Map<FolderId, FolderId>();
  private dirty = false;

  get(folderId: FolderId): ListingRecord | null {
    const record = this.items.get(folderId);
    return record ? { ...record } : null;
  }

  has(folderId: FolderId): boolean {
    return this.items.has(folderId);
  }

  records(): ListingRecord[] {
    return Array.from(this.items.values(), (record) => ({ ...record }));
  }

  size(): number {
    return this.items.size;
  }

  isEmpty(): boolean {
    return this.items.size === 0;
  }

  getActivationState(folderId: FolderId): boolean {
    return this.items.get(folderId)?.isActive ?? false;
  }

  getListingId(folderId: FolderId): number {
    return this.items.get(folderId)?.listingId ?? NO_LISTING_ID;
  }

  getVersionFolder(folderId: FolderId): FolderId | null {
    return this.items.get(folderId)?.versionFolderId ?? null;
  }

  getListingUrl(folderId: FolderId): string {
    return this.items.get(folderId)?.editUrl ?? "";
  }

  folderFor(listingId: number): FolderId | null {
    if (listingId === NO_LISTING_ID) return null;
    return this.byListingId.get(listingId) ?? null;
  }

  listingForVersionFolder(folderId: FolderId): FolderId | null {
    return this.byVersionFolder.get(folderId) ?? null;
  }

  /**
   * Insert or replace the whole record for `folderId`.
   *
   * Returns false (and changes nothing) if the tuple would make a folder both
   * a listing folder and a version folder. A listing id already bound to
   * another folder is moved: the stale record is dropped.
   */
  upsert(
    folderId: FolderId,
    listingId: number,
    versionFolderId: FolderId | null,
    isActive: boolean,
    editUrl?: string
  ): boolean {
    if (this.byVersionFolder.has(folderId)) return false;
    if (versionFolderId !== null && !this.canUseVersionFolder(folderId, versionFolderId)) {
      return false;
    }

    const previous = this.items.get(folderId);
    const owner = this.folderFor(listingId);
    if (owner !== null && owner !== folderId) {
      this.drop(owner);
    }
    if (previous) {
      this.unindex(previous);
    }

    const record: ListingRecord = {
      listingFolderId: folderId,
      listingId,
      versionFolderId,
      isActive,
      editUrl: editUrl ?? previous?.editUrl ?? "",
    };
    this.items.set(folderId, record);
    this.index(record);
    this.dirty = true;
    return true;
  }

  remove(folderId: FolderId): boolean {
    const existed = this.drop(folderId);
    if (existed) this.dirty = true;
    return existed;
  }

  setListingId(folderId: FolderId, listingId: number): boolean {
    const record = this.items.get(folderId);
    if (!record) return false;

    const owner = this.folderFor(listingId);
    if (owner !== null && owner !== folderId) return false;

    this.unindex(record);
    record.listingId = listingId;
    this.index(record);
    this.dirty = true;
    return true;
  }

  setVersionFolderId(folderId: FolderId, versionFolderId: FolderId | null): boolean {
    const record = this.items.get(folderId);
    if (!record) return false;
    if (versionFolderId !== null && !this.canUseVersionFolder(folderId, versionFolderId)) {
      return false;
    }

    this.unindex(record);
    record.versionFolderId = versionFolderId;
    this.index(record);
    this.dirty = true;
    return true;
  }

  setActivationState(folderId: FolderId, isActive: boolean): boolean {
    const record = this.items.get(folderId);
    if (!record) return false;

    record.isActive = isActive;
    this.dirty = true;
    return true;
  }

  setListingUrl(folderId: FolderId, editUrl: string): boolean {
    const record = this.items.get(folderId);
    if (!record) return false;

    record.editUrl = editUrl;
    this.dirty = true;
    return true;
  }

  /** Flag views as stale without touching any record */
  markDirty(): void {
    this.dirty = true;
  }

  /** One-shot read of the dirty flag: returns it and resets it */
  checkAndClearDirty(): boolean {
    const wasDirty = this.dirty;
    this.dirty = false;
    return wasDirty;
  }

  private canUseVersionFolder(folderId: FolderId, versionFolderId: FolderId): boolean {
    if (versionFolderId === folderId) return false;
    if (this.items.has(versionFolderId)) return false;

    const owner = this.byVersionFolder.get(versionFolderId);
    return owner === undefined || owner === folderId;
  }

  private drop(folderId: FolderId): boolean {
    const record = this.items.get(folderId);
    if (!record) return false;

    this.unindex(record);
    this.items.delete(folderId);
    return true;
  }

  private index(record: ListingRecord): void {
    if (record.listingId !== NO_LISTING_ID) {
      this.byListingId.set(record.listingId, record.listingFolderId);
    }
    if (record.versionFolderId !== null) {
      this.byVersionFolder.set(record.versionFolderId, record.listingFolderId);
    }
  }

  private unindex(record: ListingRecord): void {
    if (this.byListingId.get(record.listingId) === record.listingFolderId) {
      this.byListingId.delete(record.listingId);
    }
    if (
      record.versionFolderId !== null &&
      this.byVersionFolder.get(record.versionFolderId) === record.listingFolderId
    ) {
      this.byVersionFolder.delete(record.versionFolderId);
    }
  }
}
