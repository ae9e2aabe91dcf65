import { FolderId } from "./dto";

/**
 * Folders with an outstanding remote request, plus the global "bulk refresh
 * in progress" flag. Each entry remembers when it started so that requests
 * whose response never arrives can be expired.
 */
export class PendingSet {
  private pending = new Map<FolderId, number>();
  private updatingSince: number | null = null;

  constructor(private now: () => number = Date.now) {}

  /**
   * Mark a folder as pending. Returns true if it was not pending before;
   * marking twice keeps a single entry and the original start time.
   */
  begin(folderId: FolderId): boolean {
    if (this.pending.has(folderId)) return false;
    this.pending.set(folderId, this.now());
    return true;
  }

  end(folderId: FolderId): boolean {
    return this.pending.delete(folderId);
  }

  isPending(folderId: FolderId): boolean {
    return this.pending.has(folderId);
  }

  setUpdating(isUpdating: boolean): void {
    this.updatingSince = isUpdating ? this.updatingSince ?? this.now() : null;
  }

  isUpdating(): boolean {
    return this.updatingSince !== null;
  }

  size(): number {
    return this.pending.size;
  }

  /** Folders that have been pending for longer than `timeoutMs` */
  expired(timeoutMs: number): FolderId[] {
    const cutoff = this.now() - timeoutMs;
    const stale: FolderId[] = [];
    for (const [folderId, startedAt] of this.pending) {
      if (startedAt <= cutoff) stale.push(folderId);
    }
    return stale;
  }

  isUpdateExpired(timeoutMs: number): boolean {
    return (
      this.updatingSince !== null && this.updatingSince <= this.now() - timeoutMs
    );
  }

  clear(): void {
    this.pending.clear();
    this.updatingSince = null;
  }
}
