import { FolderId } from "../core/dto";
import { InventoryPort } from "../core/ports";

export type InventoryEntry = {
  id: FolderId;
  parentId: FolderId | null;
};

/**
 * In-memory folder tree. Stands in for the host inventory in tests and in
 * the worker, which loads it from a JSON snapshot.
 */
export class MemoryInventory implements InventoryPort {
  private parents = new Map<FolderId, FolderId | null>();

  static fromEntries(entries: InventoryEntry[]): MemoryInventory {
    const inventory = new MemoryInventory();
    for (const entry of entries) {
      inventory.addFolder(entry.id, entry.parentId);
    }
    return inventory;
  }

  folderExists(id: FolderId): boolean {
    return this.parents.has(id);
  }

  getParent(id: FolderId): FolderId | null {
    return this.parents.get(id) ?? null;
  }

  getAncestry(id: FolderId): FolderId[] {
    const ancestry: FolderId[] = [];
    const seen = new Set<FolderId>([id]);
    let current = this.getParent(id);

    while (current !== null && !seen.has(current)) {
      ancestry.push(current);
      seen.add(current);
      current = this.getParent(current);
    }
    return ancestry;
  }

  // Test helpers
  addFolder(id: FolderId, parentId: FolderId | null = null): void {
    this.parents.set(id, parentId);
  }

  /** Remove a folder and everything below it */
  removeFolder(id: FolderId): void {
    for (const [child, parent] of Array.from(this.parents)) {
      if (parent === id) this.removeFolder(child);
    }
    this.parents.delete(id);
  }

  moveFolder(id: FolderId, parentId: FolderId | null): void {
    if (!this.parents.has(id)) {
      throw new Error(`Unknown folder ${id}`);
    }
    this.parents.set(id, parentId);
  }

  size(): number {
    return this.parents.size;
  }
}
