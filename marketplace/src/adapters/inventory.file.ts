import { readFileSync } from "fs";
import { z } from "zod";
import { MemoryInventory } from "./inventory.memory";

const snapshotSchema = z.object({
  folders: z.array(
    z.object({
      id: z.string().min(1),
      parentId: z.string().min(1).nullable().default(null),
    })
  ),
});

export type InventorySnapshot = z.input<typeof snapshotSchema>;

export function parseInventorySnapshot(raw: unknown): MemoryInventory {
  const result = snapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid inventory snapshot: ${result.error.message}`);
  }
  return MemoryInventory.fromEntries(result.data.folders);
}

/**
 * Load the folder tree from a JSON file of the form
 * `{ "folders": [{ "id": "...", "parentId": "..." }] }`
 */
export function loadInventoryFile(path: string): MemoryInventory {
  const text = readFileSync(path, "utf8");
  return parseInventorySnapshot(JSON.parse(text));
}
