/**
 * JSON body format exchanged with the marketplace listings API.
 *
 * {
 *   "listings": [{
 *     "id": 42,
 *     "is_listed": true,
 *     "edit_url": "https://...",
 *     "inventory_info": { "listing_folder_id": "...", "version_folder_id": "..." }
 *   }]
 * }
 *
 * The API uses the nil UUID for "no version folder".
 */

import { z } from "zod";
import { FolderId, RemoteListing } from "./dto";
import { ListingPayload } from "./ports";

export const NIL_FOLDER_ID = "00000000-0000-0000-0000-000000000000";

const inventoryInfoSchema = z.object({
  listing_folder_id: z.string().min(1),
  version_folder_id: z.string().nullish(),
});

export const wireListingSchema = z.object({
  id: z.number().int().nonnegative(),
  is_listed: z.boolean().default(false),
  edit_url: z.string().optional(),
  inventory_info: inventoryInfoSchema,
});

export const listingsBodySchema = z.object({
  listings: z.array(wireListingSchema),
});

export type WireListing = z.infer<typeof wireListingSchema>;
export type ListingsBody = z.infer<typeof listingsBodySchema>;

function toFolderId(value: string | null | undefined): FolderId | null {
  if (!value || value === NIL_FOLDER_ID) return null;
  return value;
}

export function fromWireListing(listing: WireListing): RemoteListing {
  return {
    listingId: listing.id,
    listingFolderId: listing.inventory_info.listing_folder_id,
    versionFolderId: toFolderId(listing.inventory_info.version_folder_id),
    isActive: listing.is_listed,
    editUrl: listing.edit_url,
  };
}

/**
 * Decode a listings response body; null when it does not match the format
 */
export function parseListingsBody(body: unknown): RemoteListing[] | null {
  const result = listingsBodySchema.safeParse(body);
  if (!result.success) return null;
  return result.data.listings.map(fromWireListing);
}

export function toWireListing(
  listing: Omit<ListingPayload, "listingId"> & { listingId?: number },
  editUrl?: string
): WireListing {
  const wire: WireListing = {
    id: listing.listingId ?? 0,
    is_listed: listing.isActive,
    inventory_info: {
      listing_folder_id: listing.listingFolderId,
      version_folder_id: listing.versionFolderId ?? NIL_FOLDER_ID,
    },
  };
  if (editUrl !== undefined) wire.edit_url = editUrl;
  return wire;
}

export function toListingsBody(listings: WireListing[]): ListingsBody {
  return { listings };
}
