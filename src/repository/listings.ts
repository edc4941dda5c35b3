import type { SupabaseClient } from "@supabase/supabase-js";
import { LISTINGS_TABLE } from "../db.js";
import { DatabaseError, errorMessage } from "../errors.js";
import { logger } from "../logger.js";
import type { ListingRecord } from "../types.js";

export interface ListingStore {
  get(listingId: string): Promise<ListingRecord | null>;
  setDisplayImage(listingId: string, displayImageUrl: string): Promise<void>;
}

interface ListingRow {
  id: string;
  lender_id: string;
  image_url: string | null;
  display_image_url: string | null;
  is_face_swapped: boolean | null;
}

export function createListingRepository(supabase: SupabaseClient): ListingStore {
  return {
    async get(listingId) {
      try {
        const { data, error } = await supabase
          .from(LISTINGS_TABLE)
          .select("id, lender_id, image_url, display_image_url, is_face_swapped")
          .eq("id", listingId)
          .maybeSingle();

        if (error) throw error;
        return data ? mapRow(data) : null;
      } catch (err: unknown) {
        logger.error({ err, listingId }, "Failed to get listing from database");
        throw new DatabaseError(errorMessage(err));
      }
    },

    async setDisplayImage(listingId, displayImageUrl) {
      try {
        const { error } = await supabase
          .from(LISTINGS_TABLE)
          .update({
            display_image_url: displayImageUrl,
            is_face_swapped: true,
            updated_at: new Date().toISOString(),
          })
          .eq("id", listingId);

        if (error) throw error;
      } catch (err: unknown) {
        logger.error({ err, listingId }, "Failed to update listing display image");
        throw new DatabaseError(errorMessage(err));
      }
    },
  };
}

function mapRow(row: ListingRow): ListingRecord {
  return {
    id: row.id,
    lenderId: row.lender_id,
    imageUrl: row.image_url || null,
    displayImageUrl: row.display_image_url || null,
    isFaceSwapped: Boolean(row.is_face_swapped),
  };
}
