import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { errorMessage } from "./errors.js";

export const JOBS_TABLE = "prediction_jobs";
export const LISTINGS_TABLE = "listings";

/**
 * Service-role client (bypasses RLS). Created once at process start and handed to the
 * repositories that need it.
 */
export function createSupabase(options: { url?: string; serviceRoleKey?: string; fetch?: typeof fetch } = {}): SupabaseClient {
  const url = options.url ?? config.supabase.url;
  const key = options.serviceRoleKey ?? config.supabase.serviceRoleKey;
  return createClient(url, key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    ...(options.fetch ? { global: { fetch: options.fetch } } : {}),
  });
}

export async function initDb(supabase: SupabaseClient) {
  if (!config.supabase.serviceRoleKey) {
    logger.warn("SUPABASE_SERVICE_ROLE_KEY is not set. Database operations will fail.");
    return;
  }
  try {
    const { error } = await supabase.from(JOBS_TABLE).select("id").limit(1);
    if (error) {
      // PGRST205: table missing from the schema cache, expected before migrations run
      if (error.code === "PGRST205" || error.code === "PGRST116") {
        logger.warn(`The '${JOBS_TABLE}' table does not exist yet. Run sql/schema.sql against the database.`);
        return;
      }
      throw error;
    }
    logger.info("Database connection established");
  } catch (err: unknown) {
    logger.error(err, "Failed to connect to database");
    throw new Error(`Database connection failed: ${errorMessage(err)}`);
  }
}
