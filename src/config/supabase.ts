import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { config } from "./index";

let client: SupabaseClient | null = null;

/**
 * Shared service-role client for server-side reads and writes.
 * Created on first use; throws when credentials are missing.
 */
export function getSupabase(): SupabaseClient {
  if (client) return client;

  const { supabaseUrl, supabaseServiceKey } = config;
  if (!supabaseUrl || !supabaseServiceKey) {
    throw new Error("Missing required Supabase environment variables");
  }

  client = createClient(supabaseUrl, supabaseServiceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
  return client;
}
