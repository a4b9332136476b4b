// utils/supabase/admin.ts
import { createClient, type SupabaseClient } from "@supabase/supabase-js";

import type { Database } from "@/lib/supabase/types";
import { getServiceRoleKey, getSupabaseUrl } from "@/utils/env/server";

export type DbClient = SupabaseClient<Database>;

// Service-role client. Route handlers run their own permission checks; bearer tokens are verified per call.
export function createAdminClient(): DbClient {
  return createClient<Database>(getSupabaseUrl(), getServiceRoleKey(), {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
      detectSessionInUrl: false,
    },
  });
}
