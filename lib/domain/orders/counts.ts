import { failure, mapStoreError, type ApiFailure } from "@/lib/api/errors";
import type { OrderStatus } from "@/lib/supabase/types";
import type { DbClient } from "@/utils/supabase/admin";

/** Counts one business user's orders in the given status; 404 unless the id names a business user. */
export async function countBusinessOrders(params: {
  supabase: DbClient;
  businessUserId: number;
  status: Extract<OrderStatus, "in_progress" | "completed">;
}): Promise<{ ok: true; count: number } | ApiFailure> {
  const { supabase, businessUserId, status } = params;

  const { data: user, error: userError } = await supabase
    .from("users")
    .select("id, user_type")
    .eq("id", businessUserId)
    .maybeSingle();

  if (userError) {
    return mapStoreError(userError);
  }
  if (!user || user.user_type !== "business") {
    return failure("not_found", "No business user found with the specified ID.");
  }

  const { count, error } = await supabase
    .from("orders")
    .select("id", { count: "exact", head: true })
    .eq("business_user_id", businessUserId)
    .eq("status", status);

  if (error) {
    console.error("[order-count-failed]", { businessUserId, status, message: error.message });
    return mapStoreError(error);
  }

  return { ok: true, count: count ?? 0 };
}
