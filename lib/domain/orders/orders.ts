import { failure, mapStoreError, type ApiFailure } from "@/lib/api/errors";
import type { Caller } from "@/lib/domain/callers";
import {
  allOf,
  authorize,
  isAuthenticated,
  isCustomerUser,
  isOrderBusinessPartner,
  isOrderParticipant,
  isStaff,
  type AuthorizationResult,
} from "@/lib/domain/permissions";
import type { OrderStatus, Tables } from "@/lib/supabase/types";
import type { DbClient } from "@/utils/supabase/admin";
import { logServerError } from "@/utils/errors/logServerError";

import { serializeOrder, type OrderView } from "./serializers";
import type { OrderCreateInput, OrderUpdateInput } from "./validation";

type OrderResult = { ok: true; order: OrderView } | ApiFailure;

/** Orders where the caller is the customer or the business user, newest first. */
export async function listOrdersForCaller(params: {
  supabase: DbClient;
  caller: Caller;
}): Promise<{ ok: true; orders: OrderView[] } | ApiFailure> {
  const { supabase, caller } = params;

  const { data, error } = await supabase
    .from("orders")
    .select("*")
    .or(`customer_user_id.eq.${caller.id},business_user_id.eq.${caller.id}`)
    .order("created_at", { ascending: false })
    .order("id", { ascending: false });

  if (error) {
    console.error("[orders-list-failed]", { userId: caller.id, message: error.message });
    return mapStoreError(error);
  }

  return { ok: true, orders: (data ?? []).map(serializeOrder) };
}

export function authorizeOrderCreate(caller: Caller): AuthorizationResult {
  return authorize(
    allOf(isAuthenticated, isCustomerUser),
    { caller, method: "POST", resource: undefined },
    "Only customer users can place orders.",
  );
}

/**
 * Places an order for one tier. The data store copies the tier's fields onto the order
 * in the same transaction that checks the tier and its offer still exist.
 */
export async function createOrder(params: {
  supabase: DbClient;
  caller: Caller;
  input: OrderCreateInput;
}): Promise<OrderResult> {
  const { supabase, caller, input } = params;

  const permitted = authorizeOrderCreate(caller);
  if (!permitted.ok) {
    return permitted;
  }

  const { data: order, error } = await supabase.rpc("create_order_from_offer_detail", {
    p_offer_detail_id: input.offer_detail_id,
    p_customer_user_id: caller.id,
  });

  if (error) {
    console.warn("[orders-create-failed]", {
      offerDetailId: input.offer_detail_id,
      code: error.code,
    });
    return mapStoreError(error, { notFound: "The specified offer detail was not found." });
  }

  console.log("[orders-created]", { orderId: order.id, userId: caller.id });
  return { ok: true, order: serializeOrder(order) };
}

async function loadOrder(
  supabase: DbClient,
  orderId: number,
): Promise<{ ok: true; order: Tables<"orders"> } | ApiFailure> {
  const { data: order, error } = await supabase
    .from("orders")
    .select("*")
    .eq("id", orderId)
    .maybeSingle();

  if (error) {
    return mapStoreError(error);
  }
  if (!order) {
    return failure("not_found", "Order not found.");
  }
  return { ok: true, order };
}

export async function getOrder(params: {
  supabase: DbClient;
  caller: Caller;
  orderId: number;
}): Promise<OrderResult> {
  const { supabase, caller, orderId } = params;

  const loaded = await loadOrder(supabase, orderId);
  if (!loaded.ok) {
    return loaded;
  }

  const permitted = authorize(
    isOrderParticipant,
    { caller, method: "GET", resource: loaded.order },
    "Only the customer or the business user of this order can view it.",
  );
  if (!permitted.ok) {
    return permitted;
  }

  return { ok: true, order: serializeOrder(loaded.order) };
}

/** Completion time is stamped once on entering `completed` and cleared on leaving it. */
export function completedAt(
  order: Pick<Tables<"orders">, "completed_at">,
  status: OrderStatus,
  now: Date,
): string | null {
  if (status !== "completed") return null;
  return order.completed_at ?? now.toISOString();
}

/** Loads an order and checks the caller is its business user; runs before any payload is read. */
export async function loadOrderForStatusChange(params: {
  supabase: DbClient;
  caller: Caller;
  orderId: number;
}): Promise<{ ok: true; order: Tables<"orders"> } | ApiFailure> {
  const { supabase, caller, orderId } = params;

  const loaded = await loadOrder(supabase, orderId);
  if (!loaded.ok) {
    return loaded;
  }

  const permitted = authorize(
    isOrderBusinessPartner,
    { caller, method: "PATCH", resource: loaded.order },
    "Only the business user of this order can change its status.",
  );
  if (!permitted.ok) {
    console.warn("[orders-status-forbidden]", { orderId, userId: caller.id });
    return permitted;
  }
  return loaded;
}

export async function updateOrderStatus(params: {
  supabase: DbClient;
  caller: Caller;
  order: Tables<"orders">;
  input: OrderUpdateInput;
}): Promise<OrderResult> {
  const { supabase, caller, order, input } = params;
  const orderId = order.id;

  const { data: updated, error } = await supabase
    .from("orders")
    .update({
      status: input.status,
      completed_at: completedAt(order, input.status, new Date()),
    })
    .eq("id", orderId)
    .select("*")
    .single();

  if (error) {
    logServerError({ entityType: "orders", entityId: orderId, userId: caller.id }, error.message);
    return mapStoreError(error, { field: "status" });
  }

  console.log("[orders-status-updated]", {
    orderId,
    from: order.status,
    to: updated.status,
  });
  return { ok: true, order: serializeOrder(updated) };
}

// Orders are records of a purchase; only staff may remove one.
export async function deleteOrder(params: {
  supabase: DbClient;
  caller: Caller;
  orderId: number;
}): Promise<{ ok: true } | ApiFailure> {
  const { supabase, caller, orderId } = params;

  const loaded = await loadOrder(supabase, orderId);
  if (!loaded.ok) {
    return loaded;
  }

  const permitted = authorize(
    isStaff,
    { caller, method: "DELETE", resource: loaded.order },
    "Orders cannot be deleted once they have been created.",
  );
  if (!permitted.ok) {
    return permitted;
  }

  const { error } = await supabase.from("orders").delete().eq("id", orderId);
  if (error) {
    logServerError({ entityType: "orders", entityId: orderId, userId: caller.id }, error.message);
    return mapStoreError(error);
  }

  console.log("[orders-deleted]", { orderId, userId: caller.id });
  return { ok: true };
}
