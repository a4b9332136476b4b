import type { OfferType, OrderStatus, Tables } from "@/lib/supabase/types";

export type OrderView = {
  id: number;
  customer_user: number;
  business_user: number;
  title: string;
  revisions: number;
  delivery_time_in_days: number;
  price: number;
  features: string[];
  offer_type: OfferType;
  status: OrderStatus;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
};

// Orders carry their own copy of the tier they were placed for.
export function serializeOrder(order: Tables<"orders">): OrderView {
  return {
    id: order.id,
    customer_user: order.customer_user_id,
    business_user: order.business_user_id,
    title: order.title,
    revisions: order.revisions,
    delivery_time_in_days: order.delivery_time_in_days,
    price: Number(order.price),
    features: order.features,
    offer_type: order.offer_type,
    status: order.status,
    completed_at: order.completed_at,
    created_at: order.created_at,
    updated_at: order.updated_at,
  };
}
