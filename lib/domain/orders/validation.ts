import { z } from "zod";

import type { OrderStatus } from "@/lib/supabase/types";

export const ORDER_STATUSES = [
  "pending",
  "in_progress",
  "completed",
  "cancelled",
] as const satisfies readonly OrderStatus[];

export const orderCreateSchema = z.object({
  offer_detail_id: z
    .number({
      required_error: "offer_detail_id is required.",
      invalid_type_error: "Offer detail ID must be an integer, not a string.",
    })
    .int("Offer detail ID must be an integer.")
    .safe("Offer detail ID is out of range."),
});

// Only the status may change once an order exists.
export const orderUpdateSchema = z
  .object({
    status: z.enum(ORDER_STATUSES),
  })
  .strict();

export type OrderCreateInput = z.output<typeof orderCreateSchema>;
export type OrderUpdateInput = z.output<typeof orderUpdateSchema>;
