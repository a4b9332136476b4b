import { z } from "zod";

import { failure, type ApiFailure } from "@/lib/api/errors";
import { parsePayload } from "@/lib/api/validation";
import type { OfferType } from "@/lib/supabase/types";

export const OFFER_TYPES = ["basic", "standard", "premium"] as const satisfies readonly OfferType[];

const detailTitle = z.string().trim().min(1, "Title cannot be empty.");
const revisions = z
  .number({ invalid_type_error: "Revisions must be an integer, not a string." })
  .int()
  .min(-1, "Revisions must be -1 (unlimited) or positive.");
const deliveryTime = z
  .number({ invalid_type_error: "Delivery time must be an integer, not a string." })
  .int()
  .min(1, "Delivery time must be at least one day.");
const price = z
  .number({ invalid_type_error: "Price must be a number, not a string." })
  .nonnegative("Price cannot be negative.");
const features = z.array(z.string());

export const offerDetailInputSchema = z.object({
  offer_type: z.enum(OFFER_TYPES),
  title: detailTitle,
  revisions: revisions.default(0),
  delivery_time_in_days: deliveryTime,
  price,
  features: features.default([]),
});

export const offerDetailPatchSchema = z.object({
  offer_type: z.enum(OFFER_TYPES),
  title: detailTitle.optional(),
  revisions: revisions.optional(),
  delivery_time_in_days: deliveryTime.optional(),
  price: price.optional(),
  features: features.optional(),
});

export const offerCreateSchema = z.object({
  title: z.string().trim().min(1, "Title cannot be empty."),
  description: z.string().trim(),
  image: z.string().nullable().optional(),
  details: z.array(offerDetailInputSchema),
});

export const offerUpdateSchema = z.object({
  title: z.string().trim().min(1, "Title cannot be empty.").optional(),
  description: z.string().trim().optional(),
  image: z.string().nullable().optional(),
  details: z.array(offerDetailPatchSchema).optional(),
});

export type OfferDetailInput = z.output<typeof offerDetailInputSchema>;
export type OfferDetailPatch = z.output<typeof offerDetailPatchSchema>;
export type OfferCreateInput = z.output<typeof offerCreateSchema>;
export type OfferUpdateInput = z.output<typeof offerUpdateSchema>;

function countTiers(details: { offer_type: OfferType }[]) {
  const counts = new Map<OfferType, number>();
  for (const detail of details) {
    counts.set(detail.offer_type, (counts.get(detail.offer_type) ?? 0) + 1);
  }
  return counts;
}

function duplicatedTiers(details: { offer_type: OfferType }[]): OfferType[] {
  const counts = countTiers(details);
  return OFFER_TYPES.filter((tier) => (counts.get(tier) ?? 0) > 1);
}

/** An offer carries exactly one detail for each of basic, standard and premium. */
export function checkTierSet(details: { offer_type: OfferType }[]): ApiFailure | null {
  const counts = countTiers(details);
  const missing = OFFER_TYPES.filter((tier) => !counts.has(tier));
  const duplicated = duplicatedTiers(details);

  if (!missing.length && !duplicated.length && details.length === OFFER_TYPES.length) {
    return null;
  }

  const problems: string[] = [];
  if (missing.length) problems.push(`missing ${missing.join(", ")}`);
  if (duplicated.length) problems.push(`duplicated ${duplicated.join(", ")}`);

  return failure(
    "validation_error",
    `An offer must contain exactly one basic, one standard and one premium detail (${problems.join("; ")}).`,
    "details",
  );
}

export function validateOfferCreate(body: unknown): { ok: true; data: OfferCreateInput } | ApiFailure {
  const parsed = parsePayload(offerCreateSchema, body);
  if (!parsed.ok) return parsed;

  const tierFailure = checkTierSet(parsed.data.details);
  if (tierFailure) return tierFailure;

  return parsed;
}

export function validateOfferUpdate(body: unknown): { ok: true; data: OfferUpdateInput } | ApiFailure {
  const parsed = parsePayload(offerUpdateSchema, body);
  if (!parsed.ok) return parsed;

  const duplicated = duplicatedTiers(parsed.data.details ?? []);
  if (duplicated.length) {
    return failure(
      "validation_error",
      `Each tier may be listed once (duplicated ${duplicated.join(", ")}).`,
      "details",
    );
  }

  return parsed;
}
