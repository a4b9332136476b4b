import type { OfferType, Tables, Views } from "@/lib/supabase/types";

import { OFFER_TYPES } from "./validation";

type OfferSummaryRow = Views<"offer_summaries">;
type OfferRow = Tables<"offers">;
type OfferDetailRow = Tables<"offer_details">;

export type OfferDetailLink = { id: number; url: string };

export type OfferDetailView = {
  id: number;
  title: string;
  revisions: number;
  delivery_time_in_days: number;
  price: number;
  features: string[];
  offer_type: OfferType;
};

export type OfferRetrieveView = {
  id: number;
  creator: number;
  title: string;
  image: string | null;
  description: string;
  created_at: string;
  updated_at: string;
  details: OfferDetailLink[];
  min_price: number;
  min_delivery_time: number;
};

export type OfferListItemView = OfferRetrieveView & {
  user_details: { first_name: string; last_name: string; username: string };
};

export type OfferWithDetailsView = {
  id: number;
  title: string;
  image: string | null;
  description: string;
  details: OfferDetailView[];
};

const TIER_RANK = new Map<OfferType, number>(OFFER_TYPES.map((tier, index) => [tier, index]));

export function sortByTier<T extends { offer_type: OfferType; id: number }>(details: T[]): T[] {
  return [...details].sort(
    (a, b) =>
      (TIER_RANK.get(a.offer_type) ?? 0) - (TIER_RANK.get(b.offer_type) ?? 0) || a.id - b.id,
  );
}

export function offerDetailUrl(origin: string, detailId: number) {
  return `${origin}/api/offerdetails/${detailId}/`;
}

export function serializeOfferDetail(detail: OfferDetailRow): OfferDetailView {
  return {
    id: detail.id,
    title: detail.title,
    revisions: detail.revisions,
    delivery_time_in_days: detail.delivery_time_in_days,
    price: Number(detail.price),
    features: detail.features ?? [],
    offer_type: detail.offer_type,
  };
}

export function serializeOfferRetrieve(
  summary: OfferSummaryRow,
  details: { id: number; offer_type: OfferType }[],
  origin: string,
): OfferRetrieveView {
  return {
    id: summary.id,
    creator: summary.creator_id,
    title: summary.title,
    image: summary.image,
    description: summary.description,
    created_at: summary.created_at,
    updated_at: summary.updated_at,
    details: sortByTier(details).map((detail) => ({
      id: detail.id,
      url: offerDetailUrl(origin, detail.id),
    })),
    min_price: Number(summary.min_price),
    min_delivery_time: summary.min_delivery_time,
  };
}

export function serializeOfferListItem(
  summary: OfferSummaryRow,
  details: { id: number; offer_type: OfferType }[],
  origin: string,
): OfferListItemView {
  return {
    ...serializeOfferRetrieve(summary, details, origin),
    user_details: {
      first_name: summary.creator_first_name ?? "",
      last_name: summary.creator_last_name ?? "",
      username: summary.creator_username ?? "",
    },
  };
}

export function serializeOfferWithDetails(
  offer: OfferRow,
  details: OfferDetailRow[],
): OfferWithDetailsView {
  return {
    id: offer.id,
    title: offer.title,
    image: offer.image,
    description: offer.description,
    details: sortByTier(details).map(serializeOfferDetail),
  };
}
