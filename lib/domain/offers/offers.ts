import { failure, mapStoreError, type ApiFailure } from "@/lib/api/errors";
import type { Caller } from "@/lib/domain/callers";
import { fetchPage, type Page, type PageRequest } from "@/lib/domain/pagination";
import {
  allOf,
  authorize,
  isAuthenticated,
  type AuthorizationResult,
  isBusinessUser,
  isOwnerOrReadOnly,
  offerOwnership,
} from "@/lib/domain/permissions";
import type { Json, Tables, Views } from "@/lib/supabase/types";
import type { DbClient } from "@/utils/supabase/admin";
import { logServerError } from "@/utils/errors/logServerError";

import {
  serializeOfferDetail,
  serializeOfferListItem,
  serializeOfferRetrieve,
  serializeOfferWithDetails,
  type OfferDetailView,
  type OfferListItemView,
  type OfferRetrieveView,
  type OfferWithDetailsView,
} from "./serializers";
import type {
  OfferCreateInput,
  OfferDetailInput,
  OfferDetailPatch,
  OfferUpdateInput,
} from "./validation";

export const OFFER_ORDERINGS = ["updated_at", "-updated_at", "min_price", "-min_price"] as const;
export type OfferOrdering = (typeof OFFER_ORDERINGS)[number];

export type OfferFilters = {
  creatorId?: number;
  search?: string;
  minPrice?: number;
  maxDeliveryTime?: number;
  ordering?: OfferOrdering;
};

type OfferResult<T> = { ok: true; offer: T } | ApiFailure;

const ORDERING_COLUMNS = {
  updated_at: { column: "updated_at", ascending: true },
  "-updated_at": { column: "updated_at", ascending: false },
  min_price: { column: "min_price", ascending: true },
  "-min_price": { column: "min_price", ascending: false },
} as const satisfies Record<
  OfferOrdering,
  { column: keyof Views<"offer_summaries">; ascending: boolean }
>;

export function escapeLikePattern(value: string) {
  return value.replace(/[\\%_]/g, "\\$&");
}

// Double-quoted so commas and parentheses in the search text stay inside the value.
export function buildSearchFilter(search: string) {
  const pattern = `%${escapeLikePattern(search)}%`;
  const quoted = `"${pattern.replace(/[\\"]/g, "\\$&")}"`;
  return `title.ilike.${quoted},description.ilike.${quoted}`;
}

function summariesQuery(supabase: DbClient, filters: OfferFilters, options: { head: boolean }) {
  let query = supabase
    .from("offer_summaries")
    .select("*", { count: "exact", head: options.head });

  if (filters.creatorId !== undefined) {
    query = query.eq("creator_id", filters.creatorId);
  }
  if (filters.search) {
    query = query.or(buildSearchFilter(filters.search));
  }
  if (filters.minPrice !== undefined) {
    query = query.gte("min_price", filters.minPrice);
  }
  if (filters.maxDeliveryTime !== undefined) {
    query = query.lte("min_delivery_time", filters.maxDeliveryTime);
  }
  return query;
}

async function loadDetailLinks(supabase: DbClient, offerIds: number[]) {
  if (!offerIds.length) {
    return { ok: true as const, byOffer: new Map<number, Tables<"offer_details">[]>() };
  }

  const { data, error } = await supabase
    .from("offer_details")
    .select("*")
    .in("offer_id", offerIds)
    .order("id", { ascending: true });

  if (error) {
    return { ok: false as const, error };
  }

  const byOffer = new Map<number, Tables<"offer_details">[]>();
  for (const detail of data ?? []) {
    const bucket = byOffer.get(detail.offer_id) ?? [];
    bucket.push(detail);
    byOffer.set(detail.offer_id, bucket);
  }
  return { ok: true as const, byOffer };
}

/**
 * Filters, orders, counts and slices in the data store against `offer_summaries`, then
 * loads the page's details with a single `in` query.
 */
export async function listOffers(params: {
  supabase: DbClient;
  filters: OfferFilters;
  page: PageRequest;
  origin: string;
}): Promise<{ ok: true; page: Page<OfferListItemView> } | ApiFailure> {
  const { supabase, filters, origin } = params;
  const ordering = filters.ordering ? ORDERING_COLUMNS[filters.ordering] : null;

  const fetched = await fetchPage<Views<"offer_summaries">>({
    request: params.page,
    fetchRange: (from, to) => {
      let query = summariesQuery(supabase, filters, { head: false });
      if (ordering) {
        query = query.order(ordering.column, { ascending: ordering.ascending });
      }
      return query.order("id", { ascending: true }).range(from, to);
    },
    fetchCount: () => summariesQuery(supabase, filters, { head: true }),
  });

  if (!fetched.ok) {
    console.error("[offers-list-query-failed]", { message: fetched.error.message });
    return mapStoreError(fetched.error);
  }

  const summaries = fetched.page.results;
  const details = await loadDetailLinks(
    supabase,
    summaries.map((summary) => summary.id),
  );
  if (!details.ok) {
    console.error("[offers-list-details-failed]", { message: details.error.message });
    return mapStoreError(details.error);
  }

  return {
    ok: true,
    page: {
      ...fetched.page,
      results: summaries.map((summary) =>
        serializeOfferListItem(summary, details.byOffer.get(summary.id) ?? [], origin),
      ),
    },
  };
}

export async function getOffer(params: {
  supabase: DbClient;
  offerId: number;
  origin: string;
}): Promise<OfferResult<OfferRetrieveView>> {
  const { supabase, offerId, origin } = params;

  const { data: summary, error } = await supabase
    .from("offer_summaries")
    .select("*")
    .eq("id", offerId)
    .maybeSingle();

  if (error) {
    console.error("[offers-retrieve-failed]", { offerId, message: error.message });
    return mapStoreError(error);
  }
  if (!summary) {
    return failure("not_found", "Offer not found.");
  }

  const details = await loadDetailLinks(supabase, [summary.id]);
  if (!details.ok) {
    return mapStoreError(details.error);
  }

  return {
    ok: true,
    offer: serializeOfferRetrieve(summary, details.byOffer.get(summary.id) ?? [], origin),
  };
}

async function loadOfferWithDetails(
  supabase: DbClient,
  offerId: number,
): Promise<OfferResult<OfferWithDetailsView>> {
  const { data: offer, error } = await supabase
    .from("offers")
    .select("*")
    .eq("id", offerId)
    .maybeSingle();

  if (error) {
    return mapStoreError(error);
  }
  if (!offer) {
    return failure("not_found", "Offer not found.");
  }

  const { data: details, error: detailsError } = await supabase
    .from("offer_details")
    .select("*")
    .eq("offer_id", offerId);

  if (detailsError) {
    return mapStoreError(detailsError);
  }

  return { ok: true, offer: serializeOfferWithDetails(offer, details ?? []) };
}

/** Loads an offer and checks the caller may change it; runs before any payload is read. */
export async function loadOwnedOffer(params: {
  supabase: DbClient;
  caller: Caller;
  offerId: number;
  method: string;
}): Promise<{ ok: true; offer: Tables<"offers"> } | ApiFailure> {
  const { supabase, caller, offerId, method } = params;

  const { data: offer, error } = await supabase
    .from("offers")
    .select("*")
    .eq("id", offerId)
    .maybeSingle();

  if (error) {
    return mapStoreError(error);
  }
  if (!offer) {
    return failure("not_found", "Offer not found.");
  }

  const permitted = authorize(
    isOwnerOrReadOnly,
    { caller, method, resource: offerOwnership(offer) },
    "Only the creator of this offer can change it.",
  );
  if (!permitted.ok) {
    console.warn("[offers-mutation-forbidden]", { offerId, userId: caller.id });
    return permitted;
  }

  return { ok: true, offer };
}

export function authorizeOfferCreate(caller: Caller): AuthorizationResult {
  return authorize(
    allOf(isAuthenticated, isBusinessUser),
    { caller, method: "POST", resource: undefined },
    "Only business users can create offers.",
  );
}

export async function createOffer(params: {
  supabase: DbClient;
  caller: Caller;
  input: OfferCreateInput;
}): Promise<OfferResult<OfferWithDetailsView>> {
  const { supabase, caller, input } = params;

  const permitted = authorizeOfferCreate(caller);
  if (!permitted.ok) {
    return permitted;
  }

  const { data: offerId, error } = await supabase.rpc("create_offer_with_details", {
    p_creator_id: caller.id,
    p_title: input.title,
    p_description: input.description,
    p_image: input.image ?? null,
    p_details: input.details.map(detailJson),
  });

  if (error || offerId === null) {
    logServerError(
      { entityType: "offers", userId: caller.id, message: "create_offer_with_details failed" },
      error?.message ?? "no id returned",
    );
    return error
      ? mapStoreError(error, { field: "details" })
      : failure("internal", "The offer could not be created.");
  }

  console.log("[offers-created]", { offerId, userId: caller.id });
  return loadOfferWithDetails(supabase, offerId);
}

function detailJson(detail: OfferDetailInput): { [key: string]: Json } {
  return {
    offer_type: detail.offer_type,
    title: detail.title,
    revisions: detail.revisions,
    delivery_time_in_days: detail.delivery_time_in_days,
    price: detail.price,
    features: detail.features,
  };
}

function detailPatchJson(detail: OfferDetailPatch): { [key: string]: Json } {
  const patch: { [key: string]: Json } = { offer_type: detail.offer_type };
  if (detail.title !== undefined) patch.title = detail.title;
  if (detail.revisions !== undefined) patch.revisions = detail.revisions;
  if (detail.delivery_time_in_days !== undefined) {
    patch.delivery_time_in_days = detail.delivery_time_in_days;
  }
  if (detail.price !== undefined) patch.price = detail.price;
  if (detail.features !== undefined) patch.features = detail.features;
  return patch;
}

export async function updateOffer(params: {
  supabase: DbClient;
  offer: Tables<"offers">;
  input: OfferUpdateInput;
}): Promise<OfferResult<OfferWithDetailsView>> {
  const { supabase, offer, input } = params;
  const offerId = offer.id;

  const { error } = await supabase.rpc("update_offer_with_details", {
    p_offer_id: offerId,
    p_title: input.title ?? null,
    p_description: input.description ?? null,
    p_image: input.image ?? null,
    p_set_image: input.image !== undefined,
    p_details: (input.details ?? []).map(detailPatchJson),
  });

  if (error) {
    console.warn("[offers-update-failed]", { offerId, code: error.code, message: error.message });
    return mapStoreError(error, {
      notFound: "The offer does not have one of the listed tiers.",
      field: error.code === "P0002" ? "details" : undefined,
    });
  }

  return loadOfferWithDetails(supabase, offerId);
}

export async function deleteOffer(params: {
  supabase: DbClient;
  caller: Caller;
  offerId: number;
}): Promise<{ ok: true } | ApiFailure> {
  const { supabase, caller, offerId } = params;

  const owned = await loadOwnedOffer({ supabase, caller, offerId, method: "DELETE" });
  if (!owned.ok) {
    return owned;
  }

  const { error } = await supabase.from("offers").delete().eq("id", offerId);
  if (error) {
    logServerError({ entityType: "offers", entityId: offerId, userId: caller.id }, error.message);
    return mapStoreError(error);
  }

  console.log("[offers-deleted]", { offerId, userId: caller.id });
  return { ok: true };
}

export async function getOfferDetail(params: {
  supabase: DbClient;
  detailId: number;
}): Promise<{ ok: true; detail: OfferDetailView } | ApiFailure> {
  const { data: detail, error } = await params.supabase
    .from("offer_details")
    .select("*")
    .eq("id", params.detailId)
    .maybeSingle();

  if (error) {
    return mapStoreError(error);
  }
  if (!detail) {
    return failure("not_found", "Offer detail not found.");
  }
  return { ok: true, detail: serializeOfferDetail(detail) };
}
