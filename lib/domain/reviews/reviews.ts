import { failure, mapStoreError, type ApiFailure } from "@/lib/api/errors";
import type { Caller } from "@/lib/domain/callers";
import { fetchPage, type Page, type PageRequest } from "@/lib/domain/pagination";
import {
  allOf,
  authorize,
  isAuthenticated,
  isCustomerUser,
  isOwnerOrReadOnly,
  reviewOwnership,
  type AuthorizationResult,
} from "@/lib/domain/permissions";
import type { Tables } from "@/lib/supabase/types";
import type { DbClient } from "@/utils/supabase/admin";
import { logServerError } from "@/utils/errors/logServerError";

import { serializeReview, type ReviewView } from "./serializers";
import type { ReviewCreateInput, ReviewUpdateInput } from "./validation";

export const REVIEW_ORDERINGS = ["updated_at", "-updated_at", "rating", "-rating"] as const;
export type ReviewOrdering = (typeof REVIEW_ORDERINGS)[number];

export type ReviewFilters = {
  businessUserId?: number;
  reviewerId?: number;
  ordering?: ReviewOrdering;
};

export type ReviewListResult =
  | { ok: true; paginated: true; page: Page<ReviewView> }
  | { ok: true; paginated: false; reviews: ReviewView[] }
  | ApiFailure;

type ReviewResult = { ok: true; review: ReviewView } | ApiFailure;

const ORDERING_COLUMNS = {
  updated_at: { column: "updated_at", ascending: true },
  "-updated_at": { column: "updated_at", ascending: false },
  rating: { column: "rating", ascending: true },
  "-rating": { column: "rating", ascending: false },
} as const satisfies Record<
  ReviewOrdering,
  { column: keyof Tables<"reviews">; ascending: boolean }
>;

const DUPLICATE_REVIEW_MESSAGE = "You have already submitted a review for this business user.";

function reviewsQuery(supabase: DbClient, filters: ReviewFilters, options: { head: boolean }) {
  let query = supabase.from("reviews").select("*", { count: "exact", head: options.head });
  if (filters.businessUserId !== undefined) {
    query = query.eq("business_user_id", filters.businessUserId);
  }
  if (filters.reviewerId !== undefined) {
    query = query.eq("reviewer_id", filters.reviewerId);
  }
  return query;
}

function orderedReviewsQuery(supabase: DbClient, filters: ReviewFilters) {
  const ordering = ORDERING_COLUMNS[filters.ordering ?? "-updated_at"];
  return reviewsQuery(supabase, filters, { head: false })
    .order(ordering.column, { ascending: ordering.ascending })
    .order("id", { ascending: true });
}

/** Paginates only when a page is requested; otherwise returns the whole filtered set. */
export async function listReviews(params: {
  supabase: DbClient;
  filters: ReviewFilters;
  page: PageRequest | null;
}): Promise<ReviewListResult> {
  const { supabase, filters, page } = params;

  if (!page) {
    const { data, error } = await orderedReviewsQuery(supabase, filters);
    if (error) {
      console.error("[reviews-list-failed]", { message: error.message });
      return mapStoreError(error);
    }
    return { ok: true, paginated: false, reviews: (data ?? []).map(serializeReview) };
  }

  const fetched = await fetchPage<Tables<"reviews">>({
    request: page,
    fetchRange: (from, to) => orderedReviewsQuery(supabase, filters).range(from, to),
    fetchCount: () => reviewsQuery(supabase, filters, { head: true }),
  });

  if (!fetched.ok) {
    console.error("[reviews-list-failed]", { message: fetched.error.message });
    return mapStoreError(fetched.error);
  }

  return {
    ok: true,
    paginated: true,
    page: { ...fetched.page, results: fetched.page.results.map(serializeReview) },
  };
}

async function loadReview(
  supabase: DbClient,
  reviewId: number,
): Promise<{ ok: true; review: Tables<"reviews"> } | ApiFailure> {
  const { data: review, error } = await supabase
    .from("reviews")
    .select("*")
    .eq("id", reviewId)
    .maybeSingle();

  if (error) {
    return mapStoreError(error);
  }
  if (!review) {
    return failure("not_found", "Review not found.");
  }
  return { ok: true, review };
}

export async function getReview(params: {
  supabase: DbClient;
  reviewId: number;
}): Promise<ReviewResult> {
  const loaded = await loadReview(params.supabase, params.reviewId);
  if (!loaded.ok) {
    return loaded;
  }
  return { ok: true, review: serializeReview(loaded.review) };
}

export function authorizeReviewCreate(caller: Caller): AuthorizationResult {
  return authorize(
    allOf(isAuthenticated, isCustomerUser),
    { caller, method: "POST", resource: undefined },
    "Only customer users can write reviews.",
  );
}

export async function createReview(params: {
  supabase: DbClient;
  caller: Caller;
  input: ReviewCreateInput;
}): Promise<ReviewResult> {
  const { supabase, caller, input } = params;

  const permitted = authorizeReviewCreate(caller);
  if (!permitted.ok) {
    return permitted;
  }

  const { data: businessUser, error: userError } = await supabase
    .from("users")
    .select("id, user_type")
    .eq("id", input.business_user)
    .maybeSingle();

  if (userError) {
    return mapStoreError(userError);
  }
  if (!businessUser) {
    return failure(
      "validation_error",
      "The specified business user was not found.",
      "business_user",
    );
  }
  if (businessUser.user_type !== "business") {
    return failure(
      "validation_error",
      "The specified user is not a business user.",
      "business_user",
    );
  }

  const { data: existing, error: existingError } = await supabase
    .from("reviews")
    .select("id")
    .eq("reviewer_id", caller.id)
    .eq("business_user_id", input.business_user)
    .maybeSingle();

  if (existingError) {
    return mapStoreError(existingError);
  }
  if (existing) {
    return failure("conflict", DUPLICATE_REVIEW_MESSAGE);
  }

  // A concurrent insert for the same pair still lands on the unique index.
  const { data: review, error } = await supabase
    .from("reviews")
    .insert({
      business_user_id: input.business_user,
      reviewer_id: caller.id,
      rating: input.rating,
      description: input.description,
    })
    .select("*")
    .single();

  if (error) {
    console.warn("[reviews-create-failed]", { userId: caller.id, code: error.code });
    return mapStoreError(error, { conflict: DUPLICATE_REVIEW_MESSAGE });
  }

  console.log("[reviews-created]", { reviewId: review.id, userId: caller.id });
  return { ok: true, review: serializeReview(review) };
}

/** Loads a review and checks the caller is its author; runs before any payload is read. */
export async function loadOwnedReview(params: {
  supabase: DbClient;
  caller: Caller;
  reviewId: number;
  method: string;
}): Promise<{ ok: true; review: Tables<"reviews"> } | ApiFailure> {
  const { supabase, caller, reviewId, method } = params;

  const loaded = await loadReview(supabase, reviewId);
  if (!loaded.ok) {
    return loaded;
  }

  const permitted = authorize(
    isOwnerOrReadOnly,
    { caller, method, resource: reviewOwnership(loaded.review) },
    "Only the author of this review can change it.",
  );
  if (!permitted.ok) {
    return permitted;
  }
  return loaded;
}

export async function updateReview(params: {
  supabase: DbClient;
  caller: Caller;
  review: Tables<"reviews">;
  input: ReviewUpdateInput;
}): Promise<ReviewResult> {
  const { supabase, caller, review: current, input } = params;
  const reviewId = current.id;

  const changes: { rating?: number; description?: string } = {};
  if (input.rating !== undefined) changes.rating = input.rating;
  if (input.description !== undefined) changes.description = input.description;

  if (!Object.keys(changes).length) {
    return { ok: true, review: serializeReview(current) };
  }

  const { data: review, error } = await supabase
    .from("reviews")
    .update(changes)
    .eq("id", reviewId)
    .select("*")
    .single();

  if (error) {
    logServerError({ entityType: "reviews", entityId: reviewId, userId: caller.id }, error.message);
    return mapStoreError(error);
  }

  return { ok: true, review: serializeReview(review) };
}

export async function deleteReview(params: {
  supabase: DbClient;
  caller: Caller;
  reviewId: number;
}): Promise<{ ok: true } | ApiFailure> {
  const { supabase, caller, reviewId } = params;

  const owned = await loadOwnedReview({ supabase, caller, reviewId, method: "DELETE" });
  if (!owned.ok) {
    return owned;
  }

  const { error } = await supabase.from("reviews").delete().eq("id", reviewId);
  if (error) {
    logServerError({ entityType: "reviews", entityId: reviewId, userId: caller.id }, error.message);
    return mapStoreError(error);
  }

  console.log("[reviews-deleted]", { reviewId, userId: caller.id });
  return { ok: true };
}
