import { NextRequest } from "next/server";

import { errorResponse } from "@/lib/api/errors";
import { handleRoute, json, withCaller } from "@/lib/api/handler";
import { readJsonBody } from "@/lib/api/request";
import { parsePayload } from "@/lib/api/validation";
import { toWirePage } from "@/lib/domain/pagination";
import { enumOf, integer, parseQueryParams, positiveInteger } from "@/lib/domain/queryParams";
import {
  authorizeReviewCreate,
  createReview,
  listReviews,
  REVIEW_ORDERINGS,
} from "@/lib/domain/reviews/reviews";
import { reviewCreateSchema } from "@/lib/domain/reviews/validation";
import { parseEnvConfig } from "@/schemas/env";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

// Without page_size the full filtered list comes back as a bare array.
export async function GET(req: NextRequest) {
  return handleRoute("reviews", () =>
    withCaller(req, async ({ supabase }) => {
      const { maxPageSize } = parseEnvConfig();
      const parsed = parseQueryParams(req.nextUrl.searchParams, (query) => ({
        businessUserId: query.read("business_user_id", integer),
        reviewerId: query.read("reviewer_id", integer),
        ordering: query.read("ordering", enumOf(REVIEW_ORDERINGS)),
        page: query.read("page", positiveInteger()),
        pageSize: query.read("page_size", positiveInteger({ max: maxPageSize })),
      }));
      if (!parsed.ok) {
        return errorResponse(parsed);
      }

      const { page, pageSize, ...filters } = parsed.params;
      const result = await listReviews({
        supabase,
        filters,
        page: pageSize ? { page: page ?? 1, pageSize } : null,
      });
      if (!result.ok) {
        return errorResponse(result);
      }

      return result.paginated ? json(toWirePage(result.page, req.url)) : json(result.reviews);
    }),
  );
}

export async function POST(req: NextRequest) {
  return handleRoute("reviews", () =>
    withCaller(req, async ({ supabase, caller }) => {
      const permitted = authorizeReviewCreate(caller);
      if (!permitted.ok) {
        return errorResponse(permitted);
      }

      const body = await readJsonBody(req);
      if (!body.ok) {
        return errorResponse(body);
      }
      const input = parsePayload(reviewCreateSchema, body.body);
      if (!input.ok) {
        return errorResponse(input);
      }

      const result = await createReview({ supabase, caller, input: input.data });
      return result.ok ? json(result.review, 201) : errorResponse(result);
    }),
  );
}
