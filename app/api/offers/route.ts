import { NextRequest } from "next/server";

import { errorResponse } from "@/lib/api/errors";
import { handleRoute, json, withCaller } from "@/lib/api/handler";
import { readJsonBody, requestOrigin } from "@/lib/api/request";
import {
  authorizeOfferCreate,
  createOffer,
  listOffers,
  OFFER_ORDERINGS,
} from "@/lib/domain/offers/offers";
import { validateOfferCreate } from "@/lib/domain/offers/validation";
import { toWirePage } from "@/lib/domain/pagination";
import {
  enumOf,
  integer,
  nonNegativeNumber,
  parseQueryParams,
  positiveInteger,
  text,
} from "@/lib/domain/queryParams";
import { parseEnvConfig } from "@/schemas/env";
import { createAdminClient } from "@/utils/supabase/admin";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

// Public listing: filters combine with AND, then ordering, then the page slice.
export async function GET(req: NextRequest) {
  return handleRoute("offers", async () => {
    const config = parseEnvConfig();
    const parsed = parseQueryParams(req.nextUrl.searchParams, (query) => ({
      creatorId: query.read("creator_id", integer),
      search: query.read("search", text),
      minPrice: query.read("min_price", nonNegativeNumber),
      maxDeliveryTime: query.read("max_delivery_time", positiveInteger()),
      ordering: query.read("ordering", enumOf(OFFER_ORDERINGS)),
      page: query.read("page", positiveInteger()),
      pageSize: query.read("page_size", positiveInteger({ max: config.maxPageSize })),
    }));
    if (!parsed.ok) {
      return errorResponse(parsed);
    }

    const { page, pageSize, ...filters } = parsed.params;
    const result = await listOffers({
      supabase: createAdminClient(),
      filters,
      page: { page: page ?? 1, pageSize: pageSize ?? config.offersPageSize },
      origin: requestOrigin(req),
    });
    if (!result.ok) {
      return errorResponse(result);
    }

    return json(toWirePage(result.page, req.url));
  });
}

export async function POST(req: NextRequest) {
  return handleRoute("offers", () =>
    withCaller(req, async ({ supabase, caller }) => {
      const permitted = authorizeOfferCreate(caller);
      if (!permitted.ok) {
        return errorResponse(permitted);
      }

      const body = await readJsonBody(req);
      if (!body.ok) {
        return errorResponse(body);
      }
      const input = validateOfferCreate(body.body);
      if (!input.ok) {
        return errorResponse(input);
      }

      const created = await createOffer({ supabase, caller, input: input.data });
      if (!created.ok) {
        return errorResponse(created);
      }
      return json(created.offer, 201);
    }),
  );
}
