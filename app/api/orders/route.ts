import { NextRequest } from "next/server";

import { errorResponse } from "@/lib/api/errors";
import { handleRoute, json, withCaller } from "@/lib/api/handler";
import { readJsonBody } from "@/lib/api/request";
import { parsePayload } from "@/lib/api/validation";
import { authorizeOrderCreate, createOrder, listOrdersForCaller } from "@/lib/domain/orders/orders";
import { orderCreateSchema } from "@/lib/domain/orders/validation";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  return handleRoute("orders", () =>
    withCaller(req, async ({ supabase, caller }) => {
      const result = await listOrdersForCaller({ supabase, caller });
      return result.ok ? json(result.orders) : errorResponse(result);
    }),
  );
}

export async function POST(req: NextRequest) {
  return handleRoute("orders", () =>
    withCaller(req, async ({ supabase, caller }) => {
      const permitted = authorizeOrderCreate(caller);
      if (!permitted.ok) {
        return errorResponse(permitted);
      }

      const body = await readJsonBody(req);
      if (!body.ok) {
        return errorResponse(body);
      }
      const input = parsePayload(orderCreateSchema, body.body);
      if (!input.ok) {
        return errorResponse(input);
      }

      const result = await createOrder({ supabase, caller, input: input.data });
      return result.ok ? json(result.order, 201) : errorResponse(result);
    }),
  );
}
