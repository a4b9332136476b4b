import { NextRequest } from "next/server";

import { errorResponse } from "@/lib/api/errors";
import { handleRoute, json, withCaller } from "@/lib/api/handler";
import { listProfilesByType } from "@/lib/domain/profiles/profiles";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  return handleRoute("profiles", () =>
    withCaller(req, async ({ supabase }) => {
      const result = await listProfilesByType({ supabase, type: "business" });
      return result.ok ? json(result.profiles) : errorResponse(result);
    }),
  );
}
