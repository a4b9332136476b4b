import { NextRequest } from "next/server";

import { errorResponse } from "@/lib/api/errors";
import { handleRoute, json, withCaller } from "@/lib/api/handler";
import { getProfile } from "@/lib/domain/profiles/profiles";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET(req: NextRequest) {
  return handleRoute("profiles", () =>
    withCaller(req, async ({ supabase, caller }) => {
      const result = await getProfile({ supabase, userId: caller.id });
      return result.ok ? json(result.profile) : errorResponse(result);
    }),
  );
}
