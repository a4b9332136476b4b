import { NextRequest } from "next/server";

import { errorResponse } from "@/lib/api/errors";
import { handleRoute, json } from "@/lib/api/handler";
import { readJsonBody } from "@/lib/api/request";
import { parsePayload } from "@/lib/api/validation";
import { login } from "@/lib/domain/profiles/accounts";
import { loginSchema } from "@/lib/domain/profiles/validation";
import { createAdminClient } from "@/utils/supabase/admin";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: NextRequest) {
  return handleRoute("login", async () => {
    const body = await readJsonBody(req);
    if (!body.ok) {
      return errorResponse(body);
    }
    const input = parsePayload(loginSchema, body.body);
    if (!input.ok) {
      return errorResponse(input);
    }

    const result = await login({ supabase: createAdminClient(), input: input.data });
    return result.ok ? json(result.auth) : errorResponse(result);
  });
}
