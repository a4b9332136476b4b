import { NextRequest } from "next/server";

import { errorResponse } from "@/lib/api/errors";
import { handleRoute, json } from "@/lib/api/handler";
import { readJsonBody } from "@/lib/api/request";
import { parsePayload } from "@/lib/api/validation";
import { registerAccount } from "@/lib/domain/profiles/accounts";
import { registrationSchema } from "@/lib/domain/profiles/validation";
import { createAdminClient } from "@/utils/supabase/admin";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function POST(req: NextRequest) {
  return handleRoute("registration", async () => {
    const body = await readJsonBody(req);
    if (!body.ok) {
      return errorResponse(body);
    }
    const input = parsePayload(registrationSchema, body.body);
    if (!input.ok) {
      return errorResponse(input);
    }

    const result = await registerAccount({ supabase: createAdminClient(), input: input.data });
    return result.ok ? json(result.auth, 201) : errorResponse(result);
  });
}
