import { errorResponse } from "@/lib/api/errors";
import { handleRoute, json } from "@/lib/api/handler";
import { getBaseInfo } from "@/lib/domain/baseInfo";
import { createAdminClient } from "@/utils/supabase/admin";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  return handleRoute("base-info", async () => {
    const result = await getBaseInfo({ supabase: createAdminClient() });
    return result.ok ? json(result.info) : errorResponse(result);
  });
}
