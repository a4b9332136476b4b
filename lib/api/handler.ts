import { NextResponse, type NextRequest } from "next/server";

import { errorResponse, failure } from "@/lib/api/errors";
import { requireCaller, type Caller } from "@/lib/domain/callers";
import { logServerError } from "@/utils/errors/logServerError";
import { createAdminClient, type DbClient } from "@/utils/supabase/admin";

/** Runs a handler body and answers any unexpected exception with a logged `internal` error. */
export async function handleRoute(
  entityType: string,
  run: () => Promise<NextResponse>,
): Promise<NextResponse> {
  try {
    return await run();
  } catch (error) {
    logServerError({ entityType, message: "Unhandled route error" }, error);
    return errorResponse(failure("internal", "An unexpected error occurred."));
  }
}

type AuthenticatedContext = { supabase: DbClient; caller: Caller };

/** Resolves the bearer token to a caller, or answers 401 without calling `run`. */
export async function withCaller(
  request: NextRequest,
  run: (context: AuthenticatedContext) => Promise<NextResponse>,
): Promise<NextResponse> {
  const supabase = createAdminClient();
  const resolved = await requireCaller({ supabase, request });
  if (!resolved.ok) {
    return errorResponse(resolved);
  }
  return run({ supabase, caller: resolved.caller });
}

export function json<T>(body: T, status = 200) {
  return NextResponse.json(body, { status });
}
