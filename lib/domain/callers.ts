// Caller resolution: bearer token -> Supabase auth user -> public.users row.
// Every authenticated route starts with `requireCaller`; public routes skip it entirely.
import type { NextRequest } from "next/server";

import { failure, type ApiFailure } from "@/lib/api/errors";
import type { UserType } from "@/lib/supabase/types";
import type { DbClient } from "@/utils/supabase/admin";

export type Caller = {
  id: number;
  username: string;
  email: string;
  userType: UserType;
  isStaff: boolean;
};

export type CallerResolutionFailureCode =
  | "missing_token"
  | "invalid_token"
  | "unknown_user"
  | "lookup_failed";

export type CallerResolutionResult =
  | { ok: true; caller: Caller }
  | { ok: false; code: CallerResolutionFailureCode; diagnostics?: { message?: string } };

export function extractBearerToken(header: string | null | undefined): string | null {
  if (!header) return null;
  const [scheme, token, ...rest] = header.trim().split(/\s+/);
  if (!token || rest.length > 0 || scheme.toLowerCase() !== "bearer") {
    return null;
  }
  return token;
}

export async function resolveCaller({
  supabase,
  request,
}: {
  supabase: DbClient;
  request: NextRequest;
}): Promise<CallerResolutionResult> {
  const token = extractBearerToken(request.headers.get("authorization"));
  if (!token) {
    return { ok: false, code: "missing_token" };
  }

  const { data: authData, error: authError } = await supabase.auth.getUser(token);
  const authUser = authData?.user ?? null;
  if (authError || !authUser) {
    return {
      ok: false,
      code: "invalid_token",
      diagnostics: { message: authError?.message },
    };
  }

  const { data: user, error } = await supabase
    .from("users")
    .select("id, username, email, user_type, is_staff")
    .eq("auth_user_id", authUser.id)
    .maybeSingle();

  if (error) {
    return { ok: false, code: "lookup_failed", diagnostics: { message: error.message } };
  }

  if (!user) {
    return { ok: false, code: "unknown_user" };
  }

  return {
    ok: true,
    caller: {
      id: user.id,
      username: user.username,
      email: user.email,
      userType: user.user_type,
      isStaff: user.is_staff,
    },
  };
}

export async function requireCaller(args: {
  supabase: DbClient;
  request: NextRequest;
}): Promise<{ ok: true; caller: Caller } | ApiFailure> {
  const result = await resolveCaller(args);
  if (result.ok) {
    return result;
  }

  if (result.code === "lookup_failed") {
    console.error("[caller-lookup-failed]", { message: result.diagnostics?.message });
    return failure("internal", "Could not resolve the authenticated user.");
  }

  if (result.code !== "missing_token") {
    console.warn("[caller-rejected]", { reason: result.code });
  }

  return failure("unauthorized", "Authentication credentials were not provided or are invalid.");
}
