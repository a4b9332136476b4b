import { failure, mapStoreError, type ApiFailure } from "@/lib/api/errors";
import type { DbClient } from "@/utils/supabase/admin";
import { logServerError } from "@/utils/errors/logServerError";

import type { LoginInput, RegistrationInput } from "./validation";

export type AuthTokenView = {
  token: string;
  user_id: number;
  username: string;
  email: string;
};

type AuthResult = { ok: true; auth: AuthTokenView } | ApiFailure;

const INVALID_CREDENTIALS = "Invalid credentials.";

async function issueToken(
  supabase: DbClient,
  credentials: { email: string; password: string },
): Promise<{ ok: true; token: string } | { ok: false; message: string }> {
  const { data, error } = await supabase.auth.signInWithPassword(credentials);
  const token = data.session?.access_token;
  if (error || !token) {
    return { ok: false, message: error?.message ?? "no session returned" };
  }
  return { ok: true, token };
}

async function findTakenField(
  supabase: DbClient,
  input: RegistrationInput,
): Promise<{ ok: true; field: "username" | "email" | null } | ApiFailure> {
  const { data: byUsername, error: usernameError } = await supabase
    .from("users")
    .select("id")
    .eq("username", input.username)
    .maybeSingle();
  if (usernameError) return mapStoreError(usernameError);
  if (byUsername) return { ok: true, field: "username" };

  const { data: byEmail, error: emailError } = await supabase
    .from("users")
    .select("id")
    .eq("email", input.email)
    .limit(1)
    .maybeSingle();
  if (emailError) return mapStoreError(emailError);
  if (byEmail) return { ok: true, field: "email" };

  return { ok: true, field: null };
}

/**
 * Creates the auth account, then the user row and its profile in one transaction. The
 * auth account is removed again when the second step fails.
 */
export async function registerAccount(params: {
  supabase: DbClient;
  input: RegistrationInput;
}): Promise<AuthResult> {
  const { supabase, input } = params;

  const taken = await findTakenField(supabase, input);
  if (!taken.ok) return taken;
  if (taken.field) {
    return failure("conflict", `A user with this ${taken.field} already exists.`, taken.field);
  }

  const { data: created, error: createError } = await supabase.auth.admin.createUser({
    email: input.email,
    password: input.password,
    email_confirm: true,
    user_metadata: { username: input.username },
  });

  const authUser = created.user;
  if (createError || !authUser) {
    if (createError?.status === 422 || createError?.code === "email_exists") {
      return failure("conflict", "A user with this email already exists.", "email");
    }
    logServerError({ entityType: "registration", message: "auth user creation failed" }, createError);
    return failure("internal", "The account could not be created.");
  }

  const { data: userId, error } = await supabase.rpc("register_account", {
    p_auth_user_id: authUser.id,
    p_username: input.username,
    p_email: input.email,
    p_first_name: input.first_name,
    p_last_name: input.last_name,
    p_user_type: input.type,
  });

  if (error || userId === null) {
    const { error: rollbackError } = await supabase.auth.admin.deleteUser(authUser.id);
    if (rollbackError) {
      logServerError(
        { entityType: "registration", message: "auth user rollback failed" },
        rollbackError,
      );
    }
    if (!error) {
      return failure("internal", "The account could not be created.");
    }
    console.warn("[registration-failed]", { code: error.code, message: error.message });
    return mapStoreError(error, {
      conflict: "A user with this username already exists.",
      field: error.code === "23505" ? "username" : undefined,
    });
  }

  const session = await issueToken(supabase, { email: input.email, password: input.password });
  if (!session.ok) {
    logServerError(
      { entityType: "registration", entityId: userId, message: "sign-in after registration failed" },
      session.message,
    );
    return failure("internal", "The account was created but no token could be issued.");
  }

  console.log("[registration-succeeded]", { userId, type: input.type });
  return {
    ok: true,
    auth: { token: session.token, user_id: userId, username: input.username, email: input.email },
  };
}

export async function login(params: { supabase: DbClient; input: LoginInput }): Promise<AuthResult> {
  const { supabase, input } = params;

  const { data: user, error } = await supabase
    .from("users")
    .select("id, username, email")
    .eq("username", input.username)
    .maybeSingle();

  if (error) {
    return mapStoreError(error);
  }
  if (!user) {
    console.warn("[login-rejected]", { reason: "unknown_username" });
    return failure("unauthorized", INVALID_CREDENTIALS);
  }

  const session = await issueToken(supabase, { email: user.email, password: input.password });
  if (!session.ok) {
    console.warn("[login-rejected]", { reason: "bad_password", userId: user.id });
    return failure("unauthorized", INVALID_CREDENTIALS);
  }

  return {
    ok: true,
    auth: { token: session.token, user_id: user.id, username: user.username, email: user.email },
  };
}
