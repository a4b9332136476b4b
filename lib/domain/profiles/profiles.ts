import { failure, mapStoreError, type ApiFailure } from "@/lib/api/errors";
import type { Caller } from "@/lib/domain/callers";
import { authorize, isOwnerOrReadOnly, profileOwnership } from "@/lib/domain/permissions";
import type { Json, UserType } from "@/lib/supabase/types";
import type { DbClient } from "@/utils/supabase/admin";
import { logServerError } from "@/utils/errors/logServerError";

import { serializeProfile, type ProfileView } from "./serializers";
import type { ProfileUpdateInput } from "./validation";

type ProfileResult = { ok: true; profile: ProfileView } | ApiFailure;

export async function getProfile(params: {
  supabase: DbClient;
  userId: number;
}): Promise<ProfileResult> {
  const { data, error } = await params.supabase
    .from("profile_details")
    .select("*")
    .eq("user", params.userId)
    .maybeSingle();

  if (error) {
    console.error("[profiles-retrieve-failed]", { userId: params.userId, message: error.message });
    return mapStoreError(error);
  }
  if (!data) {
    return failure("not_found", "Profile not found.");
  }
  return { ok: true, profile: serializeProfile(data) };
}

export async function listProfilesByType(params: {
  supabase: DbClient;
  type: UserType;
}): Promise<{ ok: true; profiles: ProfileView[] } | ApiFailure> {
  const { data, error } = await params.supabase
    .from("profile_details")
    .select("*")
    .eq("type", params.type)
    .order("user", { ascending: true });

  if (error) {
    console.error("[profiles-list-failed]", { type: params.type, message: error.message });
    return mapStoreError(error);
  }
  return { ok: true, profiles: (data ?? []).map(serializeProfile) };
}

function profileChanges(input: ProfileUpdateInput): { [key: string]: Json } {
  const changes: { [key: string]: Json } = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      changes[key] = value;
    }
  }
  return changes;
}

type ProfileAccount = { id: number; auth_user_id: string; email: string };

/** Loads the account behind a profile and checks the caller owns it; runs before any payload is read. */
export async function loadOwnedProfile(params: {
  supabase: DbClient;
  caller: Caller;
  userId: number;
}): Promise<{ ok: true; user: ProfileAccount } | ApiFailure> {
  const { supabase, caller, userId } = params;

  const { data: user, error } = await supabase
    .from("users")
    .select("id, auth_user_id, email")
    .eq("id", userId)
    .maybeSingle();

  if (error) {
    return mapStoreError(error);
  }
  if (!user) {
    return failure("not_found", "Profile not found.");
  }

  const permitted = authorize(
    isOwnerOrReadOnly,
    { caller, method: "PATCH", resource: profileOwnership({ user: user.id }) },
    "You can only edit your own profile.",
  );
  if (!permitted.ok) {
    return permitted;
  }
  return { ok: true, user };
}

// Login resolves the auth account through users.email, so both must agree.
async function restoreAuthEmail(supabase: DbClient, user: ProfileAccount, callerId: number) {
  const { error } = await supabase.auth.admin.updateUserById(user.auth_user_id, { email: user.email });
  if (error) {
    logServerError(
      { entityType: "profiles", entityId: user.id, userId: callerId, message: "auth email restore failed" },
      error.message,
    );
  }
}

/**
 * Updates the user's names and email together with the profile of its type. An email
 * change is applied to the auth account first and reverted if the profile write fails.
 */
export async function updateProfile(params: {
  supabase: DbClient;
  caller: Caller;
  user: ProfileAccount;
  input: ProfileUpdateInput;
}): Promise<ProfileResult> {
  const { supabase, caller, user, input } = params;
  const userId = user.id;

  const emailChanged = input.email !== undefined && input.email !== user.email;
  if (emailChanged) {
    const { error: authError } = await supabase.auth.admin.updateUserById(user.auth_user_id, {
      email: input.email,
    });
    if (authError) {
      console.warn("[profiles-email-rejected]", { userId, message: authError.message });
      return failure("validation_error", "This email address cannot be used.", "email");
    }
  }

  const { error } = await supabase.rpc("update_profile", {
    p_user_id: userId,
    p_changes: profileChanges(input),
  });

  if (error) {
    logServerError({ entityType: "profiles", entityId: userId, userId: caller.id }, error.message);
    if (emailChanged) {
      await restoreAuthEmail(supabase, user, caller.id);
    }
    return mapStoreError(error);
  }

  return getProfile({ supabase, userId });
}
