export function requireEnv(name: string, value: string | undefined | null) {
  if (!value || value.trim().length === 0) {
    throw new Error(`[env] ${name} is required for the Supabase admin client.`);
  }

  return value.trim();
}

export function getSupabaseUrl() {
  return requireEnv("SUPABASE_URL", process.env.SUPABASE_URL);
}

export function getServiceRoleKey() {
  return requireEnv(
    "SUPABASE_SERVICE_ROLE_KEY",
    process.env.SUPABASE_SERVICE_ROLE_KEY,
  );
}
