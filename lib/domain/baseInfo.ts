import { mapStoreError, type ApiFailure } from "@/lib/api/errors";
import type { DbClient } from "@/utils/supabase/admin";

export type BaseInfo = {
  review_count: number;
  average_rating: number;
  business_profile_count: number;
  offer_count: number;
};

export function roundRating(value: number | null): number {
  if (value === null || !Number.isFinite(value)) return 0;
  return Math.round(value * 10) / 10;
}

/** Homepage figures, every one computed by the data store at request time. */
export async function getBaseInfo(params: {
  supabase: DbClient;
}): Promise<{ ok: true; info: BaseInfo } | ApiFailure> {
  const { supabase } = params;

  const [stats, businessProfiles, offers] = await Promise.all([
    supabase.from("review_stats").select("review_count, average_rating").maybeSingle(),
    supabase.from("business_profiles").select("id", { count: "exact", head: true }),
    supabase.from("offers").select("id", { count: "exact", head: true }),
  ]);

  const error = stats.error ?? businessProfiles.error ?? offers.error;
  if (error) {
    console.error("[base-info-failed]", { message: error.message });
    return mapStoreError(error);
  }

  const averageRating = stats.data?.average_rating ?? null;

  return {
    ok: true,
    info: {
      review_count: Number(stats.data?.review_count ?? 0),
      average_rating: roundRating(averageRating === null ? null : Number(averageRating)),
      business_profile_count: businessProfiles.count ?? 0,
      offer_count: offers.count ?? 0,
    },
  };
}
