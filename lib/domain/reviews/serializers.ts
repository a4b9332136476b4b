import type { Tables } from "@/lib/supabase/types";

export type ReviewView = {
  id: number;
  business_user: number;
  reviewer: number;
  rating: number;
  description: string;
  created_at: string;
  updated_at: string;
};

export function serializeReview(review: Tables<"reviews">): ReviewView {
  return {
    id: review.id,
    business_user: review.business_user_id,
    reviewer: review.reviewer_id,
    rating: review.rating,
    description: review.description,
    created_at: review.created_at,
    updated_at: review.updated_at,
  };
}
