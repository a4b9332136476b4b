import { z } from "zod";

const rating = z
  .number({ invalid_type_error: "Rating must be an integer, not a string." })
  .int("Rating must be a whole number.")
  .min(1, "Rating must be between 1 and 5.")
  .max(5, "Rating must be between 1 and 5.");

export const reviewCreateSchema = z.object({
  business_user: z
    .number({
      required_error: "business_user is required.",
      invalid_type_error: "Business user ID must be an integer, not a string.",
    })
    .int()
    .safe("Business user ID is out of range."),
  rating,
  description: z.string(),
});

export const reviewUpdateSchema = z
  .object({
    rating: rating.optional(),
    description: z.string().optional(),
  })
  .strict();

export type ReviewCreateInput = z.output<typeof reviewCreateSchema>;
export type ReviewUpdateInput = z.output<typeof reviewUpdateSchema>;
