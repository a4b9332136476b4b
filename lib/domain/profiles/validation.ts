import { z } from "zod";

const USER_TYPES = ["customer", "business"] as const;

// null clears a text field; it is stored as an empty string.
const clearableText = z
  .string()
  .trim()
  .nullable()
  .optional()
  .transform((value) => (value === null ? "" : value));

export const profileUpdateSchema = z.object({
  first_name: clearableText,
  last_name: clearableText,
  location: clearableText,
  tel: clearableText,
  description: clearableText,
  working_hours: clearableText,
  email: z.string().trim().email("Enter a valid email address.").optional(),
  file: z.string().trim().nullable().optional(),
});

export const registrationSchema = z
  .object({
    username: z
      .string({ required_error: "username is required." })
      .trim()
      .min(1, "Username cannot be empty.")
      .max(150, "Username may have at most 150 characters.")
      .regex(/^[\w.@+-]+$/, "Username may only contain letters, digits and @/./+/-/_."),
    email: z.string({ required_error: "email is required." }).trim().email("Enter a valid email address."),
    password: z
      .string({ required_error: "password is required." })
      .min(8, "This password is too short. It must contain at least 8 characters."),
    repeated_password: z.string({ required_error: "repeated_password is required." }),
    type: z.enum(USER_TYPES),
    first_name: z.string().trim().default(""),
    last_name: z.string().trim().default(""),
  })
  .superRefine((value, ctx) => {
    if (value.password !== value.repeated_password) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["password"],
        message: "Passwords do not match.",
      });
    }
  });

export const loginSchema = z.object({
  username: z.string({ required_error: "username is required." }).trim().min(1),
  password: z.string({ required_error: "password is required." }).min(1),
});

export type ProfileUpdateInput = z.output<typeof profileUpdateSchema>;
export type RegistrationInput = z.output<typeof registrationSchema>;
export type LoginInput = z.output<typeof loginSchema>;
