import type { UserType, Views } from "@/lib/supabase/types";

export type ProfileView = {
  user: number;
  username: string;
  first_name: string;
  last_name: string;
  file: string;
  location: string;
  tel: string;
  description: string;
  working_hours: string;
  type: UserType;
  email: string;
  created_at: string | null;
};

// Stored paths are bucket-relative; clients only need the file name.
export function fileName(path: string | null): string {
  if (!path) return "";
  const segments = path.split("/");
  return segments[segments.length - 1] ?? "";
}

export function serializeProfile(row: Views<"profile_details">): ProfileView {
  return {
    user: row.user,
    username: row.username ?? "",
    first_name: row.first_name ?? "",
    last_name: row.last_name ?? "",
    file: fileName(row.file),
    location: row.location ?? "",
    tel: row.tel ?? "",
    description: row.description ?? "",
    working_hours: row.type === "business" ? row.working_hours ?? "" : "",
    type: row.type,
    email: row.email ?? "",
    created_at: row.created_at,
  };
}
