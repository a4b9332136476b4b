import type { z } from "zod";

import { failure, type ApiFailure } from "@/lib/api/errors";

function issueField(issue: z.ZodIssue): string | undefined {
  if (issue.code === "unrecognized_keys") {
    return issue.keys[0];
  }
  const [head] = issue.path;
  return head === undefined ? undefined : String(head);
}

function issueMessage(issue: z.ZodIssue): string {
  if (issue.code === "unrecognized_keys") {
    return `Field "${issue.keys[0]}" cannot be changed here.`;
  }
  const field = issueField(issue);
  const path = issue.path.join(".");
  return field ? `${path}: ${issue.message}` : issue.message;
}

/** Validates a write payload and reports the first issue with the field it belongs to. */
export function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
): { ok: true; data: z.output<S> } | ApiFailure {
  const parsed = schema.safeParse(body);
  if (parsed.success) {
    return { ok: true, data: parsed.data };
  }

  const [issue] = parsed.error.issues;
  if (!issue) {
    return failure("validation_error", "Invalid payload.");
  }
  return failure("validation_error", issueMessage(issue), issueField(issue));
}
