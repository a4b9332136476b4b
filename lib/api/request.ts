import { NextResponse, type NextRequest } from "next/server";

import { failure, type ApiFailure } from "@/lib/api/errors";
import { parseEnvConfig } from "@/schemas/env";

export type JsonObject = Record<string, unknown>;

export type RouteContext<K extends string> = {
  params: Promise<Record<K, string>>;
};

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readJsonBody(
  request: NextRequest,
): Promise<{ ok: true; body: JsonObject } | ApiFailure> {
  let parsed: unknown;
  try {
    parsed = await request.json();
  } catch {
    return failure("validation_error", "Request body must be valid JSON.");
  }

  if (!isJsonObject(parsed)) {
    return failure("validation_error", "Request body must be a JSON object.");
  }

  return { ok: true, body: parsed };
}

// Path ids are positive integers; anything else cannot name a row.
export function parseRouteId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) {
    return null;
  }
  const value = Number(raw);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

export function noContent() {
  return new NextResponse(null, { status: 204 });
}

/** Base for absolute links in responses; APP_URL wins over the request's own origin. */
export function requestOrigin(request: NextRequest): string {
  const { appUrl } = parseEnvConfig();
  return (appUrl ?? request.nextUrl.origin).replace(/\/+$/, "");
}
