import { NextResponse } from "next/server";

export const API_ERROR_CODES = [
  "unauthorized",
  "forbidden",
  "not_found",
  "invalid_parameter",
  "validation_error",
  "conflict",
  "internal",
] as const;

export type ApiErrorCode = (typeof API_ERROR_CODES)[number];

export type ApiFailure = {
  ok: false;
  code: ApiErrorCode;
  message: string;
  field?: string;
};

export const API_ERROR_STATUS: Record<ApiErrorCode, number> = {
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  invalid_parameter: 400,
  validation_error: 400,
  conflict: 409,
  internal: 500,
};

export function failure(code: ApiErrorCode, message: string, field?: string): ApiFailure {
  return field ? { ok: false, code, message, field } : { ok: false, code, message };
}

export function errorResponse(result: ApiFailure) {
  const body = {
    error: {
      code: result.code,
      message: result.message,
      ...(result.field ? { field: result.field } : {}),
    },
  };
  return NextResponse.json(body, { status: API_ERROR_STATUS[result.code] });
}

/** Shape shared by PostgrestError and the errors returned from rpc calls. */
export type StoreError = {
  code?: string | null;
  message: string;
};

type StoreErrorMessages = {
  conflict?: string;
  notFound?: string;
  invalid?: string;
  field?: string;
};

const UNIQUE_VIOLATION = "23505";
const NO_DATA_FOUND = "P0002";
const VALIDATION_CODES = new Set(["23514", "22P02", "P0001"]);

/**
 * Translates Postgres/PostgREST error codes into the API taxonomy. Unknown codes
 * become `internal` so a store failure is never reported as success.
 */
export function mapStoreError(error: StoreError, messages: StoreErrorMessages = {}): ApiFailure {
  const code = error.code ?? "";
  if (code === UNIQUE_VIOLATION) {
    return failure("conflict", messages.conflict ?? "Resource already exists.", messages.field);
  }
  if (code === NO_DATA_FOUND) {
    return failure("not_found", messages.notFound ?? "Resource not found.", messages.field);
  }
  if (VALIDATION_CODES.has(code)) {
    return failure("validation_error", messages.invalid ?? error.message, messages.field);
  }
  return failure("internal", "The data store could not complete the request.");
}
