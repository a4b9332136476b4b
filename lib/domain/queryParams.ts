import { failure, type ApiFailure } from "@/lib/api/errors";

/** A parser yields the typed value, or null when the raw value is not acceptable. */
export type ParamParser<T> = {
  expected: string;
  parse: (value: string) => T | null;
};

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^\+?(\d+(\.\d*)?|\.\d+)$/;

export function cleanParamValue(raw: string): string {
  const trimmed = raw.trim();
  const unquoted = trimmed.replace(/^(['"])(.*)\1$/s, "$2");
  return unquoted.trim();
}

export const integer: ParamParser<number> = {
  expected: "an integer",
  parse(value) {
    if (!INTEGER_PATTERN.test(value)) return null;
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : null;
  },
};

export const nonNegativeNumber: ParamParser<number> = {
  expected: "a non-negative number",
  parse(value) {
    if (!DECIMAL_PATTERN.test(value)) return null;
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  },
};

export function positiveInteger(options: { max?: number } = {}): ParamParser<number> {
  const { max } = options;
  return {
    expected:
      max === undefined ? "a positive integer" : `a positive integer no greater than ${max}`,
    parse(value) {
      const parsed = integer.parse(value);
      if (parsed === null || parsed < 1) return null;
      if (max !== undefined && parsed > max) return null;
      return parsed;
    },
  };
}

export function enumOf<const T extends readonly string[]>(values: T): ParamParser<T[number]> {
  return {
    expected: `one of ${values.join(", ")}`,
    parse(value) {
      return values.find((candidate) => candidate === value) ?? null;
    },
  };
}

export const text: ParamParser<string> = {
  expected: "text",
  parse: (value) => value,
};

/**
 * Reads declared parameters one at a time. After the first rejected value every
 * later read returns undefined and `failure` holds the rejection.
 */
export class QueryReader {
  failure: ApiFailure | null = null;

  constructor(private readonly searchParams: URLSearchParams) {}

  has(name: string): boolean {
    const raw = this.searchParams.get(name);
    return raw !== null && cleanParamValue(raw).length > 0;
  }

  read<T>(name: string, parser: ParamParser<T>): T | undefined {
    if (this.failure) return undefined;

    const raw = this.searchParams.get(name);
    if (raw === null) return undefined;

    const value = cleanParamValue(raw);
    if (!value.length) return undefined;

    const parsed = parser.parse(value);
    if (parsed === null) {
      this.failure = failure(
        "invalid_parameter",
        `Query parameter "${name}" must be ${parser.expected}.`,
        name,
      );
      return undefined;
    }
    return parsed;
  }
}

/**
 * Parses the recognized parameters of a query string. Empty values count as absent
 * and unrecognized parameters are ignored; the first invalid value fails the whole set.
 */
export function parseQueryParams<T>(
  searchParams: URLSearchParams,
  declare: (reader: QueryReader) => T,
): { ok: true; params: T } | ApiFailure {
  const reader = new QueryReader(searchParams);
  const params = declare(reader);

  if (reader.failure) {
    console.warn("[query-invalid-parameter]", { parameter: reader.failure.field });
    return reader.failure;
  }

  return { ok: true, params };
}
