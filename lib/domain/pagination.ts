import type { StoreError } from "@/lib/api/errors";

// PostgREST answers a range that starts past the last row with this code.
export const RANGE_NOT_SATISFIABLE = "PGRST103";

export type PageRequest = {
  page: number;
  pageSize: number;
};

export type Page<T> = {
  page: number;
  count: number;
  results: T[];
  hasNext: boolean;
  hasPrevious: boolean;
};

export type WirePage<T> = {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
};

type RangeResponse<Row> = {
  data: Row[] | null;
  error: StoreError | null;
  count: number | null;
};

type CountResponse = {
  error: StoreError | null;
  count: number | null;
};

export function pageRange({ page, pageSize }: PageRequest) {
  const from = (page - 1) * pageSize;
  return { from, to: from + pageSize - 1 };
}

export function buildPage<T>(results: T[], count: number, request: PageRequest): Page<T> {
  const { from } = pageRange(request);
  return {
    page: request.page,
    count,
    results,
    hasNext: from + results.length < count,
    hasPrevious: request.page > 1,
  };
}

/**
 * Runs one ranged, exact-count query. A page past the end comes back as an empty page
 * carrying the true count, which costs a second head-count query.
 */
export async function fetchPage<Row>(params: {
  request: PageRequest;
  fetchRange: (from: number, to: number) => PromiseLike<RangeResponse<Row>>;
  fetchCount: () => PromiseLike<CountResponse>;
}): Promise<{ ok: true; page: Page<Row> } | { ok: false; error: StoreError }> {
  const { request, fetchRange, fetchCount } = params;
  const { from, to } = pageRange(request);

  const { data, error, count } = await fetchRange(from, to);
  if (!error) {
    return { ok: true, page: buildPage(data ?? [], count ?? 0, request) };
  }

  if (error.code !== RANGE_NOT_SATISFIABLE) {
    return { ok: false, error };
  }

  const { count: total, error: countError } = await fetchCount();
  if (countError) {
    return { ok: false, error: countError };
  }
  return { ok: true, page: buildPage<Row>([], total ?? 0, request) };
}

function pageUrl(requestUrl: string, page: number): string {
  const url = new URL(requestUrl);
  url.searchParams.set("page", String(page));
  return url.toString();
}

export function toWirePage<T>(page: Page<T>, requestUrl: string): WirePage<T> {
  return {
    count: page.count,
    next: page.hasNext ? pageUrl(requestUrl, page.page + 1) : null,
    previous: page.hasPrevious ? pageUrl(requestUrl, page.page - 1) : null,
    results: page.results,
  };
}
