import { describe, expect, it } from "vitest";

import { buildPage, fetchPage, pageRange, toWirePage } from "@/lib/domain/pagination";

describe("pageRange", () => {
  it("maps a page number to an inclusive row range", () => {
    expect(pageRange({ page: 1, pageSize: 6 })).toEqual({ from: 0, to: 5 });
    expect(pageRange({ page: 3, pageSize: 6 })).toEqual({ from: 12, to: 17 });
  });
});

describe("buildPage", () => {
  it("knows whether neighbouring pages exist", () => {
    expect(buildPage(["a", "b"], 13, { page: 1, pageSize: 2 })).toMatchObject({
      hasNext: true,
      hasPrevious: false,
    });
    expect(buildPage(["m"], 13, { page: 3, pageSize: 6 })).toMatchObject({
      hasNext: false,
      hasPrevious: true,
    });
  });
});

describe("fetchPage", () => {
  it("turns an unsatisfiable range into an empty page with the true count", async () => {
    const result = await fetchPage<string>({
      request: { page: 4, pageSize: 6 },
      fetchRange: async () => ({
        data: null,
        error: { code: "PGRST103", message: "Requested range not satisfiable" },
        count: null,
      }),
      fetchCount: async () => ({ error: null, count: 13 }),
    });

    expect(result).toEqual({
      ok: true,
      page: { page: 4, count: 13, results: [], hasNext: false, hasPrevious: true },
    });
  });

  it("passes any other store error through", async () => {
    const error = { code: "42P01", message: "relation does not exist" };
    const result = await fetchPage<string>({
      request: { page: 1, pageSize: 6 },
      fetchRange: async () => ({ data: null, error, count: null }),
      fetchCount: async () => ({ error: null, count: 0 }),
    });

    expect(result).toEqual({ ok: false, error });
  });
});

describe("toWirePage", () => {
  it("links neighbouring pages by rewriting the page parameter", () => {
    const wire = toWirePage(
      { page: 2, count: 13, results: [7], hasNext: true, hasPrevious: true },
      "http://localhost:3000/api/offers/?page=2&page_size=6",
    );

    expect(wire).toEqual({
      count: 13,
      next: "http://localhost:3000/api/offers/?page=3&page_size=6",
      previous: "http://localhost:3000/api/offers/?page=1&page_size=6",
      results: [7],
    });
  });

  it("adds the page parameter when the request had none", () => {
    const wire = toWirePage(
      { page: 1, count: 13, results: [], hasNext: true, hasPrevious: false },
      "http://localhost:3000/api/offers/?page_size=6",
    );

    expect(wire.next).toBe("http://localhost:3000/api/offers/?page_size=6&page=2");
    expect(wire.previous).toBeNull();
  });
});
