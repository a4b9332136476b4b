import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { GET as getBaseInfo } from "@/app/api/base-info/route";
import { GET as checkSupabase } from "@/app/api/health/supabase/route";
import {
  seedOffer,
  seedReview,
  seedUser,
  setupMarketplaceMock,
} from "@/tests/setup/marketplaceStore";
import { MockQueryBuilder, type SupabaseMockState } from "@/tests/setup/supabaseClientMock";

const createAdminClientMock = vi.fn();

vi.mock("@/utils/supabase/admin", () => ({
  createAdminClient: () => createAdminClientMock(),
}));

let mock: SupabaseMockState;

beforeEach(() => {
  mock = setupMarketplaceMock();
  createAdminClientMock.mockReturnValue(mock.client);
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("GET /api/base-info", () => {
  it("reports zeros for an empty marketplace", async () => {
    const response = await getBaseInfo();

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      review_count: 0,
      average_rating: 0,
      business_profile_count: 0,
      offer_count: 0,
    });
  });

  it("counts reviews, business profiles and offers and rounds the average rating", async () => {
    const studio = seedUser(mock.store, { username: "studio", type: "business" });
    const rival = seedUser(mock.store, { username: "rival", type: "business" });
    const ada = seedUser(mock.store, { username: "ada", type: "customer" });
    const grace = seedUser(mock.store, { username: "grace", type: "customer" });
    seedOffer(mock.store, { creatorId: studio.id, title: "Logo design" });
    seedReview(mock.store, { reviewerId: ada.id, businessUserId: studio.id, rating: 5 });
    seedReview(mock.store, { reviewerId: ada.id, businessUserId: rival.id, rating: 4 });
    seedReview(mock.store, { reviewerId: grace.id, businessUserId: studio.id, rating: 4 });

    const response = await getBaseInfo();

    expect(await response.json()).toEqual({
      review_count: 3,
      average_rating: 4.3,
      business_profile_count: 2,
      offer_count: 1,
    });
  });

  it("needs no authentication", async () => {
    const response = await getBaseInfo();

    expect(mock.supabase.auth.getUser).not.toHaveBeenCalled();
    expect(response.status).toBe(200);
  });
});

describe("GET /api/health/supabase", () => {
  it("reports the user count when the store answers", async () => {
    seedUser(mock.store, { username: "ada", type: "customer" });

    const response = await checkSupabase();

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, users: 1 });
  });

  it("answers 503 when the query fails", async () => {
    mock.supabase.from.mockImplementationOnce(() => new MockQueryBuilder(mock.store, "missing_table"));

    const response = await checkSupabase();

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      ok: false,
      error: 'relation "missing_table" does not exist',
    });
  });

  it("answers 500 when the client cannot be created", async () => {
    createAdminClientMock.mockImplementationOnce(() => {
      throw new Error("[env] SUPABASE_URL must be defined and non-empty.");
    });

    const response = await checkSupabase();

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      ok: false,
      error: "[env] SUPABASE_URL must be defined and non-empty.",
    });
  });
});
