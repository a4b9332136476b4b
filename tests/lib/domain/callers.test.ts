import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { extractBearerToken, requireCaller, resolveCaller } from "@/lib/domain/callers";
import { buildRequest } from "@/tests/helpers/apiRequests";
import { seedUser, setupMarketplaceMock } from "@/tests/setup/marketplaceStore";
import type { SupabaseMockState } from "@/tests/setup/supabaseClientMock";

describe("extractBearerToken", () => {
  it("reads the token from a bearer header", () => {
    expect(extractBearerToken("Bearer abc")).toBe("abc");
    expect(extractBearerToken("  bearer   abc ")).toBe("abc");
  });

  it("rejects other schemes and malformed headers", () => {
    expect(extractBearerToken("Token abc")).toBeNull();
    expect(extractBearerToken("Bearer")).toBeNull();
    expect(extractBearerToken("Bearer a b")).toBeNull();
    expect(extractBearerToken(null)).toBeNull();
  });
});

describe("resolveCaller", () => {
  let mock: SupabaseMockState;
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    mock = setupMarketplaceMock();
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("resolves a token to the marketplace user", async () => {
    const user = seedUser(mock.store, { username: "studio", type: "business" });

    const result = await resolveCaller({
      supabase: mock.client,
      request: buildRequest("/api/profile/", { token: user.token }),
    });

    expect(result).toEqual({
      ok: true,
      caller: {
        id: user.id,
        username: "studio",
        email: "studio@example.test",
        userType: "business",
        isStaff: false,
      },
    });
    expect(mock.supabase.auth.getUser).toHaveBeenCalledWith(user.token);
  });

  it("distinguishes missing, invalid and orphaned tokens", async () => {
    const orphan = mock.store.createAuthUser("orphan@example.test", "test-password");
    const orphanToken = mock.store.issueToken(orphan.id);

    const missing = await resolveCaller({ supabase: mock.client, request: buildRequest("/api/profile/") });
    const invalid = await resolveCaller({
      supabase: mock.client,
      request: buildRequest("/api/profile/", { token: "not-a-session" }),
    });
    const unknown = await resolveCaller({
      supabase: mock.client,
      request: buildRequest("/api/profile/", { token: orphanToken }),
    });

    expect(missing).toEqual({ ok: false, code: "missing_token" });
    expect(invalid).toMatchObject({ ok: false, code: "invalid_token" });
    expect(unknown).toEqual({ ok: false, code: "unknown_user" });
  });

  it("answers unauthorized for a rejected token", async () => {
    const result = await requireCaller({
      supabase: mock.client,
      request: buildRequest("/api/profile/", { token: "not-a-session" }),
    });

    expect(result).toEqual({
      ok: false,
      code: "unauthorized",
      message: "Authentication credentials were not provided or are invalid.",
    });
    expect(warnSpy).toHaveBeenCalledWith("[caller-rejected]", { reason: "invalid_token" });
  });
});
