import { describe, expect, it } from "vitest";
import { buildServer } from "../src/api/server.js";
import { loadConfig } from "../src/config.js";
import { createPlatformContext } from "../src/core/services/platform-context.js";
import { InMemoryMembershipStore, type TenantMembershipStore } from "../src/core/store/membership-store.js";
import { silentLogger } from "../src/lib/logger.js";
import {
  AUDIENCE,
  FakeJwksEndpoint,
  ISSUER,
  JWKS_URL,
  NOW_SECONDS,
  createRsaSigner,
  fixedClock,
  signToken,
  tokenClaims
} from "./helpers/tokens.js";

const signer = createRsaSigner("kid-api");

const UNAUTHORIZED_BODY = { code: "unauthorized", message: "Authentication failed." };

function createTestServer(options: { store?: TenantMembershipStore; endpoint?: FakeJwksEndpoint } = {}) {
  const endpoint = options.endpoint ?? new FakeJwksEndpoint(signer);
  const config = loadConfig({
    AUTHBRIDGE_JWKS_URL: JWKS_URL,
    AUTHBRIDGE_EXPECTED_ISSUER: ISSUER,
    AUTHBRIDGE_EXPECTED_AUDIENCE: AUDIENCE,
    AUTHBRIDGE_JWKS_RETRY_BACKOFF_MS: "0",
    LOG_LEVEL: "silent"
  });
  const context = createPlatformContext({
    config,
    logger: silentLogger(),
    clock: fixedClock,
    fetchFn: endpoint.fetchFn,
    membershipStore:
      options.store ??
      new InMemoryMembershipStore([
        { userSubject: "user-123", tenantId: "tenant-alpha", role: "owner" },
        { userSubject: "admin-1", tenantId: "tenant-beta", role: "member" }
      ])
  });
  return { app: buildServer(context), endpoint };
}

function bearer(claims: Record<string, unknown>) {
  return { authorization: `Bearer ${signToken(signer, tokenClaims(claims))}` };
}

const adminHeaders = () => bearer({ sub: "admin-1", realm_access: { roles: ["platform_admin"] } });

describe("auth bridge API", () => {
  it("serves health checks without credentials", async () => {
    const { app, endpoint } = createTestServer();
    try {
      const response = await app.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: "ok", service: "authbridge" });
      expect(response.headers["x-request-id"]).toMatch(/^req_[0-9a-f]{32}$/);
      expect(response.headers["x-content-type-options"]).toBe("nosniff");
      expect(endpoint.calls).toBe(0);
    } finally {
      await app.close();
    }
  });

  it("ignores the query string when matching unauthenticated paths", async () => {
    const { app, endpoint } = createTestServer();
    try {
      const response = await app.inject({
        method: "GET",
        url: "/health?check=1",
        headers: { authorization: "Bearer expired.or.garbage" }
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: "ok" });
      expect(endpoint.calls).toBe(0);
    } finally {
      await app.close();
    }
  });

  it("returns the caller's authorization context", async () => {
    const { app } = createTestServer();
    try {
      const response = await app.inject({
        method: "GET",
        url: "/v1/me",
        headers: bearer({ given_name: "Jane", family_name: "Doe" })
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        subject: "user-123",
        username: "jdoe",
        email: "jdoe@example.test",
        fullName: "Jane Doe",
        platformRoles: ["offline_access"],
        clientRoles: [],
        isPlatformAdmin: false,
        tenantMemberships: [{ tenantId: "tenant-alpha", role: "owner" }]
      });
    } finally {
      await app.close();
    }
  });

  it("requires credentials on protected routes", async () => {
    const { app } = createTestServer();
    try {
      const response = await app.inject({
        method: "GET",
        url: "/v1/me",
        headers: { "x-request-id": "req-anonymous" }
      });

      expect(response.statusCode).toBe(401);
      expect(response.headers["www-authenticate"]).toBe('Bearer error="invalid_token"');
      expect(response.headers["x-request-id"]).toBe("req-anonymous");
      expect(response.json()).toEqual({ error: { ...UNAUTHORIZED_BODY, requestId: "req-anonymous" } });
    } finally {
      await app.close();
    }
  });

  it("gives every token failure the same response", async () => {
    const { app } = createTestServer();
    const stranger = createRsaSigner("kid-stranger");
    const failures = [
      bearer({ exp: NOW_SECONDS - 5 }),
      bearer({ aud: "other-client" }),
      bearer({ iss: "https://attacker.example.test" }),
      { authorization: `Bearer ${signToken(stranger, tokenClaims())}` },
      { authorization: "Bearer not.a.token" }
    ];
    try {
      for (const headers of failures) {
        const response = await app.inject({
          method: "GET",
          url: "/v1/me",
          headers: { ...headers, "x-request-id": "req-uniform" }
        });

        expect(response.statusCode).toBe(401);
        expect(response.headers["www-authenticate"]).toBe('Bearer error="invalid_token"');
        expect(response.json()).toEqual({ error: { ...UNAUTHORIZED_BODY, requestId: "req-uniform" } });
      }
    } finally {
      await app.close();
    }
  });

  it("rejects requests when the key endpoint is unreachable", async () => {
    const endpoint = new FakeJwksEndpoint(signer);
    endpoint.failNext = 2;
    const { app } = createTestServer({ endpoint });
    try {
      const response = await app.inject({ method: "GET", url: "/v1/me", headers: bearer({}) });

      expect(response.statusCode).toBe(401);
      expect(response.json().error.code).toBe("unauthorized");
    } finally {
      await app.close();
    }
  });

  it("reports one tenant membership and 404s for tenants the caller does not belong to", async () => {
    const { app } = createTestServer();
    try {
      const member = await app.inject({ method: "GET", url: "/v1/me/tenants/tenant-alpha", headers: bearer({}) });
      expect(member.statusCode).toBe(200);
      expect(member.json()).toEqual({
        subject: "user-123",
        tenantId: "tenant-alpha",
        role: "owner",
        isPlatformAdmin: false
      });

      const outsider = await app.inject({ method: "GET", url: "/v1/me/tenants/tenant-beta", headers: bearer({}) });
      expect(outsider.statusCode).toBe(404);
      expect(outsider.json().error.code).toBe("not_found");
    } finally {
      await app.close();
    }
  });

  it("does not give platform admins tenant roles they were not granted", async () => {
    const { app } = createTestServer();
    try {
      const response = await app.inject({
        method: "GET",
        url: "/v1/me/tenants/tenant-alpha",
        headers: adminHeaders()
      });

      expect(response.statusCode).toBe(404);

      const own = await app.inject({ method: "GET", url: "/v1/me/tenants/tenant-beta", headers: adminHeaders() });
      expect(own.json()).toEqual({
        subject: "admin-1",
        tenantId: "tenant-beta",
        role: "member",
        isPlatformAdmin: true
      });
    } finally {
      await app.close();
    }
  });

  it("restricts key cache administration to platform admins", async () => {
    const { app, endpoint } = createTestServer();
    try {
      const forbidden = await app.inject({ method: "GET", url: "/v1/admin/jwks", headers: bearer({}) });
      expect(forbidden.statusCode).toBe(403);
      expect(forbidden.json().error.code).toBe("forbidden");

      const anonymous = await app.inject({ method: "GET", url: "/v1/admin/jwks" });
      expect(anonymous.statusCode).toBe(401);

      const status = await app.inject({ method: "GET", url: "/v1/admin/jwks", headers: adminHeaders() });
      expect(status.statusCode).toBe(200);
      expect(status.json()).toMatchObject({ jwksUrl: JWKS_URL, keyIds: ["kid-api"], fetchCount: 1, lastError: null });

      const refreshed = await app.inject({ method: "POST", url: "/v1/admin/jwks/refresh", headers: adminHeaders() });
      expect(refreshed.statusCode).toBe(200);
      expect(refreshed.json()).toMatchObject({ keyIds: ["kid-api"], fetchCount: 2 });
      expect(endpoint.calls).toBe(2);
    } finally {
      await app.close();
    }
  });

  it("reports a failed forced refresh as a bad gateway", async () => {
    const endpoint = new FakeJwksEndpoint(signer);
    const { app } = createTestServer({ endpoint });
    try {
      const headers = adminHeaders();
      await app.inject({ method: "GET", url: "/v1/admin/jwks", headers });
      endpoint.failNext = 2;

      const response = await app.inject({ method: "POST", url: "/v1/admin/jwks/refresh", headers });

      expect(response.statusCode).toBe(502);
      expect(response.json().error.code).toBe("jwks_unreachable");
    } finally {
      await app.close();
    }
  });

  it("answers 500 without detail when the membership store fails", async () => {
    const store: TenantMembershipStore = {
      listMembershipsForSubject: async () => {
        throw new Error("password authentication failed for user bridge");
      }
    };
    const { app } = createTestServer({ store });
    try {
      const response = await app.inject({
        method: "GET",
        url: "/v1/me",
        headers: { ...bearer({}), "x-request-id": "req-store" }
      });

      expect(response.statusCode).toBe(500);
      expect(response.json()).toEqual({
        error: { code: "internal_error", message: "Unexpected error.", requestId: "req-store" }
      });
    } finally {
      await app.close();
    }
  });
});
