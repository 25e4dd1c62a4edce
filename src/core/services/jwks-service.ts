import { createPublicKey, type JsonWebKey } from "node:crypto";
import { z } from "zod";
import { AuthError } from "../errors.js";
import { isSigningAlgorithm, type SigningAlgorithm, type SigningKey } from "../types/auth.js";
import { silentLogger, type Logger } from "../../lib/logger.js";
import { sleep, systemClock, type Clock } from "../../lib/time.js";

interface JwkLike {
  kid?: unknown;
  kty?: unknown;
  use?: unknown;
  alg?: unknown;
  crv?: unknown;
  [key: string]: unknown;
}

interface FetchResponseLike {
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}

export type FetchLike = (
  input: string,
  init?: { signal?: AbortSignal; headers?: Record<string, string> }
) => Promise<FetchResponseLike>;

interface KeySetSnapshot {
  keysById: ReadonlyMap<string, SigningKey>;
  fetchedAt: number;
}

export interface JwksStatus {
  jwksUrl: string;
  keyIds: string[];
  fetchedAt: string | null;
  lastError: string | null;
  lastFailedAt: string | null;
  fetchCount: number;
  refreshing: boolean;
}

export interface JwksServiceOptions {
  jwksUrl: string;
  fetchFn?: FetchLike | undefined;
  clock?: Clock | undefined;
  logger?: Logger | undefined;
  fetchTimeoutMs?: number | undefined;
  retryBackoffMs?: number | undefined;
  maxAgeSeconds?: number | undefined;
  missCooldownMs?: number | undefined;
  /** After a failed refresh, cached keys are served without refetching for this long. */
  failureBackoffMs?: number | undefined;
}

const jwksDocumentSchema = z.object({
  keys: z.array(z.record(z.unknown()))
});

const JWK_MATERIAL_FIELDS = ["kty", "n", "e", "crv", "x", "y"] as const;

const defaultFetch: FetchLike = (input, init) => fetch(input, init);

function inferAlgorithm(jwk: JwkLike): SigningAlgorithm | null {
  if (jwk.alg !== undefined) {
    return isSigningAlgorithm(jwk.alg) ? jwk.alg : null;
  }
  if (jwk.kty === "RSA") {
    return "RS256";
  }
  if (jwk.kty === "EC") {
    switch (jwk.crv) {
      case "P-256":
        return "ES256";
      case "P-384":
        return "ES384";
      case "P-521":
        return "ES512";
      default:
        return null;
    }
  }
  return null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * In-memory cache of the identity provider's published signing keys.
 *
 * The key set is replaced wholesale on every refresh. Refreshes are single
 * flight: callers that miss while a fetch is running wait on that fetch
 * instead of starting their own. The fetch is never tied to a caller, so a
 * caller that gives up still leaves a populated cache behind.
 */
export class JwksService {
  private readonly jwksUrl: string;
  private readonly fetchFn: FetchLike;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly fetchTimeoutMs: number;
  private readonly retryBackoffMs: number;
  private readonly maxAgeMs: number;
  private readonly missCooldownMs: number;
  private readonly failureBackoffMs: number;

  private snapshot: KeySetSnapshot | null = null;
  private inFlight: Promise<KeySetSnapshot> | null = null;
  private lastError: string | null = null;
  private lastFailedRefreshAt: number | null = null;
  private fetchCount = 0;

  constructor(options: JwksServiceOptions) {
    this.jwksUrl = options.jwksUrl;
    this.fetchFn = options.fetchFn ?? defaultFetch;
    this.clock = options.clock ?? systemClock;
    this.logger = (options.logger ?? silentLogger()).child({ component: "jwks" });
    this.fetchTimeoutMs = Math.max(1, options.fetchTimeoutMs ?? 5000);
    this.retryBackoffMs = Math.max(0, options.retryBackoffMs ?? 250);
    this.maxAgeMs = Math.max(0, options.maxAgeSeconds ?? 300) * 1000;
    this.missCooldownMs = Math.max(0, options.missCooldownMs ?? 0);
    this.failureBackoffMs = Math.max(0, options.failureBackoffMs ?? 30_000);
  }

  async getKey(keyId: string): Promise<SigningKey> {
    const current = this.snapshot;
    if (current && !this.isExpired(current)) {
      const cached = current.keysById.get(keyId);
      if (cached) {
        return cached;
      }
      if (this.withinMissCooldown(current)) {
        throw new AuthError("key_not_found", `Signing key not published: ${keyId}`);
      }
    }
    if (current && this.withinFailureBackoff()) {
      return this.staleKey(current, keyId, this.lastError);
    }

    let refreshed: KeySetSnapshot;
    try {
      refreshed = await this.refreshKeySet();
    } catch (error) {
      const fallback = this.snapshot;
      if (!fallback) {
        throw error;
      }
      this.logger.warn(
        { keyId, keyCount: fallback.keysById.size, error: errorMessage(error) },
        "JWKS refresh failed, serving cached keys"
      );
      return this.staleKey(fallback, keyId, error);
    }

    const key = refreshed.keysById.get(keyId);
    if (!key) {
      throw new AuthError("key_not_found", `Signing key not published: ${keyId}`);
    }
    return key;
  }

  async refresh(): Promise<JwksStatus> {
    await this.refreshKeySet();
    return this.status();
  }

  status(): JwksStatus {
    return {
      jwksUrl: this.jwksUrl,
      keyIds: this.snapshot ? [...this.snapshot.keysById.keys()].sort((a, b) => a.localeCompare(b)) : [],
      fetchedAt: this.snapshot ? new Date(this.snapshot.fetchedAt).toISOString() : null,
      lastError: this.lastError,
      lastFailedAt: this.lastFailedRefreshAt === null ? null : new Date(this.lastFailedRefreshAt).toISOString(),
      fetchCount: this.fetchCount,
      refreshing: this.inFlight !== null
    };
  }

  /** A kid missing from the stale set cannot be proven unpublished while the endpoint is down. */
  private staleKey(snapshot: KeySetSnapshot, keyId: string, cause: unknown): SigningKey {
    const stale = snapshot.keysById.get(keyId);
    if (stale) {
      return stale;
    }
    throw new AuthError("key_fetch_unreachable", `JWKS endpoint unreachable and no cached key ${keyId}`, { cause });
  }

  private isExpired(snapshot: KeySetSnapshot): boolean {
    return this.maxAgeMs > 0 && this.clock() - snapshot.fetchedAt >= this.maxAgeMs;
  }

  private withinMissCooldown(snapshot: KeySetSnapshot): boolean {
    return this.missCooldownMs > 0 && this.clock() - snapshot.fetchedAt < this.missCooldownMs;
  }

  private withinFailureBackoff(): boolean {
    return (
      this.lastFailedRefreshAt !== null &&
      this.failureBackoffMs > 0 &&
      this.clock() - this.lastFailedRefreshAt < this.failureBackoffMs
    );
  }

  private refreshKeySet(): Promise<KeySetSnapshot> {
    if (!this.inFlight) {
      this.inFlight = this.fetchKeySet().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async fetchKeySet(): Promise<KeySetSnapshot> {
    let snapshot: KeySetSnapshot;
    try {
      snapshot = this.toSnapshot(await this.requestWithRetry());
    } catch (error) {
      this.lastError = errorMessage(error);
      this.lastFailedRefreshAt = this.clock();
      this.logger.error({ jwksUrl: this.jwksUrl, error: this.lastError }, "JWKS endpoint unreachable");
      throw new AuthError("key_fetch_unreachable", `JWKS endpoint unreachable: ${this.jwksUrl}`, { cause: error });
    }
    this.snapshot = snapshot;
    this.lastError = null;
    this.lastFailedRefreshAt = null;
    this.logger.info({ keyCount: snapshot.keysById.size }, "JWKS refreshed");
    return snapshot;
  }

  /** Only the network call is retried; an HTTP error status or a bad document fails at once. */
  private async requestWithRetry(): Promise<unknown> {
    let lastFailure: unknown = null;
    for (let attempt = 1; attempt <= 2; attempt += 1) {
      if (attempt > 1) {
        await sleep(this.retryBackoffMs);
      }
      let response: FetchResponseLike;
      try {
        this.fetchCount += 1;
        response = await this.fetchFn(this.jwksUrl, {
          signal: AbortSignal.timeout(this.fetchTimeoutMs),
          headers: { accept: "application/json" }
        });
      } catch (error) {
        lastFailure = error;
        this.logger.warn({ attempt, jwksUrl: this.jwksUrl, error: errorMessage(error) }, "JWKS fetch attempt failed");
        continue;
      }
      if (!response.ok) {
        throw new Error(`JWKS request returned HTTP ${response.status}`);
      }
      return response.json();
    }
    throw lastFailure;
  }

  private toSnapshot(document: unknown): KeySetSnapshot {
    const parsed = jwksDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new Error("JWKS document has no keys array");
    }

    const keysById = new Map<string, SigningKey>();
    for (const jwk of parsed.data.keys) {
      const key = this.toSigningKey(jwk);
      if (key) {
        keysById.set(key.keyId, key);
      }
    }
    return { keysById, fetchedAt: this.clock() };
  }

  private toSigningKey(jwk: JwkLike): SigningKey | null {
    if (typeof jwk.kid !== "string" || jwk.kid.length === 0) {
      this.logger.debug("Skipping JWK without kid");
      return null;
    }
    if (jwk.use !== undefined && jwk.use !== "sig") {
      this.logger.debug({ keyId: jwk.kid, use: jwk.use }, "Skipping non-signing JWK");
      return null;
    }
    const algorithm = inferAlgorithm(jwk);
    if (!algorithm) {
      this.logger.debug({ keyId: jwk.kid, alg: jwk.alg }, "Skipping JWK with unsupported algorithm");
      return null;
    }

    const material: JsonWebKey = {};
    for (const field of JWK_MATERIAL_FIELDS) {
      const value = jwk[field];
      if (typeof value === "string") {
        material[field] = value;
      }
    }

    try {
      const publicKey = createPublicKey({ key: material, format: "jwk" });
      return { keyId: jwk.kid, algorithm, publicKey };
    } catch (error) {
      this.logger.debug({ keyId: jwk.kid, error: errorMessage(error) }, "Skipping unparseable JWK");
      return null;
    }
  }
}
