import { constants, verify, type KeyObject, type VerifyKeyObjectInput } from "node:crypto";
import { AuthError, isAuthError } from "../errors.js";
import type { SigningAlgorithm, SigningKey, ValidatedToken } from "../types/auth.js";
import { systemClock, type Clock } from "../../lib/time.js";

export interface SigningKeyResolver {
  getKey(keyId: string): Promise<SigningKey>;
}

export interface TokenValidatorOptions {
  clock?: Clock | undefined;
  clockToleranceSeconds?: number | undefined;
}

type JsonObject = Record<string, unknown>;

const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

const DIGESTS: Record<SigningAlgorithm, string> = {
  RS256: "sha256",
  RS384: "sha384",
  RS512: "sha512",
  PS256: "sha256",
  PS384: "sha384",
  PS512: "sha512",
  ES256: "sha256",
  ES384: "sha384",
  ES512: "sha512"
};

function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function decodeSegment(segment: string, label: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(segment, "base64url").toString("utf8"));
  } catch (error) {
    throw new AuthError("malformed", `Token ${label} is not valid JSON.`, { cause: error });
  }
  if (!isJsonObject(parsed)) {
    throw new AuthError("malformed", `Token ${label} is not a JSON object.`);
  }
  return parsed;
}

function parseAudience(value: unknown): Set<string> {
  if (typeof value === "string" && value.length > 0) {
    return new Set([value]);
  }
  if (Array.isArray(value)) {
    return new Set(value.filter((entry): entry is string => typeof entry === "string"));
  }
  return new Set();
}

function verifyInput(algorithm: SigningAlgorithm, key: KeyObject): VerifyKeyObjectInput {
  if (algorithm.startsWith("PS")) {
    return {
      key,
      padding: constants.RSA_PKCS1_PSS_PADDING,
      saltLength: constants.RSA_PSS_SALTLEN_DIGEST
    };
  }
  if (algorithm.startsWith("ES")) {
    return { key, dsaEncoding: "ieee-p1363" };
  }
  return { key };
}

function keyTypeMatches(algorithm: SigningAlgorithm, key: KeyObject): boolean {
  const keyType = key.asymmetricKeyType;
  if (algorithm.startsWith("ES")) {
    return keyType === "ec";
  }
  return keyType === "rsa" || (algorithm.startsWith("PS") && keyType === "rsa-pss");
}

/**
 * Verifies compact-serialized signed tokens against the cached signing keys.
 *
 * Checks run in a fixed order (structure, key, signature, issuer, audience,
 * expiry) and the first failure wins, so every rejection maps to exactly one
 * failure kind.
 */
export class TokenValidator {
  private readonly clock: Clock;
  private readonly clockToleranceSeconds: number;

  constructor(
    private readonly keys: SigningKeyResolver,
    options?: TokenValidatorOptions
  ) {
    this.clock = options?.clock ?? systemClock;
    this.clockToleranceSeconds = Math.max(0, options?.clockToleranceSeconds ?? 0);
  }

  async validate(rawToken: string, expectedIssuer: string, expectedAudience: string): Promise<ValidatedToken> {
    const parts = rawToken.split(".");
    if (parts.length !== 3) {
      throw new AuthError("malformed", "Token must have three segments.");
    }
    const [headerSegment, payloadSegment, signatureSegment] = parts;
    if (
      !headerSegment ||
      !payloadSegment ||
      !signatureSegment ||
      !SEGMENT_PATTERN.test(headerSegment) ||
      !SEGMENT_PATTERN.test(payloadSegment) ||
      !SEGMENT_PATTERN.test(signatureSegment)
    ) {
      throw new AuthError("malformed", "Token segments must be non-empty base64url.");
    }

    const header = decodeSegment(headerSegment, "header");
    const payload = decodeSegment(payloadSegment, "payload");

    if (typeof header.alg !== "string" || header.alg.length === 0) {
      throw new AuthError("malformed", "Token header has no alg.");
    }
    if (header.alg.toLowerCase() === "none" || header.alg.startsWith("HS")) {
      throw new AuthError("malformed", `Token algorithm not accepted: ${header.alg}`);
    }
    if (typeof header.kid !== "string" || header.kid.length === 0) {
      throw new AuthError("malformed", "Token header has no kid.");
    }

    const key = await this.resolveKey(header.kid);
    if (header.alg !== key.algorithm || !keyTypeMatches(key.algorithm, key.publicKey)) {
      throw new AuthError("invalid_signature", `Token algorithm ${header.alg} does not match key ${key.keyId}.`);
    }

    let signatureValid: boolean;
    try {
      signatureValid = verify(
        DIGESTS[key.algorithm],
        Buffer.from(`${headerSegment}.${payloadSegment}`),
        verifyInput(key.algorithm, key.publicKey),
        Buffer.from(signatureSegment, "base64url")
      );
    } catch (error) {
      throw new AuthError("invalid_signature", "Token signature could not be verified.", { cause: error });
    }
    if (!signatureValid) {
      throw new AuthError("invalid_signature", "Token signature mismatch.");
    }

    if (payload.iss !== expectedIssuer) {
      throw new AuthError("invalid_issuer", "Token issuer does not match the expected issuer.");
    }

    const audience = parseAudience(payload.aud);
    if (!audience.has(expectedAudience)) {
      throw new AuthError("invalid_audience", "Token audience does not include the expected audience.");
    }

    if (typeof payload.exp !== "number" || !Number.isFinite(payload.exp)) {
      throw new AuthError("malformed", "Token has no numeric exp claim.");
    }
    const nowSeconds = this.clock() / 1000;
    if (payload.exp + this.clockToleranceSeconds <= nowSeconds) {
      throw new AuthError("expired", "Token has expired.");
    }

    if (typeof payload.sub !== "string" || payload.sub.length === 0) {
      throw new AuthError("malformed", "Token has no sub claim.");
    }

    const issuedAtSeconds =
      typeof payload.iat === "number" && Number.isFinite(payload.iat) ? payload.iat : payload.exp;

    return Object.freeze({
      subject: payload.sub,
      issuer: expectedIssuer,
      audience,
      expiresAt: new Date(payload.exp * 1000),
      issuedAt: new Date(issuedAtSeconds * 1000),
      rawClaims: Object.freeze({ ...payload })
    });
  }

  private async resolveKey(keyId: string): Promise<SigningKey> {
    try {
      return await this.keys.getKey(keyId);
    } catch (error) {
      if (isAuthError(error) && error.kind === "key_not_found") {
        throw new AuthError("invalid_signature", `No signing key for kid ${keyId}.`, { cause: error });
      }
      if (isAuthError(error)) {
        throw error;
      }
      throw new AuthError("key_fetch_unreachable", "Signing keys could not be loaded.", { cause: error });
    }
  }
}
