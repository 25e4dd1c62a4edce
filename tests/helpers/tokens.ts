import { constants, generateKeyPairSync, sign as cryptoSign, type JsonWebKey, type KeyObject } from "node:crypto";
import type { FetchLike } from "../../src/core/services/jwks-service.js";
import type { SigningAlgorithm } from "../../src/core/types/auth.js";

export const ISSUER = "https://login.example.test/realms/tenants";
export const AUDIENCE = "account";
export const JWKS_URL = "http://idp.internal:8080/realms/tenants/protocol/openid-connect/certs";

/** Fixed test time: 2023-11-14T22:13:20Z. */
export const NOW_SECONDS = 1_700_000_000;
export const fixedClock = () => NOW_SECONDS * 1000;

export interface TestSigner {
  kid: string;
  alg: SigningAlgorithm;
  privateKey: KeyObject;
  publicJwk: JsonWebKey;
}

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

export function createRsaSigner(kid: string, alg: SigningAlgorithm = "RS256"): TestSigner {
  const pair = generateKeyPairSync("rsa", { modulusLength: 2048 });
  return {
    kid,
    alg,
    privateKey: pair.privateKey,
    publicJwk: { ...pair.publicKey.export({ format: "jwk" }), kid, use: "sig", alg }
  };
}

export function createEcSigner(kid: string): TestSigner {
  const pair = generateKeyPairSync("ec", { namedCurve: "P-256" });
  return {
    kid,
    alg: "ES256",
    privateKey: pair.privateKey,
    publicJwk: { ...pair.publicKey.export({ format: "jwk" }), kid, use: "sig", alg: "ES256" }
  };
}

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value), "utf8").toString("base64url");
}

export function signToken(
  signer: TestSigner,
  payload: Record<string, unknown>,
  headerOverrides: Record<string, unknown> = {}
): string {
  const header = { alg: signer.alg, typ: "JWT", kid: signer.kid, ...headerOverrides };
  const signingInput = `${encodeSegment(header)}.${encodeSegment(payload)}`;
  const keyInput = signer.alg.startsWith("PS")
    ? { key: signer.privateKey, padding: constants.RSA_PKCS1_PSS_PADDING, saltLength: constants.RSA_PSS_SALTLEN_DIGEST }
    : signer.alg.startsWith("ES")
      ? { key: signer.privateKey, dsaEncoding: "ieee-p1363" as const }
      : { key: signer.privateKey };
  const signature = cryptoSign(DIGESTS[signer.alg], Buffer.from(signingInput, "utf8"), keyInput);
  return `${signingInput}.${signature.toString("base64url")}`;
}

/** Payload accepted by the default expectations, valid for an hour from {@link NOW_SECONDS}. */
export function tokenClaims(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    iss: ISSUER,
    aud: AUDIENCE,
    sub: "user-123",
    iat: NOW_SECONDS - 60,
    exp: NOW_SECONDS + 3600,
    preferred_username: "jdoe",
    email: "jdoe@example.test",
    realm_access: { roles: ["offline_access"] },
    ...overrides
  };
}

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

/**
 * In-process stand-in for the identity provider's key endpoint. Counts
 * requests and can be told to fail, hang or hold responses until released.
 */
export class FakeJwksEndpoint {
  calls = 0;
  keys: JsonWebKey[];
  failNext = 0;
  httpStatus = 200;
  hang = false;
  document: unknown = null;
  private gate: Deferred | null = null;

  constructor(...signers: TestSigner[]) {
    this.keys = signers.map((signer) => signer.publicJwk);
  }

  publish(...signers: TestSigner[]): void {
    this.keys = signers.map((signer) => signer.publicJwk);
  }

  hold(): void {
    this.gate = deferred();
  }

  release(): void {
    this.gate?.resolve();
    this.gate = null;
  }

  readonly fetchFn: FetchLike = async (_input, init) => {
    this.calls += 1;
    if (this.gate) {
      await this.gate.promise;
    }
    if (this.hang) {
      await new Promise<never>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted due to timeout")));
      });
    }
    if (this.failNext > 0) {
      this.failNext -= 1;
      throw new Error("connect ECONNREFUSED");
    }
    const body = this.document ?? { keys: this.keys };
    return {
      ok: this.httpStatus >= 200 && this.httpStatus < 300,
      status: this.httpStatus,
      json: async () => body
    };
  };
}
