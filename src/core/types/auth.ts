import type { KeyObject } from "node:crypto";

export const SIGNING_ALGORITHMS = [
  "RS256",
  "RS384",
  "RS512",
  "PS256",
  "PS384",
  "PS512",
  "ES256",
  "ES384",
  "ES512"
] as const;

export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export function isSigningAlgorithm(value: unknown): value is SigningAlgorithm {
  return SIGNING_ALGORITHMS.some((algorithm) => algorithm === value);
}

export interface SigningKey {
  readonly keyId: string;
  readonly algorithm: SigningAlgorithm;
  readonly publicKey: KeyObject;
}

export interface ValidatedToken {
  readonly subject: string;
  readonly issuer: string;
  readonly audience: ReadonlySet<string>;
  readonly expiresAt: Date;
  readonly issuedAt: Date;
  readonly rawClaims: Readonly<Record<string, unknown>>;
}

/**
 * Platform-level authority as carried by the token. Tenant roles are never
 * part of this shape; they come from {@link TenantMembership} rows.
 */
export interface AuthorityClaims {
  readonly subject: string;
  readonly platformRoles: ReadonlySet<string>;
  readonly clientRoles: ReadonlySet<string>;
  readonly preferredUsername: string;
  readonly email: string;
  readonly givenName: string;
  readonly familyName: string;
}

export const TENANT_ROLES = ["owner", "admin", "member"] as const;

export type TenantRole = (typeof TENANT_ROLES)[number];

export interface TenantMembership {
  readonly userSubject: string;
  readonly tenantId: string;
  readonly role: TenantRole;
}

export type AuthenticationStage =
  | "unauthenticated"
  | "token_extracted"
  | "validated"
  | "context_built"
  | "attached"
  | "rejected";
