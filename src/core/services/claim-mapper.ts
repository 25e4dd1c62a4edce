import type { AuthorityClaims, ValidatedToken } from "../types/auth.js";

export interface ClaimMapperOptions {
  subjectClaim?: string | undefined;
  /** Dotted path into the payload, e.g. `realm_access.roles`. */
  platformRolesClaim?: string | undefined;
  /** When set, client roles are read from `resource_access.<clientId>.roles`. */
  clientId?: string | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readPath(source: unknown, path: readonly string[]): unknown {
  let cursor: unknown = source;
  for (const segment of path) {
    if (!isRecord(cursor) || !Object.hasOwn(cursor, segment)) {
      return undefined;
    }
    cursor = cursor[segment];
  }
  return cursor;
}

function stringClaim(claims: Readonly<Record<string, unknown>>, name: string): string {
  const value = claims[name];
  return typeof value === "string" ? value : "";
}

function roleSet(value: unknown): ReadonlySet<string> {
  if (!Array.isArray(value)) {
    return new Set();
  }
  return new Set(value.filter((entry): entry is string => typeof entry === "string" && entry.length > 0));
}

function splitPath(path: string): string[] {
  return path
    .split(".")
    .map((segment) => segment.trim())
    .filter(Boolean);
}

export class ClaimMapper {
  private readonly subjectClaim: string;
  private readonly platformRolesPath: readonly string[];
  private readonly clientRolesPath: readonly string[] | null;

  constructor(options?: ClaimMapperOptions) {
    this.subjectClaim = options?.subjectClaim ?? "sub";
    this.platformRolesPath = splitPath(options?.platformRolesClaim ?? "realm_access.roles");
    this.clientRolesPath = options?.clientId ? ["resource_access", options.clientId, "roles"] : null;
  }

  map(token: ValidatedToken): AuthorityClaims {
    const claims = token.rawClaims;
    const configuredSubject = claims[this.subjectClaim];

    return Object.freeze({
      subject: typeof configuredSubject === "string" && configuredSubject.length > 0 ? configuredSubject : token.subject,
      platformRoles: roleSet(readPath(claims, this.platformRolesPath)),
      clientRoles: this.clientRolesPath ? roleSet(readPath(claims, this.clientRolesPath)) : new Set<string>(),
      preferredUsername: stringClaim(claims, "preferred_username"),
      email: stringClaim(claims, "email"),
      givenName: stringClaim(claims, "given_name"),
      familyName: stringClaim(claims, "family_name")
    });
  }
}
