import type { AuthorityClaims, TenantMembership } from "../types/auth.js";
import type { TenantMembershipStore } from "../store/membership-store.js";

export interface AuthorizationContextJson {
  subject: string;
  username: string;
  email: string;
  fullName: string;
  platformRoles: string[];
  clientRoles: string[];
  isPlatformAdmin: boolean;
  tenantMemberships: Array<{ tenantId: string; role: TenantMembership["role"] }>;
}

/**
 * Per-request authority. Platform roles come from the token; tenant
 * memberships come from the local store. The two are kept apart: being a
 * platform admin grants no tenant role, and no tenant role grants platform
 * authority.
 */
export class AuthorizationContext {
  readonly subject: string;
  readonly platformRoles: ReadonlySet<string>;
  readonly clientRoles: ReadonlySet<string>;
  readonly tenantMemberships: readonly TenantMembership[];
  readonly username: string;
  readonly email: string;
  readonly givenName: string;
  readonly familyName: string;
  private readonly platformAdmin: boolean;

  constructor(claims: AuthorityClaims, memberships: readonly TenantMembership[], platformAdminRole: string) {
    this.subject = claims.subject;
    this.platformRoles = new Set(claims.platformRoles);
    this.clientRoles = new Set(claims.clientRoles);
    this.tenantMemberships = Object.freeze(memberships.map((membership) => Object.freeze({ ...membership })));
    this.username = claims.preferredUsername;
    this.email = claims.email;
    this.givenName = claims.givenName;
    this.familyName = claims.familyName;
    this.platformAdmin = claims.platformRoles.has(platformAdminRole);
    Object.freeze(this);
  }

  isPlatformAdmin(): boolean {
    return this.platformAdmin;
  }

  hasPlatformRole(role: string): boolean {
    return this.platformRoles.has(role);
  }

  hasClientRole(role: string): boolean {
    return this.clientRoles.has(role);
  }

  membershipFor(tenantId: string): TenantMembership | null {
    return this.tenantMemberships.find((membership) => membership.tenantId === tenantId) ?? null;
  }

  get fullName(): string {
    return `${this.givenName} ${this.familyName}`.trim();
  }

  toJSON(): AuthorizationContextJson {
    return {
      subject: this.subject,
      username: this.username,
      email: this.email,
      fullName: this.fullName,
      platformRoles: [...this.platformRoles].sort((a, b) => a.localeCompare(b)),
      clientRoles: [...this.clientRoles].sort((a, b) => a.localeCompare(b)),
      isPlatformAdmin: this.platformAdmin,
      tenantMemberships: this.tenantMemberships.map((membership) => ({
        tenantId: membership.tenantId,
        role: membership.role
      }))
    };
  }
}

export interface AuthorizationContextServiceOptions {
  platformAdminRole?: string | undefined;
}

export class AuthorizationContextService {
  private readonly platformAdminRole: string;

  constructor(
    private readonly store: TenantMembershipStore,
    options?: AuthorizationContextServiceOptions
  ) {
    this.platformAdminRole = options?.platformAdminRole ?? "platform_admin";
  }

  async build(claims: AuthorityClaims): Promise<AuthorizationContext> {
    const memberships = await this.store.listMembershipsForSubject(claims.subject);
    const own = memberships.filter((membership) => membership.userSubject === claims.subject);
    return new AuthorizationContext(claims, own, this.platformAdminRole);
  }
}
