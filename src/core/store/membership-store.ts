import { existsSync, readFileSync } from "node:fs";
import type { TenantMembership } from "../types/auth.js";
import { tenantMembershipFileSchema } from "../types/schemas.js";

/**
 * Read-only view of the tenant-membership table. The relational store owns
 * these rows; nothing in the bridge writes them.
 */
export interface TenantMembershipStore {
  listMembershipsForSubject(subject: string): Promise<TenantMembership[]>;
  close?(): Promise<void>;
}

function sortMemberships(memberships: TenantMembership[]): TenantMembership[] {
  return memberships.sort((a, b) => a.tenantId.localeCompare(b.tenantId));
}

export class InMemoryMembershipStore implements TenantMembershipStore {
  private readonly memberships: readonly TenantMembership[];

  constructor(memberships: readonly TenantMembership[] = []) {
    this.memberships = memberships.map((membership) => Object.freeze({ ...membership }));
  }

  async listMembershipsForSubject(subject: string): Promise<TenantMembership[]> {
    return sortMemberships(this.memberships.filter((membership) => membership.userSubject === subject));
  }
}

/**
 * Membership rows loaded once from a JSON array of
 * `{ userSubject, tenantId, role }`. A missing file means no memberships.
 */
export class FileMembershipStore implements TenantMembershipStore {
  private readonly delegate: InMemoryMembershipStore;

  constructor(private readonly filePath: string) {
    this.delegate = new InMemoryMembershipStore(this.load());
  }

  async listMembershipsForSubject(subject: string): Promise<TenantMembership[]> {
    return this.delegate.listMembershipsForSubject(subject);
  }

  private load(): TenantMembership[] {
    if (!existsSync(this.filePath)) {
      return [];
    }
    const raw = readFileSync(this.filePath, "utf8");
    const parsed = tenantMembershipFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid tenant membership file ${this.filePath}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
