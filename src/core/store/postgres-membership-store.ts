import pg from "pg";
import type { TenantMembership } from "../types/auth.js";
import { membershipRowSchema, tenantRoleSchema } from "../types/schemas.js";
import type { TenantMembershipStore } from "./membership-store.js";
import { silentLogger, type Logger } from "../../lib/logger.js";

/** The slice of `pg.Pool` the store uses; tests hand in an in-process fake. */
export interface MembershipQueryable {
  query(text: string, values: unknown[]): Promise<{ rows: unknown[] }>;
  end(): Promise<void>;
}

export interface PostgresMembershipStoreOptions {
  connectionString?: string | undefined;
  queryable?: MembershipQueryable | undefined;
  tableName?: string | undefined;
  logger?: Logger | undefined;
}

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*(\.[a-z_][a-z0-9_]*)?$/i;

function poolQueryable(connectionString: string): MembershipQueryable {
  const pool = new pg.Pool({ connectionString, max: 10 });
  return {
    query: async (text, values) => {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },
    end: () => pool.end()
  };
}

export class PostgresMembershipStore implements TenantMembershipStore {
  private readonly db: MembershipQueryable;
  private readonly selectSql: string;
  private readonly logger: Logger;

  constructor(options: PostgresMembershipStoreOptions) {
    const tableName = options.tableName ?? "tenant_memberships";
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new Error(`Invalid tenant membership table name: ${tableName}`);
    }
    if (options.queryable) {
      this.db = options.queryable;
    } else if (options.connectionString) {
      this.db = poolQueryable(options.connectionString);
    } else {
      throw new Error("PostgresMembershipStore requires a connection string.");
    }
    this.selectSql = `SELECT user_subject, tenant_id, role FROM ${tableName} WHERE user_subject = $1 ORDER BY tenant_id ASC`;
    this.logger = (options.logger ?? silentLogger()).child({ component: "membership-store" });
  }

  async listMembershipsForSubject(subject: string): Promise<TenantMembership[]> {
    const result = await this.db.query(this.selectSql, [subject]);
    const memberships: TenantMembership[] = [];
    for (const row of result.rows) {
      const parsed = membershipRowSchema.safeParse(row);
      if (!parsed.success) {
        this.logger.warn({ subject }, "Skipping malformed tenant membership row");
        continue;
      }
      const { user_subject: userSubject, tenant_id: tenantId, role } = parsed.data;
      const tenantRole = tenantRoleSchema.safeParse(role);
      if (!tenantRole.success) {
        this.logger.warn({ subject, tenantId, role }, "Skipping tenant membership with unknown role");
        continue;
      }
      memberships.push({ userSubject, tenantId, role: tenantRole.data });
    }
    return memberships;
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
