import { z } from "zod";
import type { LevelWithSilent } from "pino";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const satisfies readonly LevelWithSilent[];

const envSchema = z
  .object({
    AUTHBRIDGE_JWKS_URL: z.string().url(),
    AUTHBRIDGE_EXPECTED_ISSUER: z.string().min(1),
    AUTHBRIDGE_EXPECTED_AUDIENCE: z.string().min(1).default("account"),
    AUTHBRIDGE_SUBJECT_CLAIM: z.string().min(1).default("sub"),
    AUTHBRIDGE_PLATFORM_ROLES_CLAIM: z.string().min(1).default("realm_access.roles"),
    AUTHBRIDGE_PLATFORM_ADMIN_ROLE: z.string().min(1).default("platform_admin"),
    AUTHBRIDGE_CLIENT_ID: z.string().min(1).optional(),
    AUTHBRIDGE_CLOCK_TOLERANCE_SECONDS: z.coerce.number().int().min(0).max(300).default(0),
    AUTHBRIDGE_JWKS_TIMEOUT_MS: z.coerce.number().int().min(100).max(60_000).default(5000),
    AUTHBRIDGE_JWKS_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).max(10_000).default(250),
    AUTHBRIDGE_JWKS_MAX_AGE_SECONDS: z.coerce.number().int().min(0).default(300),
    AUTHBRIDGE_JWKS_MISS_COOLDOWN_MS: z.coerce.number().int().min(0).default(0),
    AUTHBRIDGE_JWKS_FAILURE_BACKOFF_MS: z.coerce.number().int().min(0).default(30_000),
    AUTHBRIDGE_MEMBERSHIP_STORE: z.enum(["file", "postgres"]).default("file"),
    AUTHBRIDGE_MEMBERSHIP_FILE: z.string().min(1).default("data/tenant-memberships.json"),
    AUTHBRIDGE_MEMBERSHIP_TABLE: z.string().min(1).default("tenant_memberships"),
    AUTHBRIDGE_POSTGRES_URL: z.string().min(1).optional(),
    DATABASE_URL: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
    PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
    HOST: z.string().min(1).default("0.0.0.0")
  })
  .superRefine((env, ctx) => {
    if (env.AUTHBRIDGE_MEMBERSHIP_STORE === "postgres" && !env.AUTHBRIDGE_POSTGRES_URL && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["AUTHBRIDGE_POSTGRES_URL"],
        message: "Required when AUTHBRIDGE_MEMBERSHIP_STORE=postgres (or set DATABASE_URL)."
      });
    }
  });

export type MembershipStoreConfig =
  | { mode: "file"; filePath: string }
  | { mode: "postgres"; connectionString: string; tableName: string };

export interface BridgeConfig {
  server: { host: string; port: number };
  logLevel: LevelWithSilent;
  jwks: {
    url: string;
    fetchTimeoutMs: number;
    retryBackoffMs: number;
    maxAgeSeconds: number;
    missCooldownMs: number;
    failureBackoffMs: number;
  };
  token: {
    expectedIssuer: string;
    expectedAudience: string;
    clockToleranceSeconds: number;
  };
  claims: {
    subjectClaim: string;
    platformRolesClaim: string;
    platformAdminRole: string;
    clientId: string | undefined;
  };
  membershipStore: MembershipStoreConfig;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

function withoutBlankValues(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim().length > 0) {
      out[key] = value.trim();
    }
  }
  return out;
}

/**
 * The JWKS fetch address, the expected issuer and the expected audience are
 * read from separate variables and never derived from one another: the
 * identity provider is often reached on an internal address while it signs
 * tokens with its public URL.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): BridgeConfig {
  const parsed = envSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".") || "(env)"}: ${issue.message}`));
  }
  const values = parsed.data;
  const connectionString = values.AUTHBRIDGE_POSTGRES_URL ?? values.DATABASE_URL;

  return {
    server: { host: values.HOST, port: values.PORT },
    logLevel: values.LOG_LEVEL,
    jwks: {
      url: values.AUTHBRIDGE_JWKS_URL,
      fetchTimeoutMs: values.AUTHBRIDGE_JWKS_TIMEOUT_MS,
      retryBackoffMs: values.AUTHBRIDGE_JWKS_RETRY_BACKOFF_MS,
      maxAgeSeconds: values.AUTHBRIDGE_JWKS_MAX_AGE_SECONDS,
      missCooldownMs: values.AUTHBRIDGE_JWKS_MISS_COOLDOWN_MS,
      failureBackoffMs: values.AUTHBRIDGE_JWKS_FAILURE_BACKOFF_MS
    },
    token: {
      expectedIssuer: values.AUTHBRIDGE_EXPECTED_ISSUER,
      expectedAudience: values.AUTHBRIDGE_EXPECTED_AUDIENCE,
      clockToleranceSeconds: values.AUTHBRIDGE_CLOCK_TOLERANCE_SECONDS
    },
    claims: {
      subjectClaim: values.AUTHBRIDGE_SUBJECT_CLAIM,
      platformRolesClaim: values.AUTHBRIDGE_PLATFORM_ROLES_CLAIM,
      platformAdminRole: values.AUTHBRIDGE_PLATFORM_ADMIN_ROLE,
      clientId: values.AUTHBRIDGE_CLIENT_ID
    },
    membershipStore:
      values.AUTHBRIDGE_MEMBERSHIP_STORE === "postgres" && connectionString
        ? { mode: "postgres", connectionString, tableName: values.AUTHBRIDGE_MEMBERSHIP_TABLE }
        : { mode: "file", filePath: values.AUTHBRIDGE_MEMBERSHIP_FILE }
  };
}
