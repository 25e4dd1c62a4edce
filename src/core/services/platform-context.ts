import type { BridgeConfig } from "../../config.js";
import { createLogger, type Logger } from "../../lib/logger.js";
import type { Clock } from "../../lib/time.js";
import { FileMembershipStore, type TenantMembershipStore } from "../store/membership-store.js";
import { PostgresMembershipStore } from "../store/postgres-membership-store.js";
import { AuthService } from "./auth-service.js";
import { AuthorizationContextService } from "./authorization-context-service.js";
import { ClaimMapper } from "./claim-mapper.js";
import { JwksService, type FetchLike } from "./jwks-service.js";
import { TokenValidator } from "./token-validator.js";

export interface PlatformContext {
  config: BridgeConfig;
  logger: Logger;
  membershipStore: TenantMembershipStore;
  jwksService: JwksService;
  tokenValidator: TokenValidator;
  claimMapper: ClaimMapper;
  authorizationContextService: AuthorizationContextService;
  authService: AuthService;
}

export interface PlatformContextOptions {
  config: BridgeConfig;
  logger?: Logger | undefined;
  clock?: Clock | undefined;
  fetchFn?: FetchLike | undefined;
  membershipStore?: TenantMembershipStore | undefined;
}

function createMembershipStore(config: BridgeConfig, logger: Logger): TenantMembershipStore {
  const storeConfig = config.membershipStore;
  if (storeConfig.mode === "postgres") {
    return new PostgresMembershipStore({
      connectionString: storeConfig.connectionString,
      tableName: storeConfig.tableName,
      logger
    });
  }
  return new FileMembershipStore(storeConfig.filePath);
}

export function createPlatformContext(options: PlatformContextOptions): PlatformContext {
  const { config } = options;
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const membershipStore = options.membershipStore ?? createMembershipStore(config, logger);

  const jwksService = new JwksService({
    jwksUrl: config.jwks.url,
    fetchFn: options.fetchFn,
    clock: options.clock,
    logger,
    fetchTimeoutMs: config.jwks.fetchTimeoutMs,
    retryBackoffMs: config.jwks.retryBackoffMs,
    maxAgeSeconds: config.jwks.maxAgeSeconds,
    missCooldownMs: config.jwks.missCooldownMs,
    failureBackoffMs: config.jwks.failureBackoffMs
  });
  const tokenValidator = new TokenValidator(jwksService, {
    clock: options.clock,
    clockToleranceSeconds: config.token.clockToleranceSeconds
  });
  const claimMapper = new ClaimMapper({
    subjectClaim: config.claims.subjectClaim,
    platformRolesClaim: config.claims.platformRolesClaim,
    clientId: config.claims.clientId
  });
  const authorizationContextService = new AuthorizationContextService(membershipStore, {
    platformAdminRole: config.claims.platformAdminRole
  });
  const authService = new AuthService(tokenValidator, claimMapper, authorizationContextService, {
    expectedIssuer: config.token.expectedIssuer,
    expectedAudience: config.token.expectedAudience,
    logger
  });

  return {
    config,
    logger,
    membershipStore,
    jwksService,
    tokenValidator,
    claimMapper,
    authorizationContextService,
    authService
  };
}
