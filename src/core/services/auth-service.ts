import { isAuthError, type AuthFailureKind } from "../errors.js";
import type { AuthenticationStage, ValidatedToken } from "../types/auth.js";
import type { AuthorizationContext, AuthorizationContextService } from "./authorization-context-service.js";
import type { ClaimMapper } from "./claim-mapper.js";
import type { TokenValidator } from "./token-validator.js";
import { silentLogger, type Logger } from "../../lib/logger.js";

export interface AuthenticatedOutcome {
  status: "attached";
  stage: "attached";
  context: AuthorizationContext;
}

export interface RejectedOutcome {
  status: "rejected";
  stage: "rejected";
  /** Last stage reached before the rejection. */
  failedAt: AuthenticationStage;
  reason: AuthFailureKind;
  message: string;
}

export type AuthenticationOutcome = AuthenticatedOutcome | RejectedOutcome;

export interface AuthenticateInput {
  authorizationHeader: string | undefined;
  requestId?: string | undefined;
}

export interface AuthServiceOptions {
  expectedIssuer: string;
  expectedAudience: string;
  logger?: Logger | undefined;
}

const BEARER_PATTERN = /^Bearer[ \t]+(.+)$/i;

export function extractBearerToken(authorizationHeader: string | undefined): string | null {
  if (!authorizationHeader) {
    return null;
  }
  const match = BEARER_PATTERN.exec(authorizationHeader.trim());
  const token = match?.[1]?.trim();
  return token ? token : null;
}

/**
 * Runs once per request: extract the bearer token, validate it, map its
 * claims and build the authorization context. Token failures come back as a
 * rejected outcome carrying the specific kind; store failures are thrown.
 */
export class AuthService {
  private readonly expectedIssuer: string;
  private readonly expectedAudience: string;
  private readonly logger: Logger;

  constructor(
    private readonly tokenValidator: TokenValidator,
    private readonly claimMapper: ClaimMapper,
    private readonly contextService: AuthorizationContextService,
    options: AuthServiceOptions
  ) {
    this.expectedIssuer = options.expectedIssuer;
    this.expectedAudience = options.expectedAudience;
    this.logger = (options.logger ?? silentLogger()).child({ component: "authenticator" });
  }

  async authenticate(input: AuthenticateInput): Promise<AuthenticationOutcome> {
    const token = extractBearerToken(input.authorizationHeader);
    if (!token) {
      return this.reject("unauthenticated", "missing_credentials", "No bearer token presented.", input.requestId);
    }

    let validated: ValidatedToken;
    try {
      validated = await this.tokenValidator.validate(token, this.expectedIssuer, this.expectedAudience);
    } catch (error) {
      if (isAuthError(error)) {
        return this.reject("token_extracted", error.kind, error.message, input.requestId);
      }
      throw error;
    }

    const claims = this.claimMapper.map(validated);
    const context = await this.contextService.build(claims);
    this.logger.debug(
      {
        requestId: input.requestId,
        subject: context.subject,
        tenantCount: context.tenantMemberships.length,
        platformAdmin: context.isPlatformAdmin()
      },
      "Request authenticated"
    );
    return { status: "attached", stage: "attached", context };
  }

  private reject(
    failedAt: AuthenticationStage,
    reason: AuthFailureKind,
    message: string,
    requestId: string | undefined
  ): RejectedOutcome {
    const entry = { requestId, failedAt, reason, detail: message };
    if (reason === "missing_credentials") {
      this.logger.debug(entry, "Anonymous request");
    } else if (reason === "key_fetch_unreachable") {
      this.logger.error(entry, "Request rejected: signing keys unavailable");
    } else {
      this.logger.warn(entry, "Request rejected: token failed validation");
    }
    return { status: "rejected", stage: "rejected", failedAt, reason, message };
  }
}
