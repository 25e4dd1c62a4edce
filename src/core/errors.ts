export type AuthFailureKind =
  | "missing_credentials"
  | "malformed"
  | "invalid_signature"
  | "invalid_issuer"
  | "invalid_audience"
  | "expired"
  | "key_not_found"
  | "key_fetch_unreachable";

/**
 * Raised by the key cache and the token validator. The kind is for operators
 * and logs; callers outside the process only ever see a uniform rejection.
 */
export class AuthError extends Error {
  constructor(
    public readonly kind: AuthFailureKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AuthError";
  }
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}
