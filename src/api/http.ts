import type { FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";
import { createId } from "../lib/id.js";
import type { Logger } from "../lib/logger.js";
import type { AuthorizationContext } from "../core/services/authorization-context-service.js";

export const UNAUTHORIZED_MESSAGE = "Authentication failed.";
export const BEARER_CHALLENGE = 'Bearer error="invalid_token"';

export function requestIdFromHeaders(headers: Record<string, unknown>): string {
  const header = headers["x-request-id"];
  if (typeof header === "string" && header.trim().length > 0) {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string" && header[0].trim().length > 0) {
    return header[0];
  }
  return createId("req");
}

export function authHeaderFromHeaders(headers: Record<string, unknown>): string | undefined {
  const header = headers.authorization;
  if (typeof header === "string") {
    return header;
  }
  if (Array.isArray(header) && typeof header[0] === "string") {
    return header[0];
  }
  return undefined;
}

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly errorCode: string,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export function unauthorized(): HttpError {
  return new HttpError(401, "unauthorized", UNAUTHORIZED_MESSAGE);
}

export function requireAuthContext(request: FastifyRequest): AuthorizationContext {
  if (!request.authContext) {
    throw unauthorized();
  }
  return request.authContext;
}

export function requirePlatformAdmin(request: FastifyRequest): AuthorizationContext {
  const authContext = requireAuthContext(request);
  if (!authContext.isPlatformAdmin()) {
    throw new HttpError(403, "forbidden", "Platform administrator role required.");
  }
  return authContext;
}

function statusCodeOf(error: Error): number | null {
  if (!("statusCode" in error)) {
    return null;
  }
  const { statusCode } = error;
  return typeof statusCode === "number" && Number.isInteger(statusCode) && statusCode >= 400 && statusCode <= 499
    ? statusCode
    : null;
}

export function handleError(error: unknown, reply: FastifyReply, requestId?: string, logger?: Logger) {
  const errorBody = (body: Record<string, unknown>) =>
    requestId
      ? {
          ...body,
          requestId
        }
      : body;

  if (error instanceof ZodError) {
    return reply.status(400).send({
      error: errorBody({
        code: "validation_error",
        message: "Invalid request payload.",
        details: error.issues
      })
    });
  }

  if (error instanceof HttpError) {
    if (error.statusCode === 401) {
      reply.header("www-authenticate", BEARER_CHALLENGE);
    }
    return reply.status(error.statusCode).send({
      error: errorBody({
        code: error.errorCode,
        message: error.message
      })
    });
  }

  // Client errors raised by Fastify itself (bad JSON body, unsupported media type).
  if (error instanceof Error) {
    const statusCode = statusCodeOf(error);
    if (statusCode !== null) {
      return reply.status(statusCode).send({
        error: errorBody({
          code: "request_error",
          message: error.message
        })
      });
    }
  }

  logger?.error({ err: error, requestId }, "Unhandled request error");
  return reply.status(500).send({
    error: errorBody({
      code: "internal_error",
      message: "Unexpected error."
    })
  });
}
