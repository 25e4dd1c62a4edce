import type { FastifyInstance } from "fastify";
import type { PlatformContext } from "../../core/services/platform-context.js";
import { isAuthError } from "../../core/errors.js";
import { HttpError, handleError, requestIdFromHeaders, requirePlatformAdmin } from "../http.js";

export function registerAdminRoutes(app: FastifyInstance, context: PlatformContext): void {
  app.get("/v1/admin/jwks", async (request, reply) => {
    try {
      requirePlatformAdmin(request);
      return reply.send(context.jwksService.status());
    } catch (error) {
      return handleError(error, reply, requestIdFromHeaders(request.headers));
    }
  });

  app.post("/v1/admin/jwks/refresh", async (request, reply) => {
    const requestId = requestIdFromHeaders(request.headers);
    try {
      const authContext = requirePlatformAdmin(request);
      context.logger.info({ requestId, subject: authContext.subject }, "JWKS refresh requested");
      return reply.send(await context.jwksService.refresh());
    } catch (error) {
      if (isAuthError(error) && error.kind === "key_fetch_unreachable") {
        return handleError(new HttpError(502, "jwks_unreachable", error.message), reply, requestId);
      }
      return handleError(error, reply, requestId);
    }
  });
}
