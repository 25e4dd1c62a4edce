import Fastify from "fastify";
import type { PlatformContext } from "../core/services/platform-context.js";
import type { AuthorizationContext } from "../core/services/authorization-context-service.js";
import { authHeaderFromHeaders, handleError, requestIdFromHeaders, unauthorized } from "./http.js";
import { registerAdminRoutes } from "./routes/admin.js";
import { registerIdentityRoutes } from "./routes/identity.js";
import { registerPublicRoutes } from "./routes/public.js";

declare module "fastify" {
  interface FastifyRequest {
    /** Set by the authentication hook; null for anonymous requests. */
    authContext: AuthorizationContext | null;
  }
}

const UNAUTHENTICATED_PATHS = new Set(["/health"]);

export function buildServer(context: PlatformContext) {
  const logger = context.logger.child({ component: "http" });

  const app = Fastify({
    logger: false
  });

  app.decorateRequest("authContext", null);

  // Security response headers
  app.addHook("onRequest", async (request, reply) => {
    const requestId = requestIdFromHeaders(request.headers);
    request.headers["x-request-id"] = requestId;
    reply.header("x-request-id", requestId);
    reply.header("x-content-type-options", "nosniff");
    reply.header("x-frame-options", "DENY");
    reply.header("cache-control", "no-store");
  });

  app.addHook("onRequest", async (request, reply) => {
    const path = request.url.split("?", 1)[0] ?? request.url;
    if (UNAUTHENTICATED_PATHS.has(path)) {
      return;
    }
    const requestId = requestIdFromHeaders(request.headers);
    const outcome = await context.authService.authenticate({
      authorizationHeader: authHeaderFromHeaders(request.headers),
      requestId
    });
    if (outcome.status === "attached") {
      request.authContext = outcome.context;
      return;
    }
    if (outcome.reason === "missing_credentials") {
      return;
    }
    return handleError(unauthorized(), reply, requestId);
  });

  app.addHook("onClose", async () => {
    await context.membershipStore.close?.();
  });

  registerPublicRoutes(app);
  registerIdentityRoutes(app);
  registerAdminRoutes(app, context);

  app.setErrorHandler((error, request, reply) =>
    handleError(error, reply, requestIdFromHeaders(request.headers), logger)
  );

  return app;
}

export type { PlatformContext };
