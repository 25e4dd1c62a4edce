import type { FastifyInstance } from "fastify";
import { tenantParamsSchema } from "../../core/types/schemas.js";
import { HttpError, handleError, requestIdFromHeaders, requireAuthContext } from "../http.js";

export function registerIdentityRoutes(app: FastifyInstance): void {
  app.get("/v1/me", async (request, reply) => {
    try {
      const authContext = requireAuthContext(request);
      return reply.send(authContext.toJSON());
    } catch (error) {
      return handleError(error, reply, requestIdFromHeaders(request.headers));
    }
  });

  // Platform administration grants no tenant role, so admins get a 404 here too unless they are members.
  app.get("/v1/me/tenants/:tenantId", async (request, reply) => {
    try {
      const authContext = requireAuthContext(request);
      const { tenantId } = tenantParamsSchema.parse(request.params);
      const membership = authContext.membershipFor(tenantId);
      if (!membership) {
        throw new HttpError(404, "not_found", "Not a member of this tenant.");
      }
      return reply.send({
        subject: authContext.subject,
        tenantId: membership.tenantId,
        role: membership.role,
        isPlatformAdmin: authContext.isPlatformAdmin()
      });
    } catch (error) {
      return handleError(error, reply, requestIdFromHeaders(request.headers));
    }
  });
}
