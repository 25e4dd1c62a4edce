import type { FastifyInstance } from "fastify";
import { nowIso } from "../../lib/time.js";

export function registerPublicRoutes(app: FastifyInstance): void {
  app.get("/health", async () => ({
    status: "ok",
    service: "authbridge",
    timestamp: nowIso()
  }));
}
