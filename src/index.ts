import { buildServer } from "./api/server.js";
import { ConfigError, loadConfig, type BridgeConfig } from "./config.js";
import { createPlatformContext } from "./core/services/platform-context.js";
import { createLogger } from "./lib/logger.js";

function readConfig(): BridgeConfig | null {
  try {
    return loadConfig();
  } catch (error) {
    const bootLogger = createLogger();
    if (error instanceof ConfigError) {
      bootLogger.fatal({ issues: error.issues }, error.message);
    } else {
      bootLogger.fatal({ err: error }, "Failed to load configuration");
    }
    return null;
  }
}

function start(): void {
  const config = readConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ level: config.logLevel });
  const context = createPlatformContext({ config, logger });
  const app = buildServer(context);

  let isShuttingDown = false;

  async function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
      return;
    }
    isShuttingDown = true;
    logger.info({ signal }, "Shutting down gracefully");
    try {
      await app.close();
      logger.info("Server closed");
    } catch (error) {
      logger.error({ err: error }, "Error during shutdown");
      process.exitCode = 1;
    }
  }

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  const { host, port } = config.server;
  app
    .listen({ port, host })
    .then(() => {
      logger.info({ host, port, jwksUrl: config.jwks.url, issuer: config.token.expectedIssuer }, "Auth bridge listening");
    })
    .catch((error: unknown) => {
      logger.fatal({ err: error }, "Failed to start auth bridge");
      process.exitCode = 1;
    });
}

start();
