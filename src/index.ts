import { readEnv, redactEnvForLogs } from "./config/env";
import { createLogger } from "./config/logger";
import { createHtpasswdCredentialStore } from "./auth/credentials";
import { DirectoryScriptRegistry } from "./scripts/registry";
import { createScriptDispatcher } from "./http/dispatch";
import { startHttpServer } from "./http/server";

async function main(): Promise<void> {
  const env = readEnv();
  const logger = createLogger(env.CLOUDOMATE_LOG_LEVEL);

  logger.info("cloudomate_boot", {
    authEnabled: Boolean(env.CLOUDOMATE_PASSFILE),
    env: redactEnvForLogs(env),
  });

  const registry = await DirectoryScriptRegistry.load({
    directory: env.CLOUDOMATE_SCRIPT_DIR,
    logger,
  });
  const credentialStore = env.CLOUDOMATE_PASSFILE
    ? createHtpasswdCredentialStore(env.CLOUDOMATE_PASSFILE, logger)
    : null;
  const dispatcher = createScriptDispatcher({
    logger,
    timeoutMs: env.CLOUDOMATE_EXEC_TIMEOUT_MS,
    killGraceMs: env.CLOUDOMATE_EXEC_KILL_GRACE_MS,
  });

  const server = startHttpServer({
    host: env.CLOUDOMATE_HOST,
    port: env.CLOUDOMATE_PORT,
    logger,
    registry,
    dispatcher,
    credentialStore,
    forceJson: env.CLOUDOMATE_FORCE_JSON,
    maxBodyBytes: env.CLOUDOMATE_MAX_BODY_BYTES,
  });

  let shuttingDown = false;

  const shutdown = async (signal: string, exitCode = 0): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("cloudomate_shutdown_start", { signal });

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    logger.info("cloudomate_shutdown_complete", {});
    process.exitCode = exitCode;
  };

  const requestShutdown = (signal: string, exitCode = 0): void => {
    shutdown(signal, exitCode).catch((error: unknown) => {
      logger.error("cloudomate_shutdown_failed", {
        signal,
        message: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    });
  };

  process.on("SIGINT", () => requestShutdown("SIGINT"));
  process.on("SIGTERM", () => requestShutdown("SIGTERM"));
  process.on("uncaughtException", (error) => {
    logger.error("cloudomate_uncaught_exception", {
      message: error.message,
      stack: error.stack ?? null,
    });
    requestShutdown("uncaughtException", 1);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("cloudomate_unhandled_rejection", {
      message: reason instanceof Error ? reason.message : String(reason),
    });
    requestShutdown("unhandledRejection", 1);
  });
}

void main().catch((error) => {
  process.stderr.write(`cloudomate fatal: ${error instanceof Error ? error.stack : String(error)}\n`);
  process.exit(1);
});
