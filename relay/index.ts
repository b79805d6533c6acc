/**
 * Bridge relay entry point.
 *
 * Loads configuration, then runs the bridge until SIGINT/SIGTERM.
 * Exits 1 on invalid configuration or when the initial connection fails.
 */

import * as path from "path";
import * as dotenv from "dotenv";
import { collectDefaultMetrics } from "prom-client";
import { BridgeService } from "./bridge-service";
import { type BridgeConfig, loadConfig } from "./config";
import { ConfigError, describeError } from "./errors";
import { GracefulShutdown } from "./graceful-shutdown";
import { closeServer, createHealthServer, listen } from "./health-server";
import { type Logger, createRelayLogger } from "./logger";
import { createRelayMetrics } from "./metrics";
import { enforceTLSSecurity, sanitizeUrl } from "./utils";

dotenv.config({ path: path.resolve(process.cwd(), process.env.RELAY_ENV_FILE || ".env") });

async function main(): Promise<void> {
  const bootLogger = createRelayLogger({ level: process.env.LOG_LEVEL || "info" });
  enforceTLSSecurity(bootLogger);

  const config = loadConfigOrExit(bootLogger);

  const logger = createRelayLogger({ level: config.logLevel, json: config.logJson });
  const metrics = createRelayMetrics();
  collectDefaultMetrics({ register: metrics.registry, prefix: "bridge_relay_" });

  logger.info(
    `Starting bridge relay: ${sanitizeUrl(config.source.rpcUrl)} (chain ${config.source.chainId}) -> ` +
    `${sanitizeUrl(config.destination.rpcUrl)} (chain ${config.destination.chainId})`
  );

  const service = new BridgeService(config, { logger, metrics });
  const healthServer = createHealthServer(service, metrics.registry, logger);
  await listen(healthServer, config.healthPort, config.healthBindHost);
  logger.info(`Health endpoint on ${config.healthBindHost}:${config.healthPort}/health`);

  const shutdown = new GracefulShutdown(logger, { timeoutMs: config.shutdownTimeoutMs });
  shutdown.registerCleanup("bridge", () => service.stop());
  shutdown.registerCleanup("health", () => closeServer(healthServer));
  shutdown.install();

  try {
    await service.start();
  } catch (err) {
    logger.error(`FATAL: bridge failed to start: ${describeError(err)}`);
    await shutdown.initiateShutdown(1);
  }
}

function loadConfigOrExit(logger: Logger): BridgeConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  console.error(`[Main] Fatal: ${describeError(err)}`);
  process.exit(1);
});
