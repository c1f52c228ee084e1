import { createServer } from "http";
import { config } from "./config";
import { createApp } from "./app";
import { logger } from "./utils/logger";

const HTTP_SERVER_CLOSE_TIMEOUT_MS = 12_000;

const httpServer = createServer(createApp());

httpServer.listen(config.port, "0.0.0.0", () => {
    logger.info(
        `[Startup] Listening on port ${config.port} (${config.nodeEnv}, mode=${config.mixing.defaultMode})`
    );
    logger.debug(`[Startup] Policy store: ${config.policies.configDir}`);
});

// Graceful shutdown handling
let isShuttingDown = false;

function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
        logger.debug("Shutdown already in progress...");
        return;
    }

    isShuttingDown = true;
    logger.debug(`Received ${signal}. Closing HTTP server...`);

    const forceExit = setTimeout(() => {
        logger.warn(
            `[Shutdown] HTTP server close timed out after ${HTTP_SERVER_CLOSE_TIMEOUT_MS}ms`
        );
        process.exit(1);
    }, HTTP_SERVER_CLOSE_TIMEOUT_MS);
    forceExit.unref();

    httpServer.close((error) => {
        if (error) {
            logger.error("Error during shutdown:", error);
            process.exit(1);
        }
        logger.debug("Graceful shutdown complete");
        process.exit(0);
    });
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});
