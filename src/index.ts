import { Config } from "./config";
import { createLogger } from "./utils/logger";
import express, { ErrorRequestHandler } from "express";
import { DockerRuntimeClient } from "./services/runtime";
import { StatsCache } from "./services/statsCache";
import { ContainersService } from "./services/containers";
import { ContainerActionService } from "./services/containerActions";
import { ContainersStream } from "./services/containersStream";
import { AuthHelpers } from "./routes/authHelpers";
import createRootRouter from "./routes/root";
import createContainersRouter from "./routes/containers";
import { attachContainersStream } from "./routes/stream";
import { getSampleAddr, connectDockerWithRetry } from "./utils/servers";

const logger = createLogger({ file: "index" });

async function main() {
  Object.entries(Config).forEach(([key, value]) => {
    let displayValue: unknown = value;
    if (typeof value === "string" && key.endsWith("_PASSWORD")) {
      displayValue = "*".repeat(value.length);
    }
    logger.info(`[config] ${key}: ${JSON.stringify(displayValue)}`);
  });

  const docker = await connectDockerWithRetry();
  const runtimeClient = new DockerRuntimeClient(docker);
  const statsCache = new StatsCache(runtimeClient);
  const containersService = new ContainersService(runtimeClient, statsCache);
  const actionService = new ContainerActionService(runtimeClient);
  const stream = new ContainersStream(
    () => containersService.listSummaries({ includeMetrics: true }),
    { intervalSec: Config.AUTO_REFRESH_SECONDS },
  );
  const authHelpers = new AuthHelpers({
    enabled: Config.AUTH_ENABLED,
    username: Config.AUTH_USERNAME,
    password: Config.AUTH_PASSWORD,
    allowLoopback: Config.AUTH_ALLOW_LOOPBACK,
  });

  const app = express();
  app.use(express.json({ limit: 65536 }));
  app.use("/", createRootRouter());
  app.use(
    "/containers",
    authHelpers.requireAuth,
    createContainersRouter({ containersService, actionService, stream }),
  );

  const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
    logger.error(`[API ERROR] ${err}`);
    if (res.headersSent) return next(err);
    const status = (err as { statusCode?: number }).statusCode || 500;
    res.status(status).json({
      error: (err as { message?: string }).message || "internal server error",
    });
  };
  app.use(errorHandler);

  const server = app.listen(Config.HTTP_PORT, Config.HTTP_HOST, () => {
    const addr = Config.HTTP_HOST === "0.0.0.0" ? getSampleAddr() : Config.HTTP_HOST;
    logger.info(`Server running on http://${addr}:${Config.HTTP_PORT}`);
  });
  const streamEndpoint = attachContainersStream(server, stream, {
    path: "/containers/stream",
    authHelpers,
    heartbeatMs: Config.WS_HEARTBEAT_SECONDS * 1000,
  });

  let shuttingDown = false;
  function shutdown(signal: NodeJS.Signals) {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`[shutdown] Received ${signal}. Closing server...`);
    streamEndpoint.close();
    stream
      .close()
      .catch((e) => logger.error(`[shutdown] stream close error: ${e}`))
      .finally(() => {
        server.close((err?: Error) => {
          if (err) {
            logger.error(`[shutdown] HTTP server close error: ${err}`);
            process.exit(1);
          }
          logger.info("[shutdown] Done. Bye.");
          process.exit(0);
        });
      });
    setTimeout(() => {
      logger.warn("[shutdown] Force exiting after 10s");
      process.exit(1);
    }, 10000).unref();
  }

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((e) => {
  logger.error(`Fatal error: ${e}`);
  process.exit(1);
});
