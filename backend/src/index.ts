import { config } from "./config";
import { createApp } from "./app";
import { initializePolling, stopJobs } from "./polling/startPolling";
import { logger } from "./utils/logger";

config.warnings.forEach((warning) => logger.warn(warning));

if (config.departures.length === 0) {
  logger.warn("No departures configured; only ad-hoc route/stop queries will return data");
}

const polling = initializePolling();

const app = createApp({
  store: polling.store,
  sources: polling.sources,
  departures: config.departures,
  timeZone: config.displayTimeZone,
  enableDiagnostics: config.enableDiagnostics,
  feedTelemetry: () => polling.client.getTelemetry(),
  mirror: polling.mirror,
});

const server = app.listen(config.port, () => {
  logger.info(`Backend server listening on http://localhost:${config.port}`, {
    departures: config.departures.length,
    vehiclePositions: Boolean(config.vehiclePositionUrl),
  });
});

const shutdown = () => {
  logger.info("Shutting down server...");
  stopJobs(polling.jobs);
  void polling.mirror.disconnect();
  server.close(() => {
    process.exit(0);
  });
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
