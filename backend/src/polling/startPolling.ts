import { config, type AppConfig } from "../config";
import {
  createFeedClient,
  createFeedSources,
  type FeedClient,
  type FeedSources,
  type FetchLike,
} from "../gtfs/client";
import { PredictionStore } from "../cache/predictionStore";
import { createPredictionMirror, type PredictionMirror } from "../cache/predictionMirror";
import { logger } from "../utils/logger";

export interface PollingJob {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  initialDelayMs?: number;
  timer?: NodeJS.Timeout;
  stopped?: boolean;
}

export const createJobs = (store: PredictionStore, sources: FeedSources, intervalMs: number): PollingJob[] => [
  {
    name: "predictions",
    intervalMs,
    initialDelayMs: 0,
    run: async () => {
      // refresh logs its own failures and never rejects
      const outcome = await store.refresh(sources);
      logger.debug("Prediction refresh finished", { status: outcome.status });
    },
  },
];

/** Runs a job on a timeout chain so a slow run is never overlapped by the next. */
export const startJob = (job: PollingJob) => {
  job.stopped = false;
  const scheduleNext = (delayMs: number) => {
    if (job.stopped) return;
    job.timer = setTimeout(() => {
      const start = Date.now();
      void job
        .run()
        .then(() => {
          logger.debug("Polling job completed", { job: job.name, durationMs: Date.now() - start });
        })
        .catch((error: unknown) => {
          logger.error("Polling job failed", { job: job.name, message: String(error) });
        })
        .finally(() => {
          scheduleNext(job.intervalMs);
        });
    }, Math.max(0, delayMs));
  };

  scheduleNext(job.initialDelayMs ?? 0);
};

export const stopJobs = (jobs: PollingJob[]) => {
  jobs.forEach((job) => {
    job.stopped = true;
    if (job.timer) clearTimeout(job.timer);
  });
};

export interface PollingBundle {
  client: FeedClient;
  store: PredictionStore;
  sources: FeedSources;
  jobs: PollingJob[];
  mirror: PredictionMirror;
}

/** Collaborators swapped out by tests; production builds them from config. */
export interface PollingOverrides {
  fetchImpl?: FetchLike;
  mirror?: PredictionMirror;
}

export const initializePolling = (
  appConfig: AppConfig = config,
  overrides: PollingOverrides = {},
): PollingBundle => {
  if (!appConfig.tripUpdateUrl) {
    throw new Error("TRIP_UPDATE_URL is required to poll for predictions");
  }
  const client = createFeedClient(appConfig, overrides.fetchImpl);
  const sources = createFeedSources(client, appConfig.tripUpdateUrl, appConfig.vehiclePositionUrl);
  const mirror =
    overrides.mirror ??
    createPredictionMirror(appConfig.redisUrl, { connectTimeoutMs: appConfig.redisConnectTimeoutMs });
  const store = new PredictionStore({ minRefreshIntervalMs: appConfig.minRefreshIntervalMs, mirror });
  const jobs = createJobs(store, sources, appConfig.pollIntervalMs);

  jobs.forEach(startJob);

  // hydration only seeds a store that has not refreshed yet; polling never waits on it
  void mirror
    .connect()
    .then((connected) => (connected ? store.hydrate() : false))
    .catch((error: unknown) => {
      logger.warn("Prediction mirror hydration failed", { message: String(error) });
    });

  return { client, store, sources, jobs, mirror };
};
