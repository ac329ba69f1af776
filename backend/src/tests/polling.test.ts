import test from "node:test";
import assert from "node:assert/strict";
import { createPredictionMirror, serializeTable } from "../cache/predictionMirror";
import { loadConfig } from "../config";
import type { FetchLike } from "../gtfs/client";
import { createArrival } from "../models/domain";
import { initializePolling, startJob, stopJobs, type PollingJob } from "../polling/startPolling";
import { encodeFeed, tripUpdateEntity } from "./fixtures";
import { fakeMirrorConnection } from "./mirrorFixtures";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const waitFor = async (condition: () => boolean, timeoutMs = 1_000) => {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await sleep(5);
  }
};

const pollingConfig = () =>
  loadConfig({
    TRIP_UPDATE_URL: "https://feeds.test/trips",
    REDIS_URL: "redis://unreachable.test:6379",
    FEED_MAX_RETRIES: "0",
    DISPLAY_TIME_ZONE: "UTC",
  });

const upcomingTripFeed = () =>
  encodeFeed([
    tripUpdateEntity("tu-1", {
      routeId: "R1",
      tripId: "T1",
      stops: [{ stopId: "S1", time: Math.floor(Date.now() / 1000) + 600 }],
    }),
  ]);

const serveFeed: FetchLike = async () => new Response(upcomingTripFeed(), { status: 200 });

test("startJob runs at once and again after each interval", async () => {
  let runs = 0;
  const job: PollingJob = {
    name: "counter",
    intervalMs: 5,
    initialDelayMs: 0,
    run: async () => {
      runs += 1;
    },
  };

  startJob(job);
  await waitFor(() => runs >= 3);
  stopJobs([job]);
  const settled = runs;
  await sleep(30);

  assert.equal(runs, settled);
});

test("stopJobs during a run keeps the job from being scheduled again", async () => {
  let runs = 0;
  let finishRun: () => void = () => undefined;
  const job: PollingJob = {
    name: "slow",
    intervalMs: 1,
    initialDelayMs: 0,
    run: () => {
      runs += 1;
      return new Promise<void>((resolve) => {
        finishRun = resolve;
      });
    },
  };

  startJob(job);
  await waitFor(() => runs === 1);
  stopJobs([job]);
  finishRun();
  await sleep(30);

  assert.equal(runs, 1);
});

test("a failing job is logged and keeps its schedule", async () => {
  let runs = 0;
  const job: PollingJob = {
    name: "flaky",
    intervalMs: 5,
    initialDelayMs: 0,
    run: async () => {
      runs += 1;
      throw new Error("boom");
    },
  };

  startJob(job);
  await waitFor(() => runs >= 2);
  stopJobs([job]);

  assert.ok(runs >= 2);
});

test("initializePolling requires a trip update URL", () => {
  assert.throws(() => initializePolling(loadConfig({})), /TRIP_UPDATE_URL is required/);
});

test("initializePolling refreshes while Redis is still unreachable", async (t) => {
  const connection = fakeMirrorConnection({ connect: "hang" });
  const mirror = createPredictionMirror("redis://unreachable.test:6379", { connection, connectTimeoutMs: 200 });

  const polling = initializePolling(pollingConfig(), { fetchImpl: serveFeed, mirror });
  t.after(() => stopJobs(polling.jobs));

  await waitFor(() => polling.store.getLastSuccessAt() !== null);

  assert.equal(mirror.status, "connecting");
  assert.equal(polling.store.get("R1", "S1").length, 1);
  assert.equal(polling.store.getHealth().lastError, null);
});

test("initializePolling seeds the store from the mirror when the first refresh fails", async (t) => {
  const arrivalTime = Date.now() + 15 * 60_000;
  const mirrored = serializeTable(new Map([["R9", new Map([["S9", [createArrival(arrivalTime, null, "FULL")]]])]]));
  const mirror = createPredictionMirror("redis://mirror.test:6379", {
    connection: fakeMirrorConnection({ stored: JSON.stringify(mirrored) }),
  });
  const failingFeed: FetchLike = async () => new Response("maintenance", { status: 503 });

  const polling = initializePolling(pollingConfig(), { fetchImpl: failingFeed, mirror });
  t.after(() => stopJobs(polling.jobs));

  await waitFor(() => polling.store.get("R9", "S9").length === 1);

  assert.deepEqual(polling.store.get("R9", "S9"), [{ arrivalTime, position: null, occupancy: "FULL" }]);
  assert.equal(polling.store.getLastSuccessAt(), null);
  assert.equal(mirror.status, "ready");
});
