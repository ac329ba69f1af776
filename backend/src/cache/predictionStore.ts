import type { StoreHealth } from "@nextstop/core";
import { decodeFeed } from "../gtfs/decoder";
import type { FeedSources } from "../gtfs/client";
import { FetchError, safeErrorMessage } from "../gtfs/errors";
import {
  EMPTY_TABLE,
  EMPTY_VEHICLE_INDEX,
  type Arrival,
  type EntityAnomaly,
  type PredictionTable,
  type RouteId,
  type StopId,
} from "../models/domain";
import { buildVehicleIndex } from "../services/vehicleIndex";
import { projectArrivals } from "../services/arrivalProjector";
import { scopedLogger } from "../utils/logger";
import { DISABLED_MIRROR, MIRROR_KEY, reviveTable, type PredictionMirror } from "./predictionMirror";

const logger = scopedLogger("store");

const STALE_AFTER_INTERVALS = 3;
const ANOMALY_SAMPLE_SIZE = 5;
const NO_ARRIVALS: readonly Arrival[] = Object.freeze([]);

export type RefreshOutcome =
  | {
      status: "refreshed";
      routeCount: number;
      arrivalCount: number;
      anomalyCount: number;
      durationMs: number;
    }
  | { status: "throttled" }
  | { status: "in_flight" }
  | { status: "failed"; error: Error };

export interface PredictionStoreOptions {
  minRefreshIntervalMs: number;
  clock?: () => number;
  mirror?: PredictionMirror;
}

const countArrivals = (table: PredictionTable) => {
  let total = 0;
  table.forEach((stops) => stops.forEach((arrivals) => (total += arrivals.length)));
  return total;
};

const logAnomalies = (source: string, anomalies: EntityAnomaly[]) => {
  if (anomalies.length === 0) return;
  logger.warn("Skipped feed entities", {
    source,
    count: anomalies.length,
    samples: anomalies.slice(0, ANOMALY_SAMPLE_SIZE),
  });
};

/**
 * Owns the latest prediction table. Refreshes are rate limited and never
 * overlap; a failed refresh leaves the previous table in place.
 */
export class PredictionStore {
  private table: PredictionTable = EMPTY_TABLE;
  private lastAttemptAt: number | null = null;
  private lastSuccessAt: number | null = null;
  private lastError: string | null = null;
  private inFlight = false;
  private readonly minRefreshIntervalMs: number;
  private readonly clock: () => number;
  private readonly mirror: PredictionMirror;

  constructor(options: PredictionStoreOptions) {
    this.minRefreshIntervalMs = options.minRefreshIntervalMs;
    this.clock = options.clock ?? Date.now;
    this.mirror = options.mirror ?? DISABLED_MIRROR;
  }

  async refresh(sources: FeedSources): Promise<RefreshOutcome> {
    if (this.inFlight) {
      logger.debug("Refresh already running; request coalesced");
      return { status: "in_flight" };
    }
    const startedAt = this.clock();
    if (this.lastAttemptAt !== null && startedAt - this.lastAttemptAt < this.minRefreshIntervalMs) {
      return { status: "throttled" };
    }

    this.inFlight = true;
    this.lastAttemptAt = startedAt;
    try {
      let vehicleIndex = EMPTY_VEHICLE_INDEX;
      // vehicle positions first: a failure here aborts before the trip feed is requested
      if (sources.vehiclePositions) {
        const vehicleFeed = decodeFeed(await sources.vehiclePositions());
        const indexed = buildVehicleIndex(vehicleFeed.vehicles);
        logAnomalies("vehicle_positions", indexed.anomalies);
        vehicleIndex = indexed;
      }

      const tripFeed = decodeFeed(await sources.tripUpdates());
      const now = this.clock();
      const { table, anomalies } = projectArrivals(tripFeed.tripUpdates, vehicleIndex, now);
      logAnomalies("trip_updates", anomalies);

      this.table = table;
      this.lastSuccessAt = now;
      this.lastError = null;
      this.persist(table);

      const outcome: RefreshOutcome = {
        status: "refreshed",
        routeCount: table.size,
        arrivalCount: countArrivals(table),
        anomalyCount: anomalies.length,
        durationMs: now - startedAt,
      };
      logger.info("Prediction table refreshed", { ...outcome });
      return outcome;
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(safeErrorMessage(error));
      this.lastError = failure.message;
      logger.error("Prediction refresh failed; keeping previous table", {
        error: failure.name,
        message: failure.message,
        ...(failure instanceof FetchError ? { status: failure.status, body: failure.body } : {}),
      });
      return { status: "failed", error: failure };
    } finally {
      this.inFlight = false;
    }
  }

  get(routeId: RouteId, stopId: StopId): readonly Arrival[] {
    return this.table.get(routeId)?.get(stopId) ?? NO_ARRIVALS;
  }

  snapshot(): PredictionTable {
    return this.table;
  }

  getLastSuccessAt(): number | null {
    return this.lastSuccessAt;
  }

  getHealth(): StoreHealth {
    const now = this.clock();
    const age = this.lastSuccessAt !== null ? now - this.lastSuccessAt : null;
    return {
      lastAttemptAt: this.lastAttemptAt !== null ? new Date(this.lastAttemptAt).toISOString() : null,
      lastSuccessAt: this.lastSuccessAt !== null ? new Date(this.lastSuccessAt).toISOString() : null,
      lastError: this.lastError,
      tableAgeMs: age,
      isStale: age !== null ? age > this.minRefreshIntervalMs * STALE_AFTER_INTERVALS : true,
      routeCount: this.table.size,
    };
  }

  /** Installs the mirrored table unless a refresh has already succeeded. */
  async hydrate(): Promise<boolean> {
    const payload = await this.mirror.load();
    if (payload === null) return false;
    const revived = reviveTable(payload, this.clock());
    if (!revived) {
      logger.warn("Ignoring malformed prediction mirror", { key: MIRROR_KEY });
      return false;
    }
    if (this.lastSuccessAt !== null) return false;
    this.table = revived;
    logger.info("Hydrated prediction table from Redis", { routeCount: revived.size });
    return true;
  }

  private persist(table: PredictionTable) {
    // save logs its own failures and never rejects
    void this.mirror.save(table);
  }
}
