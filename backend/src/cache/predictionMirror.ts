import { createClient } from "redis";
import { safeErrorMessage } from "../gtfs/errors";
import {
  createArrival,
  isOccupancyStatus,
  type Arrival,
  type PredictionTable,
  type RouteId,
  type StopId,
} from "../models/domain";
import { scopedLogger } from "../utils/logger";

const logger = scopedLogger("mirror");

export const MIRROR_KEY = "nextstop:cache:predictions";
export const MIRROR_TTL_MS = 10 * 60_000;
const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const MAX_RECONNECT_ATTEMPTS = 3;

export type SerializedTable = Array<[RouteId, Array<[StopId, Arrival[]]>]>;

export const serializeTable = (table: PredictionTable): SerializedTable =>
  Array.from(table.entries()).map(([routeId, stops]) => [
    routeId,
    Array.from(stops.entries()).map(([stopId, arrivals]) => [stopId, [...arrivals]]),
  ]);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const reviveArrival = (value: unknown): Arrival | null => {
  if (!isRecord(value) || typeof value.arrivalTime !== "number") return null;
  const position = value.position;
  let revivedPosition: { latitude: number; longitude: number } | null = null;
  if (isRecord(position)) {
    if (typeof position.latitude !== "number" || typeof position.longitude !== "number") return null;
    revivedPosition = { latitude: position.latitude, longitude: position.longitude };
  }
  const occupancy = isOccupancyStatus(value.occupancy) ? value.occupancy : null;
  return createArrival(value.arrivalTime, revivedPosition, occupancy);
};

/**
 * Rebuilds a mirrored table. Arrivals that are no longer in the future are
 * dropped so the revived table holds to the same rules as a projected one.
 */
export const reviveTable = (payload: unknown, nowMs: number): PredictionTable | null => {
  if (!Array.isArray(payload)) return null;
  const table = new Map<RouteId, ReadonlyMap<StopId, readonly Arrival[]>>();
  for (const routeEntry of payload) {
    if (!Array.isArray(routeEntry) || typeof routeEntry[0] !== "string" || !Array.isArray(routeEntry[1])) {
      return null;
    }
    const stops = new Map<StopId, readonly Arrival[]>();
    for (const stopEntry of routeEntry[1]) {
      if (!Array.isArray(stopEntry) || typeof stopEntry[0] !== "string" || !Array.isArray(stopEntry[1])) {
        return null;
      }
      const arrivals = stopEntry[1]
        .map(reviveArrival)
        .filter((arrival): arrival is Arrival => arrival !== null && arrival.arrivalTime > nowMs)
        .sort((a, b) => a.arrivalTime - b.arrivalTime);
      if (arrivals.length > 0) stops.set(stopEntry[0], Object.freeze(arrivals));
    }
    if (stops.size > 0) table.set(routeEntry[0], stops);
  }
  return table;
};

/** The handful of Redis commands the mirror issues. */
export interface MirrorConnection {
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
  get: (key: string) => Promise<string | null>;
  set: (key: string, value: string, ttlMs: number) => Promise<void>;
  onError: (listener: (error: Error) => void) => void;
}

export type MirrorStatus = "disabled" | "connecting" | "ready" | "error";

export interface PredictionMirror {
  readonly status: MirrorStatus;
  readonly error: Error | undefined;
  /** Resolves false when Redis cannot be reached in time; never rejects. */
  connect: () => Promise<boolean>;
  disconnect: () => Promise<void>;
  /** The stored payload, unvalidated, or null when absent or unreadable. */
  load: () => Promise<unknown>;
  save: (table: PredictionTable) => Promise<void>;
}

export interface PredictionMirrorOptions {
  connectTimeoutMs?: number;
  connection?: MirrorConnection;
}

export const DISABLED_MIRROR: PredictionMirror = {
  status: "disabled",
  error: undefined,
  connect: async () => false,
  disconnect: async () => undefined,
  load: async () => null,
  save: async () => undefined,
};

/** Wraps a node-redis client that gives up reconnecting after a few attempts. */
export const redisConnection = (redisUrl: string, connectTimeoutMs: number): MirrorConnection => {
  const client = createClient({
    url: redisUrl,
    socket: {
      connectTimeout: connectTimeoutMs,
      reconnectStrategy: (retries: number) =>
        retries >= MAX_RECONNECT_ATTEMPTS
          ? new Error(`Redis unreachable after ${retries} reconnect attempts`)
          : Math.min(100 * 2 ** retries, 2_000),
    },
  });
  return {
    connect: async () => {
      await client.connect();
    },
    disconnect: async () => {
      await client.disconnect();
    },
    get: async (key) => {
      const value = await client.get(key);
      return typeof value === "string" ? value : null;
    },
    set: async (key, value, ttlMs) => {
      await client.set(key, value, { PX: ttlMs });
    },
    onError: (listener) => {
      client.on("error", listener);
    },
  };
};

const toError = (error: unknown) => (error instanceof Error ? error : new Error(safeErrorMessage(error)));

/**
 * Mirrors the latest prediction table to Redis. Every failure is logged and
 * reflected in `status`; none of them reaches the caller.
 */
export const createPredictionMirror = (
  redisUrl: string | undefined,
  options: PredictionMirrorOptions = {},
): PredictionMirror => {
  if (!redisUrl) {
    logger.info("REDIS_URL not set; predictions stay in memory only");
    return DISABLED_MIRROR;
  }

  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  const connection = options.connection ?? redisConnection(redisUrl, connectTimeoutMs);
  let status: MirrorStatus = "disabled";
  let lastError: Error | undefined;
  let connected = false;

  const fail = (error: unknown) => {
    status = "error";
    lastError = toError(error);
    return lastError;
  };

  connection.onError((error) => {
    logger.warn("Redis connection error", { error: fail(error) });
  });

  const connect = async () => {
    if (connected) return true;
    status = "connecting";
    const attempt = connection.connect();
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(new Error(`Redis did not connect within ${connectTimeoutMs}ms`));
      }, connectTimeoutMs);
    });

    try {
      await Promise.race([attempt, deadline]);
      connected = true;
      status = "ready";
      lastError = undefined;
      logger.info("Prediction mirror connected");
      return true;
    } catch (error) {
      logger.warn("Prediction mirror unavailable; predictions stay in memory only", { error: fail(error) });
      if (timedOut) {
        // release a connection that completes after we stopped waiting for it
        void attempt
          .then(() => connection.disconnect())
          .catch((lateError: unknown) => {
            logger.debug("Abandoned Redis connect attempt failed", { error: toError(lateError) });
          });
      }
      return false;
    } finally {
      clearTimeout(timer);
    }
  };

  const disconnect = async () => {
    if (!connected) return;
    connected = false;
    try {
      await connection.disconnect();
      status = "disabled";
    } catch (error) {
      logger.warn("Failed to close Redis connection", { error: fail(error) });
    }
  };

  const load = async (): Promise<unknown> => {
    if (!connected) return null;
    try {
      const payload = await connection.get(MIRROR_KEY);
      if (payload === null) return null;
      const parsed: unknown = JSON.parse(payload);
      return parsed;
    } catch (error) {
      logger.warn("Reading the prediction mirror failed", { key: MIRROR_KEY, error: toError(error) });
      return null;
    }
  };

  const save = async (table: PredictionTable) => {
    if (!connected) return;
    try {
      await connection.set(MIRROR_KEY, JSON.stringify(serializeTable(table)), MIRROR_TTL_MS);
      status = "ready";
      lastError = undefined;
    } catch (error) {
      logger.warn("Writing the prediction mirror failed", { key: MIRROR_KEY, error: fail(error) });
    }
  };

  return {
    get status() {
      return status;
    },
    get error() {
      return lastError;
    },
    connect,
    disconnect,
    load,
    save,
  };
};
