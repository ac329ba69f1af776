import cors from "cors";
import express, { type ErrorRequestHandler } from "express";
import type {
  DepartureResponse,
  DeparturesResponse,
  FeedTelemetry,
  HealthResponse,
  NextStopErrorResponse,
  StopPredictionResponse,
} from "@nextstop/core";
import type { DepartureConfig } from "./config";
import type { PredictionStore, RefreshOutcome } from "./cache/predictionStore";
import { serializeTable, type PredictionMirror } from "./cache/predictionMirror";
import type { FeedSources } from "./gtfs/client";
import { presentArrivals, presentDeparture } from "./services/presenter";
import { logger } from "./utils/logger";

export interface AppDependencies {
  store: PredictionStore;
  sources: FeedSources;
  departures: DepartureConfig[];
  timeZone: string;
  enableDiagnostics: boolean;
  feedTelemetry: () => FeedTelemetry;
  mirror: PredictionMirror;
  clock?: () => number;
}

const errorBody = (error: string, message?: string): NextStopErrorResponse =>
  message ? { error, message } : { error };

const serializeOutcome = (outcome: RefreshOutcome) =>
  outcome.status === "failed" ? { status: outcome.status, message: outcome.error.message } : outcome;

/** 4xx statuses set by middleware such as the JSON body parser. */
const clientErrorStatus = (error: unknown): number | null => {
  if (typeof error !== "object" || error === null || !("status" in error)) return null;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
};

/** Anything that escapes a handler, body parsing included, still answers JSON. */
const handleUnexpectedError: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  const clientStatus = clientErrorStatus(error);
  if (clientStatus !== null) {
    res.status(clientStatus).json(errorBody("bad_request", "Unable to read request"));
    return;
  }
  logger.error("Unhandled request error", { path: req.path, message: String(error) });
  res.status(500).json(errorBody("internal_error", "Unable to handle request"));
};

export const createApp = (deps: AppDependencies) => {
  const app = express();
  const clock = deps.clock ?? Date.now;
  const presentOptions = { timeZone: deps.timeZone };

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    const mirrorStatus = deps.mirror.status;
    const mirrorError = deps.mirror.error ? deps.mirror.error.message : null;
    const body: HealthResponse = {
      status: "ok",
      timestamp: new Date(clock()).toISOString(),
      store: deps.store.getHealth(),
      feedTelemetry: deps.feedTelemetry(),
      redis: {
        status: mirrorStatus,
        error: mirrorError,
        healthy: mirrorStatus === "ready" && !mirrorError,
      },
    };
    res.json(body);
  });

  app.get("/api/departures", (_req, res) => {
    try {
      const now = clock();
      const body: DeparturesResponse = {
        generatedAt: new Date(now).toISOString(),
        departures: deps.departures.map((departure) =>
          presentDeparture(departure, deps.store.get(departure.route, departure.stopId), now, presentOptions),
        ),
      };
      return res.json(body);
    } catch (error) {
      logger.error("Failed to present departures", { message: String(error) });
      return res.status(500).json(errorBody("internal_error", "Unable to present departures"));
    }
  });

  app.get("/api/departures/:index", (req, res) => {
    const index = Number(req.params.index);
    const departure = Number.isInteger(index) ? deps.departures[index] : undefined;
    if (!departure) {
      return res.status(404).json(errorBody("not_found", "No departure configured at that index"));
    }
    try {
      const now = clock();
      const body: DepartureResponse = {
        generatedAt: new Date(now).toISOString(),
        departure: presentDeparture(departure, deps.store.get(departure.route, departure.stopId), now, presentOptions),
      };
      return res.json(body);
    } catch (error) {
      logger.error("Failed to present departure", { index, message: String(error) });
      return res.status(500).json(errorBody("internal_error", "Unable to present departure"));
    }
  });

  app.get("/api/routes/:routeId/stops/:stopId", (req, res) => {
    const { routeId, stopId } = req.params;
    try {
      const now = clock();
      const body: StopPredictionResponse = {
        generatedAt: new Date(now).toISOString(),
        prediction: presentArrivals(routeId, stopId, deps.store.get(routeId, stopId), now, presentOptions),
      };
      return res.json(body);
    } catch (error) {
      logger.error("Failed to present stop prediction", { routeId, stopId, message: String(error) });
      return res.status(500).json(errorBody("internal_error", "Unable to present stop prediction"));
    }
  });

  app.get("/api/raw/predictions", (_req, res) => {
    const refreshedAt = deps.store.getLastSuccessAt();
    res.json({
      routes: serializeTable(deps.store.snapshot()),
      refreshedAt: refreshedAt !== null ? new Date(refreshedAt).toISOString() : null,
    });
  });

  if (deps.enableDiagnostics) {
    app.post("/api/dev/refresh", async (_req, res) => {
      try {
        const outcome = await deps.store.refresh(deps.sources);
        return res.json(serializeOutcome(outcome));
      } catch (error) {
        logger.error("Manual refresh failed", { message: String(error) });
        return res.status(500).json(errorBody("refresh_failed", String(error)));
      }
    });
  }

  app.use(handleUnexpectedError);

  return app;
};
