import type { IsoTimestamp } from "./common";

export interface StoreHealth {
  lastAttemptAt: IsoTimestamp | null;
  lastSuccessAt: IsoTimestamp | null;
  lastError: string | null;
  tableAgeMs: number | null;
  isStale: boolean;
  routeCount: number;
}

export interface FeedTelemetry {
  totalRequests: number;
  retryableResponses: number;
  failedRequests: number;
  lastSuccessAt: IsoTimestamp | null;
  lastSuccessUrl: string | null;
  lastFailureAt: IsoTimestamp | null;
  lastFailureUrl: string | null;
  lastFailureMessage: string | null;
}

export interface HealthResponse {
  status: "ok";
  timestamp: IsoTimestamp;
  store: StoreHealth;
  feedTelemetry: FeedTelemetry;
  redis: {
    status: string;
    error: string | null;
    healthy: boolean;
  };
}
