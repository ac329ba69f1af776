import type { FeedTelemetry } from "@nextstop/core";
import { authHeaders, config, type AppConfig } from "../config";
import { scopedLogger } from "../utils/logger";
import { FetchError, safeErrorMessage } from "./errors";

const logger = scopedLogger("feed");

const RETRYABLE_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface FeedClientOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

/** Zero-argument byte sources handed to the prediction store. */
export interface FeedSources {
  tripUpdates: () => Promise<Uint8Array>;
  vehiclePositions?: () => Promise<Uint8Array>;
}

export class FeedClient {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly retryMaxDelayMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly telemetry: FeedTelemetry = {
    totalRequests: 0,
    retryableResponses: 0,
    failedRequests: 0,
    lastSuccessAt: null,
    lastSuccessUrl: null,
    lastFailureAt: null,
    lastFailureUrl: null,
    lastFailureMessage: null,
  };

  constructor(options: FeedClientOptions = {}) {
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? config.feedRequestTimeoutMs;
    this.maxRetries = options.maxRetries ?? config.feedMaxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? config.feedRetryBaseDelayMs;
    this.retryMaxDelayMs = options.retryMaxDelayMs ?? config.feedRetryMaxDelayMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  getTelemetry(): FeedTelemetry {
    return { ...this.telemetry };
  }

  /** GETs a protobuf feed body. Non-2xx responses are never decoded. */
  async fetchFeed(url: string): Promise<Uint8Array> {
    const response = await this.fetchWithRetry(url);
    return new Uint8Array(await response.arrayBuffer());
  }

  private async fetchWithRetry(url: string): Promise<Response> {
    let attempt = 0;
    let lastError: FetchError | undefined;

    while (attempt <= this.maxRetries) {
      this.telemetry.totalRequests += 1;
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          headers: { Accept: "application/x-protobuf", ...this.headers },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (error) {
        this.telemetry.retryableResponses += 1;
        lastError = new FetchError(url, null, `Feed request failed for ${url}: ${safeErrorMessage(error)}`);
        if (attempt === this.maxRetries) break;
        const waitMs = this.computeBackoff(attempt);
        logger.warn("Feed request failed, retrying", { url, attempt, waitMs, message: safeErrorMessage(error) });
        await this.sleep(waitMs);
        attempt += 1;
        continue;
      }

      if (response.ok) {
        this.telemetry.lastSuccessAt = new Date().toISOString();
        this.telemetry.lastSuccessUrl = url;
        return response;
      }

      const body = await response.text().catch(() => "");
      const failure = new FetchError(
        url,
        response.status,
        `Feed request failed (${response.status} ${response.statusText}) for ${url}`,
        body,
      );
      if (!RETRYABLE_STATUSES.has(response.status) || attempt === this.maxRetries) {
        this.recordFailure(failure);
        throw failure;
      }

      this.telemetry.retryableResponses += 1;
      lastError = failure;
      const waitMs = this.computeBackoff(attempt);
      logger.warn("Feed request hit retryable status, backing off", {
        url,
        status: response.status,
        attempt,
        waitMs,
      });
      await this.sleep(waitMs);
      attempt += 1;
    }

    const exhausted = lastError ?? new FetchError(url, null, `Feed request exhausted retries for ${url}`);
    this.recordFailure(exhausted);
    throw exhausted;
  }

  private computeBackoff(attempt: number) {
    const cappedAttempt = Math.min(attempt, 10);
    const delayMs = Math.min(this.retryMaxDelayMs, this.retryBaseDelayMs * 2 ** cappedAttempt);
    const jitter = Math.floor(Math.random() * 0.3 * delayMs);
    return delayMs + jitter;
  }

  private recordFailure(error: FetchError) {
    this.telemetry.failedRequests += 1;
    this.telemetry.lastFailureAt = new Date().toISOString();
    this.telemetry.lastFailureUrl = error.url;
    this.telemetry.lastFailureMessage = error.message;
  }
}

export const createFeedClient = (appConfig: AppConfig = config, fetchImpl?: FetchLike) =>
  new FeedClient({
    headers: authHeaders(appConfig.auth),
    timeoutMs: appConfig.feedRequestTimeoutMs,
    maxRetries: appConfig.feedMaxRetries,
    retryBaseDelayMs: appConfig.feedRetryBaseDelayMs,
    retryMaxDelayMs: appConfig.feedRetryMaxDelayMs,
    fetchImpl,
  });

export const createFeedSources = (client: FeedClient, tripUpdateUrl: string, vehiclePositionUrl?: string): FeedSources => {
  const sources: FeedSources = {
    tripUpdates: () => client.fetchFeed(tripUpdateUrl),
  };
  if (vehiclePositionUrl) {
    sources.vehiclePositions = () => client.fetchFeed(vehiclePositionUrl);
  }
  return sources;
};
