import fs from "node:fs";
import dotenv from "dotenv";

dotenv.config();

const DEFAULT_PORT = 4000;
const DEFAULT_DEPARTURE_NAME = "Next Bus";
const DEFAULT_MIN_REFRESH_INTERVAL_MS = 60_000;
const DEFAULT_POLL_INTERVAL_MS = 30_000;
const DEFAULT_FEED_REQUEST_TIMEOUT_MS = 15_000;
const DEFAULT_FEED_MAX_RETRIES = 2;
const DEFAULT_FEED_RETRY_BASE_DELAY_MS = 500;
const DEFAULT_FEED_RETRY_MAX_DELAY_MS = 5_000;
const DEFAULT_REDIS_CONNECT_TIMEOUT_MS = 5_000;
export type LogLevel = "debug" | "info" | "warn" | "error";

export type FeedAuth =
  | { kind: "none" }
  | { kind: "authorization"; key: string }
  | { kind: "apikey"; key: string }
  | { kind: "x-api-key"; key: string }
  | { kind: "custom"; headers: Record<string, string> };

export interface DepartureConfig {
  name: string;
  stopId: string;
  route: string;
}

export interface AppConfig {
  port: number;
  logLevel: LogLevel;
  tripUpdateUrl: string | undefined;
  vehiclePositionUrl: string | undefined;
  auth: FeedAuth;
  departures: DepartureConfig[];
  minRefreshIntervalMs: number;
  pollIntervalMs: number;
  feedRequestTimeoutMs: number;
  feedMaxRetries: number;
  feedRetryBaseDelayMs: number;
  feedRetryMaxDelayMs: number;
  displayTimeZone: string;
  redisUrl: string | undefined;
  redisConnectTimeoutMs: number;
  enableDiagnostics: boolean;
  /** Problems found while parsing; logged once the logger is available. */
  warnings: string[];
}

type Env = Record<string, string | undefined>;

const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

const parseNonNegativeInteger = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (Number.isInteger(parsed) && parsed >= 0) return parsed;
  return fallback;
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseHeaderMap = (raw: string, warnings: string[]): Record<string, string> | undefined => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    warnings.push(`FEED_HEADERS is not valid JSON: ${String(error)}`);
    return undefined;
  }
  if (!isRecord(parsed)) {
    warnings.push("FEED_HEADERS must be a JSON object of header names to values");
    return undefined;
  }
  const headers: Record<string, string> = {};
  Object.entries(parsed).forEach(([name, value]) => {
    if (typeof value === "string" || typeof value === "number") {
      headers[name] = String(value);
      return;
    }
    warnings.push(`FEED_HEADERS entry "${name}" ignored: value must be a string`);
  });
  return Object.keys(headers).length > 0 ? headers : undefined;
};

/**
 * Picks the single header style used against the feed provider.
 * Precedence follows `Authorization`, `apikey`, `x-api-key`, then custom headers.
 */
export const resolveFeedAuth = (env: Env, warnings: string[] = []): FeedAuth => {
  const authorization = nonEmpty(env.API_KEY);
  const apikey = nonEmpty(env.APIKEY);
  const xApiKey = nonEmpty(env.X_API_KEY);
  const rawHeaders = nonEmpty(env.FEED_HEADERS);
  const custom = rawHeaders ? parseHeaderMap(rawHeaders, warnings) : undefined;

  const configured = [authorization, apikey, xApiKey, custom].filter((value) => value !== undefined);
  if (configured.length > 1) {
    warnings.push("More than one feed authentication style configured; using the first by precedence");
  }

  if (authorization) return { kind: "authorization", key: authorization };
  if (apikey) return { kind: "apikey", key: apikey };
  if (xApiKey) return { kind: "x-api-key", key: xApiKey };
  if (custom) return { kind: "custom", headers: custom };
  return { kind: "none" };
};

export const authHeaders = (auth: FeedAuth): Record<string, string> => {
  switch (auth.kind) {
    case "authorization":
      return { Authorization: auth.key };
    case "apikey":
      return { apikey: auth.key };
    case "x-api-key":
      return { "x-api-key": auth.key };
    case "custom":
      return { ...auth.headers };
    case "none":
      return {};
  }
};

const readDepartureEntry = (entry: unknown, index: number, warnings: string[]): DepartureConfig | null => {
  if (!isRecord(entry)) {
    warnings.push(`Departure #${index} ignored: expected an object`);
    return null;
  }
  const stopId = typeof entry.stopId === "string" ? entry.stopId.trim() : "";
  const route = typeof entry.route === "string" ? entry.route.trim() : "";
  if (!stopId || !route) {
    warnings.push(`Departure #${index} ignored: stopId and route are required`);
    return null;
  }
  const name = typeof entry.name === "string" && entry.name.trim() ? entry.name.trim() : DEFAULT_DEPARTURE_NAME;
  return { name, stopId, route };
};

export const parseDepartures = (raw: string, source: string, warnings: string[] = []): DepartureConfig[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    warnings.push(`${source} is not valid JSON: ${String(error)}`);
    return [];
  }
  if (!Array.isArray(parsed)) {
    warnings.push(`${source} must be a JSON array of departures`);
    return [];
  }
  return parsed
    .map((entry, index) => readDepartureEntry(entry, index, warnings))
    .filter((entry): entry is DepartureConfig => entry !== null);
};

const loadDepartures = (env: Env, warnings: string[]): DepartureConfig[] => {
  const inline = nonEmpty(env.DEPARTURES);
  if (inline) return parseDepartures(inline, "DEPARTURES", warnings);

  const file = nonEmpty(env.DEPARTURES_FILE);
  if (!file) return [];
  try {
    return parseDepartures(fs.readFileSync(file, "utf-8"), file, warnings);
  } catch (error) {
    warnings.push(`Unable to read DEPARTURES_FILE ${file}: ${String(error)}`);
    return [];
  }
};

const defaultTimeZone = () => Intl.DateTimeFormat().resolvedOptions().timeZone;

export const isValidTimeZone = (timeZone: string) => {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone });
    return true;
  } catch {
    return false;
  }
};

const resolveDisplayTimeZone = (env: Env, warnings: string[]): string => {
  const fallback = defaultTimeZone();
  const explicit = nonEmpty(env.DISPLAY_TIME_ZONE);
  const source = explicit ? "DISPLAY_TIME_ZONE" : "TZ";
  const candidate = explicit ?? nonEmpty(env.TZ);
  if (!candidate) return fallback;
  if (isValidTimeZone(candidate)) return candidate;
  warnings.push(`${source} "${candidate}" is not a known time zone; using ${fallback}`);
  return fallback;
};

export const loadConfig = (env: Env): AppConfig => {
  const warnings: string[] = [];
  return {
    port: parsePositiveNumber(env.PORT, DEFAULT_PORT),
    logLevel: normalizeLogLevel(env.LOG_LEVEL),
    tripUpdateUrl: nonEmpty(env.TRIP_UPDATE_URL),
    vehiclePositionUrl: nonEmpty(env.VEHICLE_POSITION_URL),
    auth: resolveFeedAuth(env, warnings),
    departures: loadDepartures(env, warnings),
    minRefreshIntervalMs: parsePositiveNumber(env.MIN_REFRESH_INTERVAL_MS, DEFAULT_MIN_REFRESH_INTERVAL_MS),
    pollIntervalMs: parsePositiveNumber(env.POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS),
    feedRequestTimeoutMs: parsePositiveNumber(env.FEED_REQUEST_TIMEOUT_MS, DEFAULT_FEED_REQUEST_TIMEOUT_MS),
    feedMaxRetries: parseNonNegativeInteger(env.FEED_MAX_RETRIES, DEFAULT_FEED_MAX_RETRIES),
    feedRetryBaseDelayMs: parsePositiveNumber(env.FEED_RETRY_BASE_DELAY_MS, DEFAULT_FEED_RETRY_BASE_DELAY_MS),
    feedRetryMaxDelayMs: parsePositiveNumber(env.FEED_RETRY_MAX_DELAY_MS, DEFAULT_FEED_RETRY_MAX_DELAY_MS),
    displayTimeZone: resolveDisplayTimeZone(env, warnings),
    redisUrl: nonEmpty(env.REDIS_URL),
    redisConnectTimeoutMs: parsePositiveNumber(env.REDIS_CONNECT_TIMEOUT_MS, DEFAULT_REDIS_CONNECT_TIMEOUT_MS),
    enableDiagnostics: env.ENABLE_DIAGNOSTICS === "true" || env.NODE_ENV !== "production",
    warnings,
  };
};

export const config: AppConfig = loadConfig(process.env);
