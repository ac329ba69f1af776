import type { RequestInitWithSignal } from "./types";
import type {
  DepartureResponse,
  DeparturesResponse,
  StopPredictionResponse,
} from "../models/departures";
import type { HealthResponse } from "../models/health";

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

const buildUrl = (baseUrl: string, path: string) =>
  new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`).toString();

const handleJson = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    throw new Error(`NextStop API request failed (${response.status})`);
  }
  return (await response.json()) as T;
};

export const fetchDepartures = async (
  baseUrl: string,
  init?: RequestInitWithSignal,
): Promise<DeparturesResponse> => {
  const response = await fetch(buildUrl(baseUrl, "/api/departures"), { ...init });
  return handleJson<DeparturesResponse>(response);
};

export const fetchDeparture = async (
  baseUrl: string,
  index: number,
  init?: RequestInitWithSignal,
): Promise<DepartureResponse> => {
  const response = await fetch(buildUrl(baseUrl, `/api/departures/${index}`), { ...init });
  return handleJson<DepartureResponse>(response);
};

export const fetchStopPrediction = async (
  baseUrl: string,
  routeId: string,
  stopId: string,
  init?: RequestInitWithSignal,
): Promise<StopPredictionResponse> => {
  const path = `/api/routes/${encodeURIComponent(routeId)}/stops/${encodeURIComponent(stopId)}`;
  const response = await fetch(buildUrl(baseUrl, path), { ...init });
  return handleJson<StopPredictionResponse>(response);
};

export const fetchHealth = async (
  baseUrl: string,
  init?: RequestInitWithSignal,
): Promise<HealthResponse> => {
  const response = await fetch(buildUrl(baseUrl, "/api/health"), { ...init });
  return handleJson<HealthResponse>(response);
};
