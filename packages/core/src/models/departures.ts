import type { IsoTimestamp, LatLng, OccupancyStatus, Placeholder } from "./common";

export interface ArrivalView {
  /** Whole minutes until arrival, floored. Negative once the arrival has passed. */
  dueInMinutes: number;
  /** 24-hour `HH:MM` in the service's display time zone. */
  dueAt: string;
  occupancy: OccupancyStatus | null;
}

export interface StopPrediction {
  routeId: string;
  stopId: string;
  state: number | Placeholder;
  next: ArrivalView | null;
  following: ArrivalView | null;
  position: LatLng | null;
  arrivalCount: number;
}

export type SensorAttributes = Record<string, string | number>;

export interface DeparturePrediction extends StopPrediction {
  name: string;
  attributes: SensorAttributes;
}

export interface DeparturesResponse {
  generatedAt: IsoTimestamp;
  departures: DeparturePrediction[];
}

export interface DepartureResponse {
  generatedAt: IsoTimestamp;
  departure: DeparturePrediction;
}

export interface StopPredictionResponse {
  generatedAt: IsoTimestamp;
  prediction: StopPrediction;
}
