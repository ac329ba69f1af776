export interface LatLng {
  lat: number;
  lng: number;
}

export type IsoTimestamp = string;

export type OccupancyStatus =
  | "EMPTY"
  | "MANY_SEATS_AVAILABLE"
  | "FEW_SEATS_AVAILABLE"
  | "STANDING_ROOM_ONLY"
  | "CRUSHED_STANDING_ROOM_ONLY"
  | "FULL"
  | "NOT_ACCEPTING_PASSENGERS"
  | "NO_DATA_AVAILABLE"
  | "NOT_BOARDABLE";

/** Rendered wherever a value is unknown: no arrival, no occupancy report. */
export const PLACEHOLDER = "-";
export type Placeholder = typeof PLACEHOLDER;

export interface NextStopErrorResponse {
  error: string;
  message?: string;
}
