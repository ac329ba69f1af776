import type { OccupancyStatus } from "@nextstop/core";

export type RouteId = string;
export type StopId = string;
export type TripId = string;
export type VehicleId = string;

export interface Position {
  latitude: number;
  longitude: number;
}

/** Occupancy names indexed by their GTFS-realtime integer code. */
export const OCCUPANCY_STATUSES = [
  "EMPTY",
  "MANY_SEATS_AVAILABLE",
  "FEW_SEATS_AVAILABLE",
  "STANDING_ROOM_ONLY",
  "CRUSHED_STANDING_ROOM_ONLY",
  "FULL",
  "NOT_ACCEPTING_PASSENGERS",
  "NO_DATA_AVAILABLE",
  "NOT_BOARDABLE",
] as const satisfies readonly OccupancyStatus[];

export type OccupancyLookup = { ok: true; status: OccupancyStatus } | { ok: false; code: number };

export const occupancyFromCode = (code: number): OccupancyLookup => {
  const status = Number.isInteger(code) ? OCCUPANCY_STATUSES[code] : undefined;
  return status ? { ok: true, status } : { ok: false, code };
};

export interface Arrival {
  /** Epoch milliseconds. */
  readonly arrivalTime: number;
  readonly position: Readonly<Position> | null;
  readonly occupancy: OccupancyStatus | null;
}

export const createArrival = (
  arrivalTime: number,
  position: Position | null,
  occupancy: OccupancyStatus | null,
): Arrival =>
  Object.freeze({
    arrivalTime,
    position: position ? Object.freeze({ ...position }) : null,
    occupancy,
  });

export interface VehicleState {
  position: Position | null;
  occupancy: OccupancyStatus | null;
}

export type VehicleSnapshot = ReadonlyMap<VehicleId, VehicleState>;
export type TripToVehicle = ReadonlyMap<TripId, VehicleId>;

export interface VehicleIndex {
  snapshot: VehicleSnapshot;
  tripToVehicle: TripToVehicle;
}

export type StopArrivals = ReadonlyMap<StopId, readonly Arrival[]>;
export type PredictionTable = ReadonlyMap<RouteId, StopArrivals>;

export const EMPTY_VEHICLE_INDEX: VehicleIndex = {
  snapshot: new Map(),
  tripToVehicle: new Map(),
};

export const EMPTY_TABLE: PredictionTable = new Map();

export type EntityAnomalyKind = "vehicle" | "trip_update" | "stop_time_update";

/** A single entity the projection skipped. Never thrown. */
export interface EntityAnomaly {
  kind: EntityAnomalyKind;
  entityId: string;
  reason: string;
}

export const isOccupancyStatus = (value: unknown): value is OccupancyStatus =>
  OCCUPANCY_STATUSES.some((status) => status === value);
