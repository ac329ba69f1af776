import type { Position, RouteId, StopId, TripId, VehicleId } from "./domain";

export interface StopTimeUpdateRecord {
  stopId: StopId | null;
  /** Epoch seconds, as carried by the feed. */
  arrivalTime: number | null;
}

export interface TripUpdateEntity {
  entityId: string;
  /** Empty when the feed omits it; still a valid grouping key. */
  routeId: RouteId;
  tripId: TripId | null;
  vehicleId: VehicleId | null;
  stopTimeUpdates: StopTimeUpdateRecord[];
}

export interface VehicleEntity {
  entityId: string;
  vehicleId: VehicleId | null;
  /** Empty when the vehicle is not in revenue service. */
  routeId: RouteId;
  tripId: TripId | null;
  position: Position | null;
  occupancyCode: number | null;
}

export interface FeedEntities {
  /** Epoch seconds from the feed header, when present. */
  headerTimestamp: number | null;
  tripUpdates: TripUpdateEntity[];
  vehicles: VehicleEntity[];
}
