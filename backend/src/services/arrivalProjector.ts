import type { TripUpdateEntity } from "../models/feed";
import {
  createArrival,
  type Arrival,
  type EntityAnomaly,
  type PredictionTable,
  type RouteId,
  type StopId,
  type VehicleId,
  type VehicleIndex,
} from "../models/domain";

export interface ProjectionResult {
  table: PredictionTable;
  anomalies: EntityAnomaly[];
}

const resolveVehicleId = (tripUpdate: TripUpdateEntity, index: VehicleIndex): VehicleId | null => {
  if (tripUpdate.vehicleId) return tripUpdate.vehicleId;
  if (!tripUpdate.tripId) return null;
  return index.tripToVehicle.get(tripUpdate.tripId) ?? null;
};

const byArrivalTime = (a: Arrival, b: Arrival) => a.arrivalTime - b.arrivalTime;

/**
 * Projects trip updates onto a route → stop → arrivals table holding only
 * arrivals strictly after `nowMs`, each stop's list ascending by time.
 */
export const projectArrivals = (
  tripUpdates: readonly TripUpdateEntity[],
  index: VehicleIndex,
  nowMs: number,
): ProjectionResult => {
  const grouped = new Map<RouteId, Map<StopId, Arrival[]>>();
  const anomalies: EntityAnomaly[] = [];

  tripUpdates.forEach((tripUpdate) => {
    const routeId = tripUpdate.routeId;
    const vehicleId = resolveVehicleId(tripUpdate, index);
    const vehicle = vehicleId ? index.snapshot.get(vehicleId) : undefined;

    tripUpdate.stopTimeUpdates.forEach((update, position) => {
      if (update.stopId === null || update.arrivalTime === null) {
        anomalies.push({
          kind: "stop_time_update",
          entityId: tripUpdate.entityId,
          reason: `stop time update #${position} missing ${update.stopId === null ? "stop id" : "arrival time"}`,
        });
        return;
      }

      const arrivalTime = update.arrivalTime * 1000;
      // feeds keep reporting stops the vehicle has already served
      if (arrivalTime <= nowMs) return;

      const stops = grouped.get(routeId) ?? new Map<StopId, Arrival[]>();
      grouped.set(routeId, stops);
      const arrivals = stops.get(update.stopId) ?? [];
      stops.set(update.stopId, arrivals);
      arrivals.push(createArrival(arrivalTime, vehicle?.position ?? null, vehicle?.occupancy ?? null));
    });
  });

  const table = new Map<RouteId, ReadonlyMap<StopId, readonly Arrival[]>>();
  grouped.forEach((stops, routeId) => {
    const sorted = new Map<StopId, readonly Arrival[]>();
    stops.forEach((arrivals, stopId) => {
      // Array#sort is stable, so equal times keep feed order
      sorted.set(stopId, Object.freeze(arrivals.sort(byArrivalTime)));
    });
    table.set(routeId, sorted);
  });

  return { table, anomalies };
};
