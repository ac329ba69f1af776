import type { VehicleEntity } from "../models/feed";
import {
  occupancyFromCode,
  type EntityAnomaly,
  type TripId,
  type VehicleId,
  type VehicleIndex,
  type VehicleState,
} from "../models/domain";

export interface VehicleIndexResult extends VehicleIndex {
  anomalies: EntityAnomaly[];
}

/**
 * Indexes vehicles in revenue service by id and links their trips back to them.
 * A bad entity is reported and skipped; the rest of the batch still counts.
 */
export const buildVehicleIndex = (vehicles: readonly VehicleEntity[]): VehicleIndexResult => {
  const snapshot = new Map<VehicleId, VehicleState>();
  const tripToVehicle = new Map<TripId, VehicleId>();
  const anomalies: EntityAnomaly[] = [];

  vehicles.forEach((vehicle) => {
    if (!vehicle.routeId) return;

    if (!vehicle.vehicleId) {
      anomalies.push({ kind: "vehicle", entityId: vehicle.entityId, reason: "missing vehicle id" });
      return;
    }

    let occupancy: VehicleState["occupancy"] = null;
    if (vehicle.occupancyCode !== null) {
      const lookup = occupancyFromCode(vehicle.occupancyCode);
      if (!lookup.ok) {
        anomalies.push({
          kind: "vehicle",
          entityId: vehicle.entityId,
          reason: `occupancy code ${lookup.code} out of range`,
        });
        return;
      }
      occupancy = lookup.status;
    }

    snapshot.set(vehicle.vehicleId, { position: vehicle.position, occupancy });
    if (vehicle.tripId) {
      tripToVehicle.set(vehicle.tripId, vehicle.vehicleId);
    }
  });

  return { snapshot, tripToVehicle, anomalies };
};
