import { transit_realtime } from "gtfs-realtime-bindings";
import type { FeedEntities, StopTimeUpdateRecord, TripUpdateEntity, VehicleEntity } from "../models/feed";
import type { Position } from "../models/domain";
import { DecodeError, safeErrorMessage } from "./errors";

type Uint64 = transit_realtime.TripUpdate.IStopTimeEvent["time"];

/**
 * Decoded messages expose defaults through their prototype, so an unset field
 * still reads as `0` or `""`. Only an own property means the wire carried it.
 */
const hasField = (message: object, field: string) => Object.prototype.hasOwnProperty.call(message, field);

const toSeconds = (value: Uint64): number | null => {
  if (value === null || value === undefined) return null;
  return typeof value === "number" ? value : value.toNumber();
};

const optionalString = (message: object, field: string, value: string | null | undefined): string | null => {
  if (!hasField(message, field) || !value) return null;
  return value;
};

const decodeStopTimeUpdate = (update: transit_realtime.TripUpdate.IStopTimeUpdate): StopTimeUpdateRecord => {
  const arrival = update.arrival;
  const arrivalTime = arrival && hasField(arrival, "time") ? toSeconds(arrival.time) : null;
  return {
    stopId: optionalString(update, "stopId", update.stopId),
    arrivalTime,
  };
};

const decodeTripUpdate = (entityId: string, tripUpdate: transit_realtime.ITripUpdate): TripUpdateEntity => {
  const trip = tripUpdate.trip;
  const vehicle = tripUpdate.vehicle;
  return {
    entityId,
    routeId: trip.routeId ?? "",
    tripId: optionalString(trip, "tripId", trip.tripId),
    vehicleId: vehicle ? optionalString(vehicle, "id", vehicle.id) : null,
    stopTimeUpdates: (tripUpdate.stopTimeUpdate ?? []).map(decodeStopTimeUpdate),
  };
};

const decodePosition = (position: transit_realtime.IPosition | null | undefined): Position | null => {
  if (!position) return null;
  return { latitude: position.latitude, longitude: position.longitude };
};

const decodeVehicle = (entityId: string, vehicle: transit_realtime.IVehiclePosition): VehicleEntity => {
  const trip = vehicle.trip;
  const descriptor = vehicle.vehicle;
  return {
    entityId,
    vehicleId: descriptor ? optionalString(descriptor, "id", descriptor.id) : null,
    routeId: trip?.routeId ?? "",
    tripId: trip ? optionalString(trip, "tripId", trip.tripId) : null,
    position: decodePosition(vehicle.position),
    occupancyCode: hasField(vehicle, "occupancyStatus") ? (vehicle.occupancyStatus ?? null) : null,
  };
};

/**
 * Decodes a GTFS-realtime `FeedMessage`. Entities that carry neither a trip
 * update nor a vehicle position are dropped; feed order is kept otherwise.
 */
export const decodeFeed = (bytes: Uint8Array): FeedEntities => {
  let message: transit_realtime.FeedMessage;
  try {
    message = transit_realtime.FeedMessage.decode(bytes);
  } catch (error) {
    throw new DecodeError(`Malformed GTFS-realtime feed: ${safeErrorMessage(error)}`, { cause: error });
  }

  const tripUpdates: TripUpdateEntity[] = [];
  const vehicles: VehicleEntity[] = [];

  message.entity.forEach((entity) => {
    if (entity.tripUpdate) {
      tripUpdates.push(decodeTripUpdate(entity.id, entity.tripUpdate));
    }
    if (entity.vehicle) {
      vehicles.push(decodeVehicle(entity.id, entity.vehicle));
    }
  });

  return {
    headerTimestamp: hasField(message.header, "timestamp") ? toSeconds(message.header.timestamp) : null,
    tripUpdates,
    vehicles,
  };
};
