import { transit_realtime } from "gtfs-realtime-bindings";

/** 2026-01-15T08:00:00Z */
export const NOW_SEC = 1_768_464_000;
export const NOW_MS = NOW_SEC * 1000;

interface StopFixture {
  stopId?: string;
  time?: number;
}

interface TripUpdateFixture {
  routeId?: string;
  tripId?: string;
  vehicleId?: string;
  stops?: StopFixture[];
}

interface VehicleFixture {
  vehicleId?: string;
  routeId?: string;
  tripId?: string;
  position?: { latitude: number; longitude: number };
  occupancy?: number;
}

export const tripUpdateEntity = (id: string, fixture: TripUpdateFixture): transit_realtime.IFeedEntity => ({
  id,
  tripUpdate: {
    trip: { routeId: fixture.routeId, tripId: fixture.tripId },
    vehicle: fixture.vehicleId !== undefined ? { id: fixture.vehicleId } : undefined,
    stopTimeUpdate: (fixture.stops ?? []).map((stop) => ({
      stopId: stop.stopId,
      arrival: stop.time !== undefined ? { time: stop.time } : undefined,
    })),
  },
});

export const vehicleEntity = (id: string, fixture: VehicleFixture): transit_realtime.IFeedEntity => ({
  id,
  vehicle: {
    trip: fixture.routeId !== undefined || fixture.tripId !== undefined
      ? { routeId: fixture.routeId, tripId: fixture.tripId }
      : undefined,
    vehicle: fixture.vehicleId !== undefined ? { id: fixture.vehicleId } : undefined,
    position: fixture.position,
    occupancyStatus: fixture.occupancy,
  },
});

export const encodeFeed = (entities: transit_realtime.IFeedEntity[], timestamp?: number): Uint8Array =>
  transit_realtime.FeedMessage.encode({
    header: { gtfsRealtimeVersion: "2.0", timestamp },
    entity: entities,
  }).finish();

export const approxEqual = (actual: number | undefined, expected: number, tolerance = 1e-4) =>
  actual !== undefined && Math.abs(actual - expected) <= tolerance;
