import {
  PLACEHOLDER,
  type ArrivalView,
  type DeparturePrediction,
  type LatLng,
  type SensorAttributes,
  type StopPrediction,
} from "@nextstop/core";
import type { DepartureConfig } from "../config";
import type { Arrival, RouteId, StopId } from "../models/domain";

export interface PresentOptions {
  timeZone: string;
}

export const SENSOR_ATTRIBUTES = {
  dueIn: "Due in",
  stopId: "Stop ID",
  route: "Route",
  dueAt: "Due at",
  occupancy: "Occupancy",
  latitude: "latitude",
  longitude: "longitude",
  nextUp: "Next bus",
  nextUpDueIn: "Next bus due in",
  nextOccupancy: "Next bus occupancy",
} as const;

const formatters = new Map<string, Intl.DateTimeFormat>();

const clockFormatter = (timeZone: string) => {
  const cached = formatters.get(timeZone);
  if (cached) return cached;
  const formatter = new Intl.DateTimeFormat("en-GB", {
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
    timeZone,
  });
  formatters.set(timeZone, formatter);
  return formatter;
};

export const dueInMinutes = (arrivalTime: number, nowMs: number) => Math.floor((arrivalTime - nowMs) / 60_000);

export const formatClockTime = (arrivalTime: number, timeZone: string) =>
  clockFormatter(timeZone).format(new Date(arrivalTime));

const toView = (arrival: Arrival | undefined, nowMs: number, options: PresentOptions): ArrivalView | null => {
  if (!arrival) return null;
  return {
    dueInMinutes: dueInMinutes(arrival.arrivalTime, nowMs),
    dueAt: formatClockTime(arrival.arrivalTime, options.timeZone),
    occupancy: arrival.occupancy,
  };
};

const toLatLng = (arrival: Arrival | undefined): LatLng | null =>
  arrival?.position ? { lat: arrival.position.latitude, lng: arrival.position.longitude } : null;

export const presentArrivals = (
  routeId: RouteId,
  stopId: StopId,
  arrivals: readonly Arrival[],
  nowMs: number,
  options: PresentOptions,
): StopPrediction => {
  const next = toView(arrivals[0], nowMs, options);
  return {
    routeId,
    stopId,
    state: next ? next.dueInMinutes : PLACEHOLDER,
    next,
    following: toView(arrivals[1], nowMs, options),
    position: toLatLng(arrivals[0]),
    arrivalCount: arrivals.length,
  };
};

/** The labelled attribute set a departure sensor exposes. */
export const buildSensorAttributes = (prediction: StopPrediction): SensorAttributes => {
  const attributes: SensorAttributes = {
    [SENSOR_ATTRIBUTES.dueIn]: prediction.state,
    [SENSOR_ATTRIBUTES.stopId]: prediction.stopId,
    [SENSOR_ATTRIBUTES.route]: prediction.routeId,
  };
  if (prediction.next) {
    attributes[SENSOR_ATTRIBUTES.dueAt] = prediction.next.dueAt;
    attributes[SENSOR_ATTRIBUTES.occupancy] = prediction.next.occupancy ?? PLACEHOLDER;
    if (prediction.position) {
      attributes[SENSOR_ATTRIBUTES.latitude] = prediction.position.lat;
      attributes[SENSOR_ATTRIBUTES.longitude] = prediction.position.lng;
    }
  }
  if (prediction.following) {
    attributes[SENSOR_ATTRIBUTES.nextUp] = prediction.following.dueAt;
    attributes[SENSOR_ATTRIBUTES.nextUpDueIn] = prediction.following.dueInMinutes;
    attributes[SENSOR_ATTRIBUTES.nextOccupancy] = prediction.following.occupancy ?? PLACEHOLDER;
  }
  return attributes;
};

export const presentDeparture = (
  departure: DepartureConfig,
  arrivals: readonly Arrival[],
  nowMs: number,
  options: PresentOptions,
): DeparturePrediction => {
  const prediction = presentArrivals(departure.route, departure.stopId, arrivals, nowMs, options);
  return {
    ...prediction,
    name: departure.name,
    attributes: buildSensorAttributes(prediction),
  };
};
