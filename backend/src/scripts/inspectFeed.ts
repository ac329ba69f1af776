import fs from "node:fs";
import path from "node:path";
import { config } from "../config";
import { createFeedClient } from "../gtfs/client";
import { decodeFeed } from "../gtfs/decoder";
import { EMPTY_VEHICLE_INDEX } from "../models/domain";
import { buildVehicleIndex } from "../services/vehicleIndex";
import { projectArrivals } from "../services/arrivalProjector";
import { presentArrivals } from "../services/presenter";

interface InspectArgs {
  routeIds: string[];
  stopIds: string[];
  limit: number;
}

const splitList = (value: string) =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);

const parseArgs = (argv: string[]): InspectArgs => {
  const args: InspectArgs = { routeIds: [], stopIds: [], limit: 20 };
  argv.forEach((arg) => {
    const [key, rawValue] = arg.replace(/^--/, "").split("=");
    const value = rawValue ?? "";
    switch (key) {
      case "routes":
        args.routeIds.push(...splitList(value));
        break;
      case "stops":
        args.stopIds.push(...splitList(value));
        break;
      case "limit": {
        const parsed = Number(value);
        if (Number.isInteger(parsed) && parsed > 0) args.limit = parsed;
        break;
      }
      default:
        break;
    }
  });
  return args;
};

const main = async () => {
  if (!config.tripUpdateUrl) {
    throw new Error("Set TRIP_UPDATE_URL before inspecting a feed");
  }
  const args = parseArgs(process.argv.slice(2));
  const client = createFeedClient(config);

  const vehicleFeed = config.vehiclePositionUrl ? decodeFeed(await client.fetchFeed(config.vehiclePositionUrl)) : null;
  const vehicleIndex = vehicleFeed ? buildVehicleIndex(vehicleFeed.vehicles) : { ...EMPTY_VEHICLE_INDEX, anomalies: [] };
  const tripFeed = decodeFeed(await client.fetchFeed(config.tripUpdateUrl));
  const now = Date.now();
  const projection = projectArrivals(tripFeed.tripUpdates, vehicleIndex, now);

  const stops = Array.from(projection.table.entries())
    .filter(([routeId]) => args.routeIds.length === 0 || args.routeIds.includes(routeId))
    .flatMap(([routeId, stopMap]) =>
      Array.from(stopMap.entries())
        .filter(([stopId]) => args.stopIds.length === 0 || args.stopIds.includes(stopId))
        .map(([stopId, arrivals]) =>
          presentArrivals(routeId, stopId, arrivals, now, { timeZone: config.displayTimeZone }),
        ),
    )
    .slice(0, args.limit);

  const report = {
    generatedAt: new Date(now).toISOString(),
    tripFeed: {
      headerTimestamp: tripFeed.headerTimestamp,
      tripUpdates: tripFeed.tripUpdates.length,
    },
    vehicleFeed: vehicleFeed
      ? {
          headerTimestamp: vehicleFeed.headerTimestamp,
          vehicles: vehicleFeed.vehicles.length,
          indexedVehicles: vehicleIndex.snapshot.size,
          linkedTrips: vehicleIndex.tripToVehicle.size,
        }
      : null,
    routes: projection.table.size,
    anomalies: [...vehicleIndex.anomalies, ...projection.anomalies],
    stops,
  };

  const samplesDir = path.join(process.cwd(), "samples");
  fs.mkdirSync(samplesDir, { recursive: true });
  const outputPath = path.join(samplesDir, "feed-inspection.json");
  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2), "utf-8");
  console.log(`Feed inspection saved to ${outputPath} (${stops.length} stops, ${report.anomalies.length} anomalies)`);
};

main().catch((error) => {
  console.error("Feed inspection failed", error);
  process.exit(1);
});
