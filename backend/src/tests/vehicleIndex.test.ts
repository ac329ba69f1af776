import test from "node:test";
import assert from "node:assert/strict";
import { occupancyFromCode } from "../models/domain";
import type { VehicleEntity } from "../models/feed";
import { buildVehicleIndex } from "../services/vehicleIndex";

const makeVehicle = (overrides: Partial<VehicleEntity>): VehicleEntity => ({
  entityId: overrides.vehicleId ?? "entity",
  vehicleId: "V1",
  routeId: "R1",
  tripId: "T1",
  position: { latitude: 53.3, longitude: -6.2 },
  occupancyCode: null,
  ...overrides,
});

test("occupancyFromCode maps the closed set of codes", () => {
  assert.deepEqual(occupancyFromCode(0), { ok: true, status: "EMPTY" });
  assert.deepEqual(occupancyFromCode(3), { ok: true, status: "STANDING_ROOM_ONLY" });
  assert.deepEqual(occupancyFromCode(8), { ok: true, status: "NOT_BOARDABLE" });
  assert.deepEqual(occupancyFromCode(9), { ok: false, code: 9 });
  assert.deepEqual(occupancyFromCode(-1), { ok: false, code: -1 });
});

test("buildVehicleIndex records position, occupancy and the trip link", () => {
  const index = buildVehicleIndex([makeVehicle({ occupancyCode: 3 })]);

  assert.deepEqual(index.snapshot.get("V1"), {
    position: { latitude: 53.3, longitude: -6.2 },
    occupancy: "STANDING_ROOM_ONLY",
  });
  assert.equal(index.tripToVehicle.get("T1"), "V1");
  assert.deepEqual(index.anomalies, []);
});

test("buildVehicleIndex skips vehicles that are not in revenue service", () => {
  const index = buildVehicleIndex([makeVehicle({ routeId: "", tripId: "T9", vehicleId: "V9" })]);

  assert.equal(index.snapshot.size, 0);
  assert.equal(index.tripToVehicle.size, 0);
  assert.deepEqual(index.anomalies, []);
});

test("buildVehicleIndex excludes an entity with an out-of-range occupancy and keeps the rest", () => {
  const index = buildVehicleIndex([
    makeVehicle({ entityId: "bad", vehicleId: "V1", tripId: "T1", occupancyCode: 99 }),
    makeVehicle({ entityId: "good", vehicleId: "V2", tripId: "T2", occupancyCode: 1 }),
  ]);

  assert.equal(index.snapshot.has("V1"), false);
  assert.equal(index.tripToVehicle.has("T1"), false);
  assert.equal(index.snapshot.get("V2")?.occupancy, "MANY_SEATS_AVAILABLE");
  assert.deepEqual(index.anomalies, [
    { kind: "vehicle", entityId: "bad", reason: "occupancy code 99 out of range" },
  ]);
});

test("buildVehicleIndex reports vehicles without an id", () => {
  const index = buildVehicleIndex([makeVehicle({ entityId: "anon", vehicleId: null })]);

  assert.equal(index.snapshot.size, 0);
  assert.deepEqual(index.anomalies, [{ kind: "vehicle", entityId: "anon", reason: "missing vehicle id" }]);
});

test("buildVehicleIndex keeps vehicles without a trip id out of the trip link", () => {
  const index = buildVehicleIndex([makeVehicle({ tripId: null })]);

  assert.equal(index.snapshot.get("V1")?.occupancy, null);
  assert.equal(index.tripToVehicle.size, 0);
});
