import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { authHeaders, isValidTimeZone, loadConfig, parseDepartures, resolveFeedAuth } from "../config";

test("resolveFeedAuth applies Authorization, apikey, x-api-key, custom precedence", () => {
  const warnings: string[] = [];
  const auth = resolveFeedAuth({ APIKEY: "test-apikey", X_API_KEY: "test-x" }, warnings);

  assert.deepEqual(auth, { kind: "apikey", key: "test-apikey" });
  assert.deepEqual(authHeaders(auth), { apikey: "test-apikey" });
  assert.equal(warnings.length, 1);

  assert.deepEqual(authHeaders(resolveFeedAuth({ API_KEY: "test-secret" })), { Authorization: "test-secret" });
  assert.deepEqual(authHeaders(resolveFeedAuth({ X_API_KEY: "test-x" })), { "x-api-key": "test-x" });
  assert.deepEqual(authHeaders(resolveFeedAuth({})), {});
});

test("resolveFeedAuth accepts a custom header map", () => {
  const warnings: string[] = [];
  const auth = resolveFeedAuth({ FEED_HEADERS: '{"Ocp-Apim-Subscription-Key":"test-secret","bad":{}}' }, warnings);

  assert.deepEqual(authHeaders(auth), { "Ocp-Apim-Subscription-Key": "test-secret" });
  assert.deepEqual(warnings, ['FEED_HEADERS entry "bad" ignored: value must be a string']);
});

test("parseDepartures defaults the name and drops incomplete entries", () => {
  const warnings: string[] = [];
  const departures = parseDepartures(
    JSON.stringify([
      { stopId: "S1", route: "R1" },
      { name: "School run", stopId: "S2", route: "R2" },
      { name: "No route", stopId: "S3" },
      "oops",
    ]),
    "DEPARTURES",
    warnings,
  );

  assert.deepEqual(departures, [
    { name: "Next Bus", stopId: "S1", route: "R1" },
    { name: "School run", stopId: "S2", route: "R2" },
  ]);
  assert.deepEqual(warnings, [
    "Departure #2 ignored: stopId and route are required",
    "Departure #3 ignored: expected an object",
  ]);
});

test("parseDepartures rejects input that is not an array", () => {
  const warnings: string[] = [];

  assert.deepEqual(parseDepartures('{"stopId":"S1"}', "DEPARTURES", warnings), []);
  assert.deepEqual(warnings, ["DEPARTURES must be a JSON array of departures"]);
});

test("loadConfig falls back to defaults for missing or malformed values", () => {
  const loaded = loadConfig({
    TRIP_UPDATE_URL: " https://feeds.test/trips ",
    MIN_REFRESH_INTERVAL_MS: "soon",
    FEED_MAX_RETRIES: "0",
    DISPLAY_TIME_ZONE: "UTC",
    LOG_LEVEL: "WARN",
    NODE_ENV: "production",
  });

  assert.equal(loaded.tripUpdateUrl, "https://feeds.test/trips");
  assert.equal(loaded.vehiclePositionUrl, undefined);
  assert.equal(loaded.minRefreshIntervalMs, 60_000);
  assert.equal(loaded.pollIntervalMs, 30_000);
  assert.equal(loaded.feedMaxRetries, 0);
  assert.equal(loaded.displayTimeZone, "UTC");
  assert.equal(loaded.logLevel, "warn");
  assert.equal(loaded.enableDiagnostics, false);
  assert.deepEqual(loaded.auth, { kind: "none" });
  assert.deepEqual(loaded.departures, []);
  assert.deepEqual(loaded.warnings, []);
});

test("loadConfig falls back to the default port when PORT is not a number", () => {
  assert.equal(loadConfig({ PORT: "eighty" }).port, 4000);
  assert.equal(loadConfig({ PORT: "-1" }).port, 4000);
  assert.equal(loadConfig({ PORT: "8080" }).port, 8080);
});

test("loadConfig replaces an unknown display time zone with the system zone", () => {
  const systemZone = Intl.DateTimeFormat().resolvedOptions().timeZone;

  const loaded = loadConfig({ DISPLAY_TIME_ZONE: "Mars/Olympus" });

  assert.equal(loaded.displayTimeZone, systemZone);
  assert.deepEqual(loaded.warnings, [`DISPLAY_TIME_ZONE "Mars/Olympus" is not a known time zone; using ${systemZone}`]);
  assert.equal(loadConfig({ TZ: "Europe/Dublin" }).displayTimeZone, "Europe/Dublin");
  assert.deepEqual(loadConfig({ TZ: "Nowhere/Else" }).warnings, [
    `TZ "Nowhere/Else" is not a known time zone; using ${systemZone}`,
  ]);
  assert.equal(isValidTimeZone("Asia/Tokyo"), true);
  assert.equal(isValidTimeZone("Mars/Olympus"), false);
});

test("loadConfig reads departures from DEPARTURES_FILE", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "nextstop-config-"));
  const file = path.join(dir, "departures.json");
  fs.writeFileSync(file, JSON.stringify([{ name: "Quay", stopId: "S7", route: "R7" }]), "utf-8");

  try {
    const loaded = loadConfig({ DEPARTURES_FILE: file });
    assert.deepEqual(loaded.departures, [{ name: "Quay", stopId: "S7", route: "R7" }]);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("loadConfig records an unreadable departures file as a warning", () => {
  const loaded = loadConfig({ DEPARTURES_FILE: path.join(os.tmpdir(), "nextstop-missing", "departures.json") });

  assert.deepEqual(loaded.departures, []);
  assert.equal(loaded.warnings.length, 1);
  assert.ok(loaded.warnings[0]?.startsWith("Unable to read DEPARTURES_FILE"));
});
