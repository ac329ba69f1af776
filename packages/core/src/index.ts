export * from "./models/common";
export * from "./models/departures";
export * from "./models/health";
export * from "./api/types";
export * from "./api/endpoints";
