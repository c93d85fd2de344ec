import type { JsonObject } from "../core/json.js";

export function envSnapshot(engineBin: string): JsonObject {
  return {
    node: process.version,
    platform: process.platform,
    mode: process.env.DATABASE_URL ? "postgres" : "pg-mem",
    engine: engineBin
  };
}
