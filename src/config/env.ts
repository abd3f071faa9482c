// src/config/env.ts
import * as dotenv from "dotenv";
dotenv.config();

function req(name: string, fallback?: string) {
  const v = process.env[name] ?? fallback;
  if (v === undefined) throw new Error(`Missing env var: ${name}`);
  return v;
}

function positiveInt(name: string, fallback: string) {
  const n = Number(req(name, fallback));
  if (!Number.isInteger(n) || n <= 0) throw new Error(`Env var ${name} must be a positive integer`);
  return n;
}

export const env = {
  nodeEnv: process.env.NODE_ENV ?? "development",
  port: Number(process.env.PORT ?? 3000),

  /** Joined records table produced by tools/records */
  records: {
    path: req("RECORDS_PATH", "conf/records.parquet"),
  },

  /** Rankings table behaviour */
  rankings: {
    // row cap per render and the page size handed to the table widget
    maxPageSize: positiveInt("MAX_PAGE_SIZE", "250"),
    defaultAchievementType: process.env.DEFAULT_ACHIEVEMENT_TYPE || "Competitions",
  },

  /** Comma-separated CORS origins */
  corsOrigin: (process.env.CORS_ORIGIN ?? "").split(",").filter(Boolean),

  requestLog: process.env.REQUEST_LOG !== "0",
};
