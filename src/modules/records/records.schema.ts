// src/modules/records/records.schema.ts
import { ParquetSchema } from "@dsnp/parquetjs";
import { z } from "zod";

// Parquet hands back 64-bit integer columns as bigint
const toUint = z
    .union([z.number(), z.bigint()])
    .transform((v) => Number(v))
    .pipe(z.number().int().nonnegative());

const toOptUint = z
    .union([z.number(), z.bigint(), z.null(), z.undefined()])
    .transform((v) => (v === null || v === undefined ? null : Number(v)))
    .pipe(z.number().int().nonnegative().nullable());

// Plain BYTE_ARRAY columns (no UTF8 annotation) arrive as Buffers
const toStr = z
    .union([z.string(), z.instanceof(Buffer)])
    .transform((v) => (typeof v === "string" ? v : v.toString("utf8")));

const toOptStr = z
    .union([z.string(), z.instanceof(Buffer), z.null(), z.undefined()])
    .transform((v) => {
        if (v === null || v === undefined) return null;
        return typeof v === "string" ? v : v.toString("utf8");
    });

/** Row validator for the persisted records table. Unknown columns are stripped. */
export const AchievementRecordSchema = z.object({
    Id: toUint,
    UserName: toStr,
    DisplayName: toStr,
    PerformanceTier: toUint,
    Country: toOptStr,
    UserId: toUint,
    AchievementType: toStr,
    Tier: toUint,
    CurrentRanking: toUint,
    HighestRanking: toUint,
    TotalGold: toOptUint,
    TotalSilver: toOptUint,
    TotalBronze: toOptUint,
    Profile: toOptStr,
});

export const RECORD_COLUMNS = AchievementRecordSchema.keyof().options;

/** On-disk layout written by tools/records and read back by the loader. */
export function recordsParquetSchema(): ParquetSchema {
    return new ParquetSchema({
        Id: { type: "UINT_32" },
        UserName: { type: "UTF8" },
        DisplayName: { type: "UTF8" },
        PerformanceTier: { type: "UINT_8" },
        Country: { type: "UTF8", optional: true },
        UserId: { type: "UINT_32" },
        AchievementType: { type: "UTF8" },
        Tier: { type: "UINT_8" },
        CurrentRanking: { type: "UINT_16" },
        HighestRanking: { type: "UINT_16" },
        TotalGold: { type: "UINT_16", optional: true },
        TotalSilver: { type: "UINT_16", optional: true },
        TotalBronze: { type: "UINT_16", optional: true },
        Profile: { type: "UTF8", optional: true },
    });
}
