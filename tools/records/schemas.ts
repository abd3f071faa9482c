// tools/records/schemas.ts
import { z } from "zod";

// Helpers
const toStr = z
    .string()
    .transform((s) => s.trim())
    .pipe(z.string().min(1));

const toText = z
    .union([z.string(), z.null(), z.undefined()])
    .transform((v) => (v ?? "").trim());

// Column maxima of the persisted table
const UINT8_MAX = 255;
const UINT16_MAX = 65_535;
const UINT32_MAX = 4_294_967_295;

const toUint = (max: number) =>
    z
        .union([z.number(), z.string()])
        .transform((v) => (typeof v === "number" ? v : Number(String(v).trim())))
        .pipe(z.number().int().nonnegative().max(max));

// Only empty cells are absent; anything else must parse
const toOptUint = (max: number) =>
    z
        .union([z.number(), z.string(), z.null(), z.undefined()])
        .transform((v) => {
            if (v === null || v === undefined) return null;
            const s = String(v).trim();
            return s === "" ? null : Number(s);
        })
        .pipe(z.number().int().nonnegative().max(max).nullable());

const toOptStr = z
    .union([z.string(), z.null(), z.undefined()])
    .transform((v) => {
        if (v === null || v === undefined) return null;
        const s = v.trim();
        return s === "" ? null : s;
    });

/** Users.csv — only the columns the records table keeps. */
export const UserCsvSchema = z.object({
    Id: toUint(UINT32_MAX),
    UserName: toStr,
    DisplayName: toText,
    PerformanceTier: toUint(UINT8_MAX),
    Country: toOptStr,
});

export type UserCsv = z.infer<typeof UserCsvSchema>;

/** UserAchievements.csv — rankings stay optional here; rows lacking one are dropped before the join. */
export const AchievementCsvSchema = z.object({
    UserId: toUint(UINT32_MAX),
    AchievementType: toStr,
    Tier: toUint(UINT8_MAX),
    CurrentRanking: toOptUint(UINT16_MAX),
    HighestRanking: toOptUint(UINT16_MAX),
    TotalGold: toOptUint(UINT16_MAX),
    TotalSilver: toOptUint(UINT16_MAX),
    TotalBronze: toOptUint(UINT16_MAX),
});

export type AchievementCsv = z.infer<typeof AchievementCsvSchema>;
