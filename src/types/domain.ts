// src/types/domain.ts
// === Core domain models (1:1 with the records table columns) ===

/** One joined (user, achievement type) row of the loaded records table. */
export interface AchievementRecord {
    Id: number;
    UserName: string;
    DisplayName: string;
    PerformanceTier: number;
    Country: string | null;
    UserId: number;
    AchievementType: string;
    Tier: number;
    CurrentRanking: number;
    HighestRanking: number;
    TotalGold: number | null;
    TotalSilver: number | null;
    TotalBronze: number | null;
    Profile: string | null;
}

/** The whole table, frozen once loaded. */
export type RecordsTable = ReadonlyArray<Readonly<AchievementRecord>>;

export type TierLabel = "Novice" | "Contributor" | "Expert" | "Master" | "Grandmaster";

export type NotAvailable = "N/A";

/**
 * One display-ready table row. Key order is part of the contract:
 * No., DisplayName, CurrentRanking, HighestRanking, Country, Tier, Medals, Profile.
 */
export interface DisplayRow {
    "No.": number | NotAvailable;
    DisplayName: string;
    CurrentRanking: number | NotAvailable;
    HighestRanking: number | NotAvailable;
    Country: string | null;
    // unmapped tier codes pass through as numbers
    Tier: TierLabel | number | NotAvailable;
    Medals: string;
    Profile: string;
}

export type DisplayColumn = keyof DisplayRow;

export const DISPLAY_COLUMNS = [
    "No.",
    "DisplayName",
    "CurrentRanking",
    "HighestRanking",
    "Country",
    "Tier",
    "Medals",
    "Profile",
] as const satisfies readonly DisplayColumn[];
