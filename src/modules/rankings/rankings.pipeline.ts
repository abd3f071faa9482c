// src/modules/rankings/rankings.pipeline.ts
import type {
    AchievementRecord,
    DisplayRow,
    RecordsTable,
    TierLabel,
} from "../../types/domain";

/**
 * Filter → sort → format pipeline behind the rankings table.
 * Every call starts from the full table and builds fresh row objects;
 * the table itself is only ever read.
 */

export const TIER_LABELS: Readonly<Record<number, TierLabel>> = {
    0: "Novice",
    1: "Contributor",
    2: "Expert",
    3: "Master",
    4: "Grandmaster",
};

export const PROFILE_LINK_LABEL = "View Profile";

/** Emitted instead of an empty result so the table never has to special-case it. */
export const SENTINEL_ROW: Readonly<DisplayRow> = Object.freeze({
    "No.": "N/A",
    DisplayName: "No Data",
    CurrentRanking: "N/A",
    HighestRanking: "N/A",
    Country: "N/A",
    Tier: "N/A",
    Medals: "N/A",
    Profile: "N/A",
});

type Rec = Readonly<AchievementRecord>;

/** Empty string counts as "no constraint", same as undefined. */
function isActive(v: string | null | undefined): v is string {
    return typeof v === "string" && v !== "";
}

export function filterRecords(
    table: RecordsTable,
    selectedCountry?: string | null,
    selectedAchievementType?: string | null,
): Rec[] {
    const byCountry = isActive(selectedCountry);
    const byType = isActive(selectedAchievementType);
    return table.filter(
        (r) =>
            (!byCountry || r.Country === selectedCountry) &&
            (!byType || r.AchievementType === selectedAchievementType),
    );
}

/** Ascending by CurrentRanking; ties keep their input order (Array#sort is stable). */
export function sortByCurrentRanking(rows: readonly Rec[]): Rec[] {
    return [...rows].sort((a, b) => a.CurrentRanking - b.CurrentRanking);
}

const medalCount = (n: number | null | undefined) =>
    n == null || !Number.isFinite(n) ? 0 : Math.trunc(n);

export function formatMedals(r: Pick<AchievementRecord, "TotalGold" | "TotalSilver" | "TotalBronze">): string {
    return `🏅 ${medalCount(r.TotalGold)} 🥈 ${medalCount(r.TotalSilver)} 🥉 ${medalCount(r.TotalBronze)}`;
}

/** Markdown link for the table's markdown column. */
export function formatProfile(profile: string | null | undefined): string {
    return profile ? `[${PROFILE_LINK_LABEL}](${profile})` : "N/A";
}

export function tierLabel(tier: number): TierLabel | number {
    return TIER_LABELS[tier] ?? tier;
}

export function toDisplayRow(r: Rec, position: number): DisplayRow {
    return {
        "No.": position,
        DisplayName: r.DisplayName,
        CurrentRanking: r.CurrentRanking,
        HighestRanking: r.HighestRanking,
        Country: r.Country,
        Tier: tierLabel(r.Tier),
        Medals: formatMedals(r),
        Profile: formatProfile(r.Profile),
    };
}

export function render(
    table: RecordsTable,
    selectedCountry?: string | null,
    selectedAchievementType?: string | null,
): DisplayRow[] {
    const filtered = filterRecords(table, selectedCountry, selectedAchievementType);
    if (filtered.length === 0) return [{ ...SENTINEL_ROW }];

    return sortByCurrentRanking(filtered).map((r, i) => toDisplayRow(r, i + 1));
}

function distinctSorted(values: Iterable<string | null>): string[] {
    const set = new Set<string>();
    for (const v of values) {
        if (v) set.add(v);
    }
    return Array.from(set).sort();
}

export function distinctCountries(table: RecordsTable): string[] {
    return distinctSorted(table.map((r) => r.Country));
}

export function distinctAchievementTypes(table: RecordsTable): string[] {
    return distinctSorted(table.map((r) => r.AchievementType));
}
