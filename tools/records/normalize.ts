// tools/records/normalize.ts
import type { AchievementRecord } from "../../src/types/domain";
import type { AchievementCsv, UserCsv } from "./schemas";

export const DEFAULT_PROFILE_BASE = "https://www.kaggle.com/";

type RankedAchievement = AchievementCsv & { CurrentRanking: number; HighestRanking: number };

/** Achievement rows without both rankings never reach the records table. */
export function dropUnranked(rows: AchievementCsv[]): RankedAchievement[] {
    const out: RankedAchievement[] = [];
    for (const r of rows) {
        if (r.CurrentRanking === null || r.HighestRanking === null) continue;
        out.push({ ...r, CurrentRanking: r.CurrentRanking, HighestRanking: r.HighestRanking });
    }
    return out;
}

/**
 * Inner join users ⋈ achievements on Id == UserId.
 * Output follows user order, then achievement order within a user.
 */
export function mergeRecords(
    users: UserCsv[],
    achievements: AchievementCsv[],
    profileBase = DEFAULT_PROFILE_BASE,
): AchievementRecord[] {
    const byUser = new Map<number, RankedAchievement[]>();
    for (const a of dropUnranked(achievements)) {
        const list = byUser.get(a.UserId);
        if (list) list.push(a);
        else byUser.set(a.UserId, [a]);
    }

    const merged: AchievementRecord[] = [];
    for (const u of users) {
        for (const a of byUser.get(u.Id) ?? []) {
            merged.push({
                Id: u.Id,
                UserName: u.UserName,
                DisplayName: u.DisplayName,
                PerformanceTier: u.PerformanceTier,
                Country: u.Country,
                UserId: a.UserId,
                AchievementType: a.AchievementType,
                Tier: a.Tier,
                CurrentRanking: a.CurrentRanking,
                HighestRanking: a.HighestRanking,
                TotalGold: a.TotalGold ?? 0,
                TotalSilver: a.TotalSilver ?? 0,
                TotalBronze: a.TotalBronze ?? 0,
                Profile: profileBase + u.UserName,
            });
        }
    }
    return merged;
}
