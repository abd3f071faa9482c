// src/modules/rankings/test/rankings.pipeline.spec.ts
import type { AchievementRecord, RecordsTable } from "../../../types/domain";
import {
    distinctAchievementTypes,
    distinctCountries,
    filterRecords,
    formatMedals,
    formatProfile,
    render,
    SENTINEL_ROW,
    sortByCurrentRanking,
    tierLabel,
} from "../rankings.pipeline";

let nextId = 1;
function rec(over: Partial<AchievementRecord> = {}): AchievementRecord {
    const id = nextId++;
    return {
        Id: id,
        UserName: `user${id}`,
        DisplayName: `User ${id}`,
        PerformanceTier: 1,
        Country: "US",
        UserId: id,
        AchievementType: "Competitions",
        Tier: 1,
        CurrentRanking: 100,
        HighestRanking: 50,
        TotalGold: 0,
        TotalSilver: 0,
        TotalBronze: 0,
        Profile: `https://www.kaggle.com/user${id}`,
        ...over,
    };
}

function freeze(rows: AchievementRecord[]): RecordsTable {
    return Object.freeze(rows.map((r) => Object.freeze(r)));
}

const table = freeze([
    rec({ DisplayName: "Ana", Country: "US", AchievementType: "Competitions", CurrentRanking: 50, Tier: 2 }),
    rec({ DisplayName: "Ben", Country: "US", AchievementType: "Competitions", CurrentRanking: 10, Tier: 4 }),
    rec({ DisplayName: "Cy", Country: "US", AchievementType: "Competitions", CurrentRanking: 30, Tier: 0 }),
    rec({ DisplayName: "Dee", Country: "India", AchievementType: "Competitions", CurrentRanking: 5 }),
    rec({ DisplayName: "Eli", Country: "US", AchievementType: "Datasets", CurrentRanking: 7 }),
    rec({ DisplayName: "Fay", Country: null, AchievementType: "Notebooks", CurrentRanking: 1 }),
]);

describe("render", () => {
    test("sorts a country's rows by CurrentRanking and numbers them from 1", () => {
        const rows = render(table, "US", "Competitions");
        expect(rows.map((r) => r.CurrentRanking)).toEqual([10, 30, 50]);
        expect(rows.map((r) => r["No."])).toEqual([1, 2, 3]);
        expect(rows.map((r) => r.DisplayName)).toEqual(["Ben", "Cy", "Ana"]);
    });

    test("country filter alone keeps every achievement type of that country", () => {
        const rows = render(table, "US");
        expect(rows.map((r) => r.DisplayName)).toEqual(["Eli", "Ben", "Cy", "Ana"]);
        expect(rows.every((r) => r.Country === "US")).toBe(true);
    });

    test("no filters returns the whole table, nulls included", () => {
        const rows = render(table);
        expect(rows).toHaveLength(6);
        expect(rows[0]).toMatchObject({ "No.": 1, DisplayName: "Fay", Country: null });
    });

    test("empty strings mean no constraint", () => {
        expect(render(table, "", "")).toEqual(render(table));
    });

    test("matching is exact: no case folding, no partial match", () => {
        expect(render(table, "us")).toEqual([SENTINEL_ROW]);
        expect(render(table, "U")).toEqual([SENTINEL_ROW]);
        expect(render(table, undefined, "competitions")).toEqual([SENTINEL_ROW]);
    });

    test("no match yields exactly one sentinel row", () => {
        const rows = render(table, "India", "Datasets");
        expect(rows).toEqual([
            {
                "No.": "N/A",
                DisplayName: "No Data",
                CurrentRanking: "N/A",
                HighestRanking: "N/A",
                Country: "N/A",
                Tier: "N/A",
                Medals: "N/A",
                Profile: "N/A",
            },
        ]);
    });

    test("the sentinel row handed out is a copy", () => {
        const [row] = render(table, "Nowhere");
        row.DisplayName = "changed";
        expect(SENTINEL_ROW.DisplayName).toBe("No Data");
        expect(render(table, "Nowhere")[0].DisplayName).toBe("No Data");
    });

    test("projects exactly the eight display fields in order", () => {
        const [row] = render(table, "India");
        expect(Object.keys(row)).toEqual([
            "No.",
            "DisplayName",
            "CurrentRanking",
            "HighestRanking",
            "Country",
            "Tier",
            "Medals",
            "Profile",
        ]);
    });

    test("relabels tiers", () => {
        const rows = render(table, "US", "Competitions");
        expect(rows.map((r) => r.Tier)).toEqual(["Grandmaster", "Novice", "Expert"]);
    });

    test("is idempotent and leaves the table untouched", () => {
        const snapshot = JSON.stringify(table);
        const countries = distinctCountries(table);
        const types = distinctAchievementTypes(table);

        const first = render(table, "US");
        render(table, "India", "Competitions");
        render(table, undefined, "Datasets");
        const second = render(table, "US");

        expect(second).toEqual(first);
        expect(second).not.toBe(first);
        expect(JSON.stringify(table)).toBe(snapshot);
        expect(distinctCountries(table)).toEqual(countries);
        expect(distinctAchievementTypes(table)).toEqual(types);
    });

    test("ties keep input order", () => {
        const tied = freeze([
            rec({ DisplayName: "first", CurrentRanking: 3 }),
            rec({ DisplayName: "second", CurrentRanking: 3 }),
            rec({ DisplayName: "top", CurrentRanking: 1 }),
            rec({ DisplayName: "third", CurrentRanking: 3 }),
        ]);
        expect(render(tied).map((r) => r.DisplayName)).toEqual(["top", "first", "second", "third"]);
    });

    test("adjacent rows are non-decreasing in CurrentRanking", () => {
        const rows = render(table);
        for (let i = 1; i < rows.length; i++) {
            expect(Number(rows[i - 1].CurrentRanking)).toBeLessThanOrEqual(Number(rows[i].CurrentRanking));
        }
    });
});

describe("filterRecords", () => {
    test("returns a new array and keeps record identity", () => {
        const out = filterRecords(table, "India");
        expect(out).toHaveLength(1);
        expect(out[0]).toBe(table[3]);
        expect(out).not.toBe(table);
    });

    test("treats null like absent", () => {
        expect(filterRecords(table, null, null)).toHaveLength(table.length);
    });
});

describe("sortByCurrentRanking", () => {
    test("does not sort the input in place", () => {
        const input = [table[0], table[1], table[2]];
        const sorted = sortByCurrentRanking(input);
        expect(sorted.map((r) => r.CurrentRanking)).toEqual([10, 30, 50]);
        expect(input.map((r) => r.CurrentRanking)).toEqual([50, 10, 30]);
    });
});

describe("formatMedals", () => {
    test("fills missing counts with 0 in gold, silver, bronze order", () => {
        expect(formatMedals({ TotalGold: 3, TotalSilver: 0, TotalBronze: null })).toBe("🏅 3 🥈 0 🥉 0");
    });

    test("all counts present", () => {
        expect(formatMedals({ TotalGold: 1, TotalSilver: 2, TotalBronze: 12 })).toBe("🏅 1 🥈 2 🥉 12");
    });
});

describe("formatProfile", () => {
    test("builds a markdown link", () => {
        expect(formatProfile("https://www.kaggle.com/alice")).toBe("[View Profile](https://www.kaggle.com/alice)");
    });

    test("missing profile is N/A", () => {
        expect(formatProfile(null)).toBe("N/A");
        expect(formatProfile(undefined)).toBe("N/A");
        expect(formatProfile("")).toBe("N/A");
    });
});

describe("tierLabel", () => {
    test("maps 0..4", () => {
        expect([0, 1, 2, 3, 4].map(tierLabel)).toEqual(["Novice", "Contributor", "Expert", "Master", "Grandmaster"]);
    });

    test("passes unknown tiers through", () => {
        expect(tierLabel(9)).toBe(9);
    });

    test("unknown tier survives render", () => {
        const [row] = render(freeze([rec({ Tier: 9 })]));
        expect(row.Tier).toBe(9);
    });
});

describe("distinct enumerators", () => {
    test("countries are sorted, unique and skip nulls", () => {
        expect(distinctCountries(table)).toEqual(["India", "US"]);
    });

    test("achievement types are sorted and unique", () => {
        expect(distinctAchievementTypes(table)).toEqual(["Competitions", "Datasets", "Notebooks"]);
    });
});
