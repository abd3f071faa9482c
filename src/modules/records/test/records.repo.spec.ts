// src/modules/records/test/records.repo.spec.ts
import type { AchievementRecord } from "../../../types/domain";
import { render } from "../../rankings/rankings.pipeline";
import { RecordsRepo } from "../records.repo";

const base: AchievementRecord = {
    Id: 1,
    UserName: "alice",
    DisplayName: "Alice",
    PerformanceTier: 2,
    Country: "Germany",
    UserId: 1,
    AchievementType: "Notebooks",
    Tier: 2,
    CurrentRanking: 12,
    HighestRanking: 4,
    TotalGold: 1,
    TotalSilver: null,
    TotalBronze: 2,
    Profile: "https://www.kaggle.com/alice",
};

const table = Object.freeze([
    Object.freeze(base),
    Object.freeze({ ...base, Id: 2, UserId: 2, Country: "Chile", AchievementType: "Competitions" }),
    Object.freeze({ ...base, Id: 3, UserId: 3, Country: null }),
]);

describe("RecordsRepo", () => {
    test("exposes the loaded table as-is", () => {
        const repo = new RecordsRepo(table);
        expect(repo.all()).toBe(table);
        expect(repo.size()).toBe(3);
    });

    test("memoizes distinct lists", () => {
        const repo = new RecordsRepo(table);
        const countries = repo.getCountries();
        expect(countries).toEqual(["Chile", "Germany"]);
        expect(repo.getCountries()).toBe(countries);
        expect(repo.getAchievementTypes()).toEqual(["Competitions", "Notebooks"]);
        expect(repo.getAchievementTypes()).toBe(repo.getAchievementTypes());
    });

    test("distinct lists are unchanged after renders", () => {
        const before = new RecordsRepo(table);
        const countries = before.getCountries();

        render(table, "Chile");
        render(table, undefined, "Notebooks");
        render(table, "Atlantis");

        const after = new RecordsRepo(table);
        expect(after.getCountries()).toEqual(countries);
        expect(after.getAchievementTypes()).toEqual(["Competitions", "Notebooks"]);
    });

    test("memoized lists are frozen", () => {
        const repo = new RecordsRepo(table);
        expect(Object.isFrozen(repo.getCountries())).toBe(true);
    });
});
