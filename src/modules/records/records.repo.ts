// src/modules/records/records.repo.ts
import type { RecordsTable } from "../../types/domain";
import { distinctAchievementTypes, distinctCountries } from "../rankings/rankings.pipeline";

/**
 * Holds the loaded records table for the process lifetime.
 * The table never changes after load, so the distinct lists are computed
 * once on first use and kept (no TTL).
 */
export class RecordsRepo {
    private readonly table: RecordsTable;
    private countries: readonly string[] | null = null;
    private achievementTypes: readonly string[] | null = null;

    constructor(table: RecordsTable) {
        this.table = table;
    }

    all(): RecordsTable {
        return this.table;
    }

    size(): number {
        return this.table.length;
    }

    getCountries(): readonly string[] {
        if (!this.countries) this.countries = Object.freeze(distinctCountries(this.table));
        return this.countries;
    }

    getAchievementTypes(): readonly string[] {
        if (!this.achievementTypes) this.achievementTypes = Object.freeze(distinctAchievementTypes(this.table));
        return this.achievementTypes;
    }
}
