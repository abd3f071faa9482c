// src/modules/rankings/rankings.service.ts

import { DISPLAY_COLUMNS } from "../../types/domain";
import type { DisplayColumn } from "../../types/domain";
import { RecordsRepo } from "../records/records.repo";
import { render, SENTINEL_ROW } from "./rankings.pipeline";
import type {
    CellRuleDto,
    ColumnDto,
    FilterOptionsDto,
    RankingsRequestDto,
    RankingsServiceOptions,
    RankingsTableDto,
    TableLayoutDto,
} from "./rankings.types";

const MARKDOWN_COLUMNS: ReadonlySet<DisplayColumn> = new Set<DisplayColumn>(["Medals", "Profile"]);

const CELL_RULES: readonly CellRuleDto[] = [
    { column: "CurrentRanking", op: ">", value: 0, tone: "success" },
    { column: "CurrentRanking", op: "<=", value: 0, tone: "danger" },
];

/**
 * Composes the records repo and the render pipeline for the HTTP layer.
 * No I/O, no HTTP — the loaded table is injected through the repo.
 */
export class RankingsService {
    private readonly repo: RecordsRepo;
    private readonly options: RankingsServiceOptions;

    constructor(repo: RecordsRepo, options: RankingsServiceOptions) {
        this.repo = repo;
        this.options = options;
    }

    renderTable(request: RankingsRequestDto = {}): RankingsTableDto {
        const rows = render(this.repo.all(), request.country, request.achievement_type);

        if (rows.length === 1 && rows[0]["No."] === SENTINEL_ROW["No."]) {
            return { rows, total: 0, truncated: false };
        }

        const limit = this.clampLimit(request.limit);
        return {
            rows: rows.length > limit ? rows.slice(0, limit) : rows,
            total: rows.length,
            truncated: rows.length > limit,
        };
    }

    filterOptions(): FilterOptionsDto {
        return {
            countries: this.repo.getCountries(),
            achievement_types: this.repo.getAchievementTypes(),
            default_achievement_type: this.options.defaultAchievementType,
        };
    }

    layout(): TableLayoutDto {
        const columns: ColumnDto[] = DISPLAY_COLUMNS.map((id): ColumnDto => ({
            id,
            name: id,
            presentation: MARKDOWN_COLUMNS.has(id) ? "markdown" : "text",
            sortable: true,
        }));

        return {
            columns,
            page_size: this.options.maxPageSize,
            link_target: "_blank",
            default_achievement_type: this.options.defaultAchievementType,
            striped: true,
            cell_rules: CELL_RULES.map((r) => ({ ...r })),
        };
    }

    private clampLimit(limit: number | null | undefined): number {
        const max = this.options.maxPageSize;
        if (limit == null || !Number.isFinite(limit) || limit <= 0) return max;
        return Math.min(Math.floor(limit), max);
    }
}
