// src/modules/rankings/rankings.types.ts

import type { DisplayColumn, DisplayRow } from "../../types/domain";

/** Query accepted by the render trigger. Absent or empty filters mean "no constraint". */
export interface RankingsRequestDto {
    country?: string | null;
    achievement_type?: string | null;
    /** Row cap; clamped to the configured max page size. */
    limit?: number | null;
}

export interface RankingsTableDto {
    rows: DisplayRow[];
    /** Rows matched before the cap was applied (0 when the sentinel row is returned). */
    total: number;
    truncated: boolean;
}

export interface FilterOptionsDto {
    countries: readonly string[];
    achievement_types: readonly string[];
    default_achievement_type: string;
}

export type ColumnPresentation = "text" | "markdown";

export interface ColumnDto {
    id: DisplayColumn;
    name: string;
    presentation: ColumnPresentation;
    sortable: boolean;
}

/**
 * Conditional cell tone, applied by the table widget.
 * `op` compares the cell value against `value`.
 */
export interface CellRuleDto {
    column: DisplayColumn;
    op: ">" | "<=";
    value: number;
    tone: "success" | "danger";
}

export interface TableLayoutDto {
    columns: ColumnDto[];
    page_size: number;
    link_target: "_blank";
    default_achievement_type: string;
    striped: boolean;
    cell_rules: CellRuleDto[];
}

export interface RankingsServiceOptions {
    maxPageSize: number;
    defaultAchievementType: string;
}
