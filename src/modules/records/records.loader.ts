// src/modules/records/records.loader.ts
import fs from "node:fs/promises";
import { ParquetReader } from "@dsnp/parquetjs";
import type { AchievementRecord, RecordsTable } from "../../types/domain";
import { LoadError } from "../../utils/errors";
import { AchievementRecordSchema, RECORD_COLUMNS } from "./records.schema";

const MAX_REPORTED_ISSUES = 5;

/**
 * Read the joined records table once at start-up.
 * Pure I/O + schema validation; no filtering happens here.
 */
export async function loadRecords(filePath: string): Promise<RecordsTable> {
    try {
        await fs.access(filePath, fs.constants.R_OK);
    } catch (err) {
        // structural check: fs errors can be cross-realm
        const missing = typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
        throw new LoadError(
            missing ? "SOURCE_MISSING" : "SOURCE_UNREADABLE",
            filePath,
            missing ? "Records table not found" : "Records table is not readable",
            { cause: err },
        );
    }

    let reader: ParquetReader;
    try {
        reader = await ParquetReader.openFile(filePath);
    } catch (err) {
        throw new LoadError("SOURCE_UNREADABLE", filePath, "Records table is not a readable Parquet file", { cause: err });
    }

    try {
        assertColumns(Object.keys(reader.getSchema().fields), filePath);

        const raw: unknown[] = [];
        const cursor = reader.getCursor();
        for (;;) {
            const row: unknown = await cursor.next();
            if (row === null || row === undefined) break;
            raw.push(row);
        }

        const table = parseRecords(raw, filePath);
        console.log(`[Records] Loaded ${table.length} records from ${filePath}`);
        return table;
    } catch (err) {
        if (err instanceof LoadError) throw err;
        throw new LoadError("SOURCE_UNREADABLE", filePath, "Failed reading records table", { cause: err });
    } finally {
        await reader.close();
    }
}

/** Throws SCHEMA_MISMATCH naming every required column the source lacks. */
export function assertColumns(columns: readonly string[], source: string): void {
    const present = new Set(columns);
    const missing = RECORD_COLUMNS.filter((c) => !present.has(c));
    if (missing.length) {
        throw new LoadError("SCHEMA_MISMATCH", source, `Missing required columns: ${missing.join(", ")}`);
    }
}

/**
 * Validate raw rows into a frozen table.
 * The first failing row aborts the load; its field issues end up in the message.
 */
export function parseRecords(rows: readonly unknown[], source: string): RecordsTable {
    const out: Readonly<AchievementRecord>[] = [];

    rows.forEach((raw, i) => {
        const parsed = AchievementRecordSchema.safeParse(raw);
        if (!parsed.success) {
            const msg = parsed.error.issues
                .slice(0, MAX_REPORTED_ISSUES)
                .map((issue) => `${issue.path.join(".") || "(row)"}: ${issue.message}`)
                .join("; ");
            throw new LoadError("INVALID_ROW", source, `Invalid record at row ${i + 1}: ${msg}`);
        }
        const record: AchievementRecord = parsed.data;
        out.push(Object.freeze(record));
    });

    return Object.freeze(out);
}
