// tools/records/write.ts
import fs from "node:fs/promises";
import { ParquetWriter } from "@dsnp/parquetjs";
import type { AchievementRecord } from "../../src/types/domain";
import { recordsParquetSchema } from "../../src/modules/records/records.schema";

/** Optional columns are written as absent rather than null. */
export function toParquetRow(r: AchievementRecord): Record<string, string | number> {
    const row: Record<string, string | number> = {};
    for (const [key, value] of Object.entries(r)) {
        if (value !== null) row[key] = value;
    }
    return row;
}

/**
 * Rows go to a sibling `.partial` file that replaces `filePath` only once every
 * row is written; on failure the previous table (if any) stays in place.
 */
export async function writeRecordsParquet(filePath: string, records: readonly AchievementRecord[]): Promise<void> {
    const partialPath = `${filePath}.partial`;
    const writer = await ParquetWriter.openFile(recordsParquetSchema(), partialPath);
    let closing = false;
    try {
        for (const r of records) {
            await writer.appendRow(toParquetRow(r));
        }
        closing = true;
        await writer.close();
    } catch (err) {
        if (!closing) {
            await writer.close().catch((closeErr: unknown) => {
                console.error(`[Build] Closing ${partialPath} failed:`, closeErr);
            });
        }
        await fs.rm(partialPath, { force: true });
        throw err;
    }
    await fs.rename(partialPath, filePath);
}
