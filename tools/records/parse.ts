// tools/records/parse.ts
import Papa from "papaparse";
import { z } from "zod";

export type ParseReport<T> = {
    rows: T[];
    errors: { row: number; message: string }[];
    rowCount: number;
    droppedRows: number;
};

/** Parse a CSV document with a header row; rows failing the schema are dropped and reported. */
export function parseCsv<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseReport<T> {
    const result = Papa.parse<Record<string, string>>(text, {
        header: true,
        dynamicTyping: false,
        skipEmptyLines: true,
        transformHeader: (h) => h.trim(),
    });

    const rows: T[] = [];
    const errors: { row: number; message: string }[] = [];
    let droppedRows = 0;

    result.data.forEach((raw, i) => {
        const parsed = schema.safeParse(raw);
        if (parsed.success) {
            rows.push(parsed.data);
        } else {
            droppedRows += 1;
            const msg = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
            errors.push({ row: i + 1, message: msg });
        }
    });

    return { rows, errors, rowCount: result.data.length, droppedRows };
}
