// tools/records/index.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import { getConfig } from './config';
import { parseCsv } from './parse';
import { AchievementCsvSchema, UserCsvSchema } from './schemas';
import { mergeRecords } from './normalize';
import { writeRecordsParquet } from './write';

async function main() {
    const cfg = getConfig();
    console.log(`[Build] input=${cfg.inputDir} output=${cfg.output}`);

    const users = parseCsv(await fs.readFile(cfg.usersFile, 'utf8'), UserCsvSchema);
    console.log(`[Build] Users: ${users.rows.length}/${users.rowCount} (dropped ${users.droppedRows})`);

    const achievements = parseCsv(await fs.readFile(cfg.achievementsFile, 'utf8'), AchievementCsvSchema);
    console.log(
        `[Build] Achievements: ${achievements.rows.length}/${achievements.rowCount} (dropped ${achievements.droppedRows})`,
    );

    for (const e of [...users.errors, ...achievements.errors].slice(0, 10)) {
        console.log(`[Build]   row ${e.row}: ${e.message}`);
    }

    const records = mergeRecords(users.rows, achievements.rows, cfg.profileBase);
    console.log(`[Build] Joined records: ${records.length}`);

    await fs.mkdir(path.dirname(path.resolve(cfg.output)), { recursive: true });
    await writeRecordsParquet(cfg.output, records);
    console.log(`[Build] Wrote ${cfg.output}`);
}

main().catch((err: unknown) => {
    console.error('[Build] Failed:', err);
    process.exit(1);
});
