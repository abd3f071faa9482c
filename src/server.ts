//src/server.ts
import { createApp } from "./index";
import { env } from "./config/env";
import { loadRecords } from "./modules/records/records.loader";
import { RecordsRepo } from "./modules/records/records.repo";
import { RankingsService } from "./modules/rankings/rankings.service";
import { LoadError } from "./utils/errors";

async function main() {
  // The table is loaded once; every request renders from this same copy.
  const repo = new RecordsRepo(await loadRecords(env.records.path));
  const rankings = new RankingsService(repo, {
    maxPageSize: env.rankings.maxPageSize,
    defaultAchievementType: env.rankings.defaultAchievementType,
  });

  const app = createApp({ rankings });

  const server = app.listen(env.port, () => {
    console.log(`API listening on http://localhost:${env.port} (${repo.size()} records)`);
  });

  process.on("SIGINT", () => {
    console.log("Shutting down...");
    server.close(() => process.exit(0));
  });
}

main().catch((err: unknown) => {
  if (err instanceof LoadError) {
    console.error(`[Records] ${err.code}: ${err.message}`);
  } else {
    console.error("Failed to start:", err);
  }
  process.exit(1);
});
