#!/usr/bin/env node
import { runIngestion } from "../ingestion.js";
import { parseDatabaseArg, runCli } from "./args.js";

void runCli(async () => {
  const dbPath = parseDatabaseArg(process.argv.slice(2), "trajectory-ingest <path_to_sqlite_db>");
  console.log(`Using database: ${dbPath}`);

  const report = await runIngestion({ dbPath });
  console.log(
    `Stored ${report.inserted} snapshots (${report.newAircraft} new aircraft, ` +
      `${report.filtered} filtered out of ${report.received} received)`
  );
});
