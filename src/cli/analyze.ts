#!/usr/bin/env node
import { openDatabase } from "../db.js";
import { enrichTrajectories } from "../enricher.js";
import { parseDatabaseArg, runCli } from "./args.js";

void runCli(() => {
  const dbPath = parseDatabaseArg(process.argv.slice(2), "trajectory-analyze <path_to_sqlite_db>", {
    mustExist: true,
  });
  console.log(`Using database: ${dbPath}`);

  const db = openDatabase(dbPath, { mustExist: true });
  try {
    const summary = enrichTrajectories(db);
    if (summary.rows === 0) {
      console.log("Trayectorias_validas is empty; there were no valid trajectories to process");
      return;
    }
    console.log(
      `Computed ${summary.distancesComputed} distances and ${summary.durationsWritten} durations ` +
        `over ${summary.rows} trajectories (${summary.invalidRows.length} rows skipped)`
    );
  } finally {
    db.close();
  }
});
