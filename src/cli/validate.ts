#!/usr/bin/env node
import { openDatabase } from "../db.js";
import { validateTrajectories } from "../trajectoryValidator.js";
import { parseDatabaseArg, runCli } from "./args.js";

void runCli(() => {
  const dbPath = parseDatabaseArg(process.argv.slice(2), "trajectory-validate <path_to_sqlite_db>", {
    mustExist: true,
  });
  console.log(`Using database: ${dbPath}`);

  const db = openDatabase(dbPath, { mustExist: true });
  try {
    const summary = validateTrajectories(db);
    const { rejected } = summary;
    console.log(
      `${summary.trajectories} valid trajectories out of ${summary.aircraftSeen} aircraft ` +
        `(too few snapshots: ${rejected["too-few-snapshots"]}, incomplete: ${rejected["incomplete-snapshot"]}, ` +
        `span too short: ${rejected["span-too-short"]})`
    );
  } finally {
    db.close();
  }
});
