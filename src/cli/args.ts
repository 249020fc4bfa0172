import fs from "fs";
import { describeError, UsageError } from "../errors.js";

/**
 * Reads the single positional database path. `argv` is what follows the script
 * name, i.e. `process.argv.slice(2)`.
 */
export function parseDatabaseArg(argv: string[], usage: string, options: { mustExist?: boolean } = {}): string {
  if (argv.length !== 1) {
    throw new UsageError(`Usage: ${usage}`);
  }
  const [dbPath] = argv;
  if (options.mustExist && !fs.existsSync(dbPath)) {
    throw new UsageError(`Database ${dbPath} does not exist\nUsage: ${usage}`);
  }
  return dbPath;
}

/** Runs a CLI body and turns any thrown error into a message and exit code 1. */
export async function runCli(main: () => Promise<void> | void): Promise<void> {
  try {
    await main();
  } catch (err) {
    console.error(err instanceof UsageError ? err.message : describeError(err));
    process.exitCode = 1;
  }
}
