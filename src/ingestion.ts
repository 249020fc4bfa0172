import { config } from "./config.js";
import { loadCredentials } from "./credentials.js";
import { ensureSchema, openDatabase } from "./db.js";
import { fetchStates, requestToken } from "./opensky.js";
import { storeSnapshots, type StoreResult } from "./snapshotStore.js";
import type { FetchFn } from "./types.js";

export interface IngestionOptions {
  dbPath: string;
  credentialsPath?: string;
  originCountry?: string | null;
  fetchFn?: FetchFn;
  /** unix seconds; defaults to the wall clock */
  now?: () => number;
}

export interface IngestionReport extends StoreResult {
  received: number;
  capturedAt: number;
}

/**
 * One scheduled run: credentials, token, a single /states/all call, then one
 * transactional insert batch. Nothing survives the call except the database rows.
 */
export async function runIngestion(options: IngestionOptions): Promise<IngestionReport> {
  const credentials = loadCredentials(options.credentialsPath ?? config.credentialsPath);

  const token = await requestToken(credentials, { fetchFn: options.fetchFn });
  const { states } = await fetchStates(token, { fetchFn: options.fetchFn });
  const capturedAt = options.now ? options.now() : Math.floor(Date.now() / 1000);

  if (states.length === 0) {
    console.log("OpenSky returned no state vectors; nothing to store");
  }

  const db = openDatabase(options.dbPath);
  try {
    ensureSchema(db);
    const result = storeSnapshots(db, states, capturedAt, {
      originCountry: options.originCountry === undefined ? config.originCountry : options.originCountry,
    });
    return { ...result, received: states.length, capturedAt };
  } finally {
    db.close();
  }
}
