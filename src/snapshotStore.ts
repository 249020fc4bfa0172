import type { Db } from "./db.js";
import { PersistenceError } from "./errors.js";
import type { AircraftRow, SnapshotRow, StateVector } from "./types.js";

export interface AircraftIdentity {
  icao: string;
  callSign: string | null;
  originCountry: string | null;
}

export type SnapshotFields = Omit<SnapshotRow, "id" | "Avion_fisico_id">;

export interface StoreOptions {
  /** Only keep aircraft registered in this country (OpenSky origin_country) */
  originCountry?: string | null;
}

export interface StoreResult {
  inserted: number;
  newAircraft: number;
  filtered: number;
}

/**
 * Inserts the aircraft unless its ICAO address is already known and returns the
 * surrogate id either way.
 */
export function upsertAircraft(db: Db, aircraft: AircraftIdentity): number {
  db.prepare(
    `INSERT OR IGNORE INTO Avion_fisico (icao, call_sign, pais_origen)
     VALUES (@icao, @callSign, @originCountry)`
  ).run(aircraft);

  const row = db.prepare("SELECT id FROM Avion_fisico WHERE icao = ?").get(aircraft.icao) as
    | { id: number }
    | undefined;
  if (!row) {
    throw new PersistenceError(`Aircraft ${aircraft.icao} missing after insert`);
  }
  return row.id;
}

export function insertSnapshot(db: Db, aircraftId: number, fields: SnapshotFields): number {
  const info = db
    .prepare(
      `INSERT INTO Snapshots
       (Avion_fisico_id, posicion_temporal, tiempo_de_captura, longitud, latitud, altitud, velocidad, call_sign)
       VALUES (@aircraftId, @posicion_temporal, @tiempo_de_captura, @longitud, @latitud, @altitud, @velocidad, @call_sign)`
    )
    .run({ aircraftId, ...fields });
  return Number(info.lastInsertRowid);
}

export function snapshotFromState(state: StateVector, capturedAt: number): SnapshotFields {
  return {
    posicion_temporal: state.timePosition,
    tiempo_de_captura: capturedAt,
    longitud: state.longitude,
    latitud: state.latitude,
    altitud: state.baroAltitude ?? state.geoAltitude,
    velocidad: state.velocity,
    call_sign: state.callsign,
  };
}

/**
 * Stores one ingestion run. Everything happens in a single transaction: if any
 * row fails, nothing from this batch stays in the database.
 *
 * @param capturedAt unix seconds of the run
 */
export function storeSnapshots(
  db: Db,
  states: StateVector[],
  capturedAt: number,
  options: StoreOptions = {}
): StoreResult {
  const countAircraft = db.prepare("SELECT COUNT(*) AS n FROM Avion_fisico");

  const run = db.transaction((batch: StateVector[]) => {
    const before = (countAircraft.get() as { n: number }).n;
    let inserted = 0;
    let filtered = 0;

    for (const state of batch) {
      if (options.originCountry && state.originCountry !== options.originCountry) {
        filtered++;
        continue;
      }

      const aircraftId = upsertAircraft(db, {
        icao: state.icao24,
        callSign: state.callsign,
        originCountry: state.originCountry,
      });
      insertSnapshot(db, aircraftId, snapshotFromState(state, capturedAt));
      inserted++;
    }

    const after = (countAircraft.get() as { n: number }).n;
    return { inserted, newAircraft: after - before, filtered };
  });

  try {
    return run(states);
  } catch (err) {
    if (err instanceof PersistenceError) throw err;
    throw new PersistenceError(`Snapshot batch rolled back: ${(err as Error).message}`, { cause: err });
  }
}

export function getAircraftByIcao(db: Db, icao: string): AircraftRow | undefined {
  return db.prepare("SELECT id, icao, call_sign, pais_origen FROM Avion_fisico WHERE icao = ?").get(icao) as
    | AircraftRow
    | undefined;
}

export function getSnapshotsForAircraft(db: Db, aircraftId: number): SnapshotRow[] {
  return db
    .prepare(
      `SELECT id, Avion_fisico_id, posicion_temporal, tiempo_de_captura, longitud, latitud, altitud, velocidad, call_sign
       FROM Snapshots
       WHERE Avion_fisico_id = ?
       ORDER BY posicion_temporal, id`
    )
    .all(aircraftId) as SnapshotRow[];
}
