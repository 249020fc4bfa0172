import { tableExists, type Db } from "./db.js";
import { PersistenceError, ValidationError } from "./errors.js";
import { assertCoordinate, durationHours, greatCircleDistanceKm } from "./geo.js";
import { isFiniteNumber, roundTo } from "./utils/guards.js";

export interface EnrichmentSummary {
  rows: number;
  distancesComputed: number;
  durationsWritten: number;
  invalidRows: number[];
}

/** Stored endpoint columns; typed loosely because older tables may hold anything */
export type TrajectoryEndpoints = {
  id: number;
  lat_inicio: unknown;
  lon_inicio: unknown;
  lat_fin: unknown;
  lon_fin: unknown;
};

type EnrichmentRow = TrajectoryEndpoints & {
  duracion_segundos: unknown;
  distancia_inicio_a_fin_km: number | null;
};

const derivedColumns = ["duracion_horas", "distancia_inicio_a_fin_km"];

/** Tables written by older runs may predate the derived columns. */
function ensureDerivedColumns(db: Db): void {
  const columns = db.prepare("PRAGMA table_info(Trayectorias_validas)").all() as { name: string }[];
  for (const name of derivedColumns) {
    if (!columns.some((col) => col.name === name)) {
      db.exec(`ALTER TABLE Trayectorias_validas ADD COLUMN ${name} REAL`);
      console.log(`Added "${name}" column to Trayectorias_validas`);
    }
  }
}

/** Distance in km between the trajectory endpoints, rounded to 2 decimals */
export function trajectoryDistanceKm(row: TrajectoryEndpoints): number {
  const start = assertCoordinate({ lat: row.lat_inicio, lon: row.lon_inicio }, row.id);
  const end = assertCoordinate({ lat: row.lat_fin, lon: row.lon_fin }, row.id);
  return roundTo(greatCircleDistanceKm(start, end), 2);
}

/**
 * Fills distancia_inicio_a_fin_km where it is still null and recomputes
 * duracion_horas for every row. A row with coordinates out of range is logged
 * and left without a distance; the other rows are still written.
 */
export function enrichTrajectories(db: Db): EnrichmentSummary {
  if (!tableExists(db, "Trayectorias_validas")) {
    throw new PersistenceError("Table Trayectorias_validas does not exist; run the validator first");
  }

  const run = db.transaction(() => {
    ensureDerivedColumns(db);

    const rows = db
      .prepare(
        `SELECT Avion_fisico_id AS id, duracion_segundos, lat_inicio, lon_inicio, lat_fin, lon_fin,
                distancia_inicio_a_fin_km
         FROM Trayectorias_validas
         ORDER BY Avion_fisico_id`
      )
      .all() as EnrichmentRow[];

    const setDistance = db.prepare(
      "UPDATE Trayectorias_validas SET distancia_inicio_a_fin_km = @km WHERE Avion_fisico_id = @id"
    );
    const setHours = db.prepare("UPDATE Trayectorias_validas SET duracion_horas = @hours WHERE Avion_fisico_id = @id");

    const summary: EnrichmentSummary = { rows: rows.length, distancesComputed: 0, durationsWritten: 0, invalidRows: [] };

    for (const row of rows) {
      if (row.distancia_inicio_a_fin_km === null) {
        try {
          setDistance.run({ id: row.id, km: trajectoryDistanceKm(row) });
          summary.distancesComputed++;
        } catch (err) {
          if (!(err instanceof ValidationError)) throw err;
          console.warn(`Skipping distance for aircraft ${row.id}: ${err.message}`);
          summary.invalidRows.push(row.id);
        }
      }

      if (isFiniteNumber(row.duracion_segundos)) {
        setHours.run({ id: row.id, hours: durationHours(row.duracion_segundos) });
        summary.durationsWritten++;
      } else {
        console.warn(`Skipping duration for aircraft ${row.id}: elapsed seconds ${String(row.duracion_segundos)}`);
        if (!summary.invalidRows.includes(row.id)) summary.invalidRows.push(row.id);
      }
    }

    return summary;
  });

  try {
    return run();
  } catch (err) {
    throw new PersistenceError(`Trajectory enrichment rolled back: ${(err as Error).message}`, { cause: err });
  }
}
