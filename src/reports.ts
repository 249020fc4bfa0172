import { tableExists, type Db } from "./db.js";
import type { AircraftRow, TrajectoryRow } from "./types.js";

interface TrajectoryQuery {
  minKm?: number;
  limit?: number;
}

interface StoreStats {
  aircraft: number;
  snapshots: number;
  trajectories: number | null; // null until the validator has run
  enrichedTrajectories: number | null;
}

export type AircraftSummary = AircraftRow & {
  snapshots: number;
  firstSeen: number | null;
  lastSeen: number | null;
};

function count(db: Db, sql: string): number {
  return (db.prepare(sql).get() as { n: number }).n;
}

export function getStats(db: Db): StoreStats {
  const hasTrajectories = tableExists(db, "Trayectorias_validas");
  return {
    aircraft: count(db, "SELECT COUNT(*) AS n FROM Avion_fisico"),
    snapshots: count(db, "SELECT COUNT(*) AS n FROM Snapshots"),
    trajectories: hasTrajectories ? count(db, "SELECT COUNT(*) AS n FROM Trayectorias_validas") : null,
    enrichedTrajectories: hasTrajectories
      ? count(db, "SELECT COUNT(*) AS n FROM Trayectorias_validas WHERE distancia_inicio_a_fin_km IS NOT NULL")
      : null,
  };
}

export function getAircraftSummary(db: Db, icao: string): AircraftSummary | undefined {
  return db
    .prepare(
      `SELECT a.id, a.icao, a.call_sign, a.pais_origen,
              COUNT(s.id) AS snapshots,
              MIN(s.posicion_temporal) AS firstSeen,
              MAX(s.posicion_temporal) AS lastSeen
       FROM Avion_fisico a
       LEFT JOIN Snapshots s ON s.Avion_fisico_id = a.id
       WHERE a.icao = ?
       GROUP BY a.id`
    )
    .get(icao.toLowerCase()) as AircraftSummary | undefined;
}

/** Validated trajectories, longest first. Rows not yet enriched sort last. */
export function getTrajectories(db: Db, params: TrajectoryQuery = {}): TrajectoryRow[] {
  const queryParams: Record<string, number> = {};
  const whereConditions: string[] = [];

  if (params.minKm !== undefined) {
    whereConditions.push("distancia_inicio_a_fin_km >= @minKm");
    queryParams.minKm = params.minKm;
  }

  const whereClause = whereConditions.length > 0 ? `WHERE ${whereConditions.join(" AND ")}` : "";
  const limitClause = params.limit !== undefined ? "LIMIT @limit" : "";
  if (params.limit !== undefined) queryParams.limit = params.limit;

  const query = `
    SELECT Avion_fisico_id, icao, inicio, fin, duracion_segundos, duracion_horas,
           lat_inicio, lon_inicio, lat_fin, lon_fin, total_snapshots, distancia_inicio_a_fin_km
    FROM Trayectorias_validas
    ${whereClause}
    ORDER BY distancia_inicio_a_fin_km IS NULL, distancia_inicio_a_fin_km DESC, Avion_fisico_id
    ${limitClause}
  `;

  return db.prepare(query).all(queryParams) as TrajectoryRow[];
}
