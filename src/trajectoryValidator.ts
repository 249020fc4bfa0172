import { config } from "./config.js";
import { recreateTrajectoryTable, tableExists, type Db } from "./db.js";
import { PersistenceError } from "./errors.js";

export interface ValidityThresholds {
  minSnapshots: number;
  minSpanSeconds: number;
}

/** The parts of a snapshot the validity predicate looks at */
export interface TrajectoryPoint {
  id: number;
  timestamp: number | null;
  latitude: number | null;
  longitude: number | null;
}

export interface TrajectorySummary {
  start: CompletePoint;
  end: CompletePoint;
  spanSeconds: number;
  count: number;
}

type CompletePoint = { id: number; timestamp: number; latitude: number; longitude: number };

export type RejectionReason = "too-few-snapshots" | "incomplete-snapshot" | "span-too-short";

export type TrajectoryVerdict =
  | { valid: true; summary: TrajectorySummary }
  | { valid: false; reason: RejectionReason };

export interface ValidationSummary {
  aircraftSeen: number;
  trajectories: number;
  rejected: Record<RejectionReason, number>;
}

function isComplete(point: TrajectoryPoint): point is CompletePoint {
  return point.timestamp !== null && point.latitude !== null && point.longitude !== null;
}

// Earlier timestamp wins; on equal timestamps the lower snapshot id wins.
function precedes(a: CompletePoint, b: CompletePoint): boolean {
  return a.timestamp < b.timestamp || (a.timestamp === b.timestamp && a.id < b.id);
}

// Later timestamp wins; on equal timestamps the lower snapshot id wins.
function supersedes(a: CompletePoint, b: CompletePoint): boolean {
  return a.timestamp > b.timestamp || (a.timestamp === b.timestamp && a.id < b.id);
}

/**
 * Applies the validity predicate to every snapshot of one aircraft and picks the
 * first and last observation. The input order does not matter.
 */
export function summarizeTrajectory(
  points: TrajectoryPoint[],
  thresholds: ValidityThresholds = config.validation
): TrajectoryVerdict {
  if (points.length < thresholds.minSnapshots || points.length < 2) {
    return { valid: false, reason: "too-few-snapshots" };
  }

  let start: CompletePoint | null = null;
  let end: CompletePoint | null = null;
  for (const point of points) {
    if (!isComplete(point)) {
      return { valid: false, reason: "incomplete-snapshot" };
    }
    if (start === null || precedes(point, start)) start = point;
    if (end === null || supersedes(point, end)) end = point;
  }

  if (start === null || end === null) {
    return { valid: false, reason: "too-few-snapshots" };
  }

  const spanSeconds = end.timestamp - start.timestamp;
  if (spanSeconds < thresholds.minSpanSeconds) {
    return { valid: false, reason: "span-too-short" };
  }

  return { valid: true, summary: { start, end, spanSeconds, count: points.length } };
}

type SnapshotScanRow = {
  id: number;
  aircraftId: number;
  icao: string;
  timestamp: number | null;
  latitude: number | null;
  longitude: number | null;
};

/**
 * Rebuilds Trayectorias_validas from the full Snapshots table. Runs in one
 * transaction; the previous table survives a failed rebuild.
 */
export function validateTrajectories(
  db: Db,
  thresholds: ValidityThresholds = config.validation
): ValidationSummary {
  for (const table of ["Snapshots", "Avion_fisico"]) {
    if (!tableExists(db, table)) {
      throw new PersistenceError(`Table ${table} does not exist; run the ingestion first`);
    }
  }

  const scan = db.prepare<[], SnapshotScanRow>(`
    SELECT s.id, s.Avion_fisico_id AS aircraftId, a.icao,
           s.posicion_temporal AS timestamp, s.latitud AS latitude, s.longitud AS longitude
    FROM Snapshots s
    JOIN Avion_fisico a ON a.id = s.Avion_fisico_id
    ORDER BY s.Avion_fisico_id, s.posicion_temporal, s.id
  `);

  const rebuild = db.transaction(() => {
    const summary: ValidationSummary = {
      aircraftSeen: 0,
      trajectories: 0,
      rejected: { "too-few-snapshots": 0, "incomplete-snapshot": 0, "span-too-short": 0 },
    };
    const accepted: { aircraftId: number; icao: string; trajectory: TrajectorySummary }[] = [];

    let current: { aircraftId: number; icao: string; points: TrajectoryPoint[] } | null = null;
    const flush = () => {
      if (!current) return;
      summary.aircraftSeen++;
      const verdict = summarizeTrajectory(current.points, thresholds);
      if (verdict.valid) {
        accepted.push({ aircraftId: current.aircraftId, icao: current.icao, trajectory: verdict.summary });
      } else {
        summary.rejected[verdict.reason]++;
      }
    };

    for (const row of scan.iterate()) {
      if (!current || current.aircraftId !== row.aircraftId) {
        flush();
        current = { aircraftId: row.aircraftId, icao: row.icao, points: [] };
      }
      current.points.push(row);
    }
    flush();

    // Writes wait until the scan iterator is exhausted; the connection is busy until then.
    recreateTrajectoryTable(db);
    const insert = db.prepare(`
      INSERT INTO Trayectorias_validas
      (Avion_fisico_id, icao, inicio, fin, duracion_segundos, lat_inicio, lon_inicio, lat_fin, lon_fin, total_snapshots)
      VALUES (@aircraftId, @icao, @inicio, @fin, @duracion, @latInicio, @lonInicio, @latFin, @lonFin, @total)
    `);
    for (const { aircraftId, icao, trajectory } of accepted) {
      insert.run({
        aircraftId,
        icao,
        inicio: trajectory.start.timestamp,
        fin: trajectory.end.timestamp,
        duracion: trajectory.spanSeconds,
        latInicio: trajectory.start.latitude,
        lonInicio: trajectory.start.longitude,
        latFin: trajectory.end.latitude,
        lonFin: trajectory.end.longitude,
        total: trajectory.count,
      });
    }
    summary.trajectories = accepted.length;
    return summary;
  });

  try {
    return rebuild();
  } catch (err) {
    throw new PersistenceError(`Trajectory validation rolled back: ${(err as Error).message}`, { cause: err });
  }
}
