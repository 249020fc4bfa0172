import { Router, Request, Response } from "express";
import { tableExists, type Db } from "./db.js";
import { getAircraftByIcao, getSnapshotsForAircraft } from "./snapshotStore.js";
import { getAircraftSummary, getStats, getTrajectories } from "./reports.js";

function optionalNumber(raw: unknown): number | undefined | null {
  if (raw === undefined) return undefined;
  if (typeof raw !== "string" || raw.trim() === "") return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

/** Read-only routes over the three tables */
export function createApi(db: Db): Router {
  const router = Router();

  router.get("/stats", (_req: Request, res: Response) => {
    res.json(getStats(db));
  });

  // ---------- aircraft ----------
  router.get("/aircraft/:icao", (req: Request, res: Response) => {
    const aircraft = getAircraftSummary(db, req.params.icao);
    if (!aircraft) {
      return res.status(404).json({ error: "Aircraft not found" });
    }
    res.json(aircraft);
  });

  router.get("/aircraft/:icao/snapshots", (req: Request, res: Response) => {
    const aircraft = getAircraftByIcao(db, req.params.icao.toLowerCase());
    if (!aircraft) {
      return res.status(404).json({ error: "Aircraft not found" });
    }
    res.json(getSnapshotsForAircraft(db, aircraft.id));
  });

  // ---------- trajectories ----------
  router.get("/trajectories", (req: Request, res: Response) => {
    const minKm = optionalNumber(req.query.minKm);
    const limit = optionalNumber(req.query.limit);
    if (minKm === null || limit === null || (limit !== undefined && (!Number.isInteger(limit) || limit < 1))) {
      return res.status(400).json({ error: "minKm must be a number and limit a positive integer" });
    }

    if (!tableExists(db, "Trayectorias_validas")) {
      return res.status(503).json({ error: "Trajectories have not been validated yet" });
    }

    res.json(getTrajectories(db, { minKm, limit }));
  });

  return router;
}
