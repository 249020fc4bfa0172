import Database from "better-sqlite3";
import { beforeEach, describe, expect, it } from "vitest";
import { configure, ensureSchema, type Db } from "../db.js";
import { enrichTrajectories } from "../enricher.js";
import { getAircraftSummary, getStats, getTrajectories } from "../reports.js";
import { insertSnapshot, upsertAircraft } from "../snapshotStore.js";
import { validateTrajectories } from "../trajectoryValidator.js";

function seed(db: Db, icao: string, points: [number, number, number][]): void {
  const id = upsertAircraft(db, { icao, callSign: "TST1", originCountry: "Mexico" });
  for (const [timestamp, lat, lon] of points) {
    insertSnapshot(db, id, {
      posicion_temporal: timestamp,
      tiempo_de_captura: timestamp,
      latitud: lat,
      longitud: lon,
      altitud: null,
      velocidad: null,
      call_sign: "TST1",
    });
  }
}

describe("reports", () => {
  let db: Db;

  beforeEach(() => {
    db = new Database(":memory:");
    configure(db);
    ensureSchema(db);
    seed(db, "aaa001", [
      [0, 19.4326, -99.1332],
      [3600, 21.0417, -86.8515],
    ]);
    seed(db, "bbb002", [
      [0, 10, 20],
      [1800, 10, 21],
    ]);
    seed(db, "ccc003", [[0, 10, 20]]);
  });

  it("reports null trajectory counts before validation", () => {
    expect(getStats(db)).toEqual({ aircraft: 3, snapshots: 5, trajectories: null, enrichedTrajectories: null });
  });

  it("counts validated and enriched trajectories", () => {
    validateTrajectories(db, { minSnapshots: 2, minSpanSeconds: 900 });
    expect(getStats(db)).toEqual({ aircraft: 3, snapshots: 5, trajectories: 2, enrichedTrajectories: 0 });

    enrichTrajectories(db);
    expect(getStats(db).enrichedTrajectories).toBe(2);
  });

  it("summarises one aircraft by ICAO address", () => {
    expect(getAircraftSummary(db, "AAA001")).toMatchObject({
      icao: "aaa001",
      call_sign: "TST1",
      pais_origen: "Mexico",
      snapshots: 2,
      firstSeen: 0,
      lastSeen: 3600,
    });
    expect(getAircraftSummary(db, "zzz999")).toBeUndefined();
  });

  it("lists trajectories longest first and filters by distance", () => {
    validateTrajectories(db, { minSnapshots: 2, minSpanSeconds: 900 });
    enrichTrajectories(db);

    expect(getTrajectories(db).map((t) => t.icao)).toEqual(["aaa001", "bbb002"]);
    expect(getTrajectories(db, { minKm: 500 }).map((t) => t.icao)).toEqual(["aaa001"]);
    expect(getTrajectories(db, { limit: 1 })).toHaveLength(1);
  });

  it("sorts rows without a distance last", () => {
    validateTrajectories(db, { minSnapshots: 2, minSpanSeconds: 900 });
    db.prepare("UPDATE Trayectorias_validas SET distancia_inicio_a_fin_km = 5 WHERE icao = 'bbb002'").run();

    expect(getTrajectories(db).map((t) => [t.icao, t.distancia_inicio_a_fin_km])).toEqual([
      ["bbb002", 5],
      ["aaa001", null],
    ]);
  });
});
