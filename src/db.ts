import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { PersistenceError } from "./errors.js";

export type Db = Database.Database;

/**
 * Opens the database file. With `mustExist` a missing file is an error instead of
 * being created (parent directory included).
 */
export function openDatabase(dbPath: string, options: { mustExist?: boolean } = {}): Db {
  try {
    if (!options.mustExist && dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    const db = new Database(dbPath, { fileMustExist: options.mustExist ?? false });
    configure(db);
    return db;
  } catch (err) {
    throw new PersistenceError(`Could not open database ${dbPath}: ${(err as Error).message}`, { cause: err });
  }
}

export function configure(db: Db): void {
  if (db.name !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");
}

export function tableExists(db: Db, table: string): boolean {
  const row = db.prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?").get(table);
  return row !== undefined;
}

// Columns added after the first version of the Snapshots table
const snapshotColumnMigrations: { name: string; definition: string }[] = [
  { name: "velocidad", definition: "REAL" },
  { name: "call_sign", definition: "TEXT" },
];

/** Creates Avion_fisico and Snapshots if absent. Safe on every run. */
export function ensureSchema(db: Db): void {
  try {
    db.exec(`
CREATE TABLE IF NOT EXISTS Avion_fisico (
  id          INTEGER NOT NULL PRIMARY KEY AUTOINCREMENT UNIQUE,
  icao        TEXT NOT NULL UNIQUE,
  call_sign   TEXT,
  pais_origen TEXT
);

CREATE TABLE IF NOT EXISTS Snapshots (
  id                INTEGER NOT NULL PRIMARY KEY AUTOINCREMENT UNIQUE,
  Avion_fisico_id   INTEGER NOT NULL,
  posicion_temporal INTEGER,          -- provider time_position, unix seconds
  tiempo_de_captura INTEGER NOT NULL, -- when the ingestion run fetched it
  longitud          REAL,
  latitud           REAL,
  altitud           REAL,
  velocidad         REAL,
  call_sign         TEXT,
  FOREIGN KEY(Avion_fisico_id) REFERENCES Avion_fisico(id)
);
`);

    const columns = db.prepare("PRAGMA table_info(Snapshots)").all() as { name: string }[];
    for (const column of snapshotColumnMigrations) {
      if (!columns.some((row) => row.name === column.name)) {
        db.exec(`ALTER TABLE Snapshots ADD COLUMN ${column.name} ${column.definition}`);
        console.log(`Added "${column.name}" column to Snapshots`);
      }
    }

    db.exec(
      "CREATE INDEX IF NOT EXISTS idx_snapshots_avion_tiempo ON Snapshots(Avion_fisico_id, posicion_temporal)"
    );
  } catch (err) {
    throw new PersistenceError(`Could not create schema: ${(err as Error).message}`, { cause: err });
  }
}

/**
 * Drops and recreates Trayectorias_validas. Meant to run inside the validator's
 * transaction so a failed rebuild leaves the previous table in place.
 */
export function recreateTrajectoryTable(db: Db): void {
  db.exec(`
DROP TABLE IF EXISTS Trayectorias_validas;

CREATE TABLE Trayectorias_validas (
  Avion_fisico_id           INTEGER NOT NULL PRIMARY KEY,
  icao                      TEXT NOT NULL,
  inicio                    INTEGER NOT NULL,
  fin                       INTEGER NOT NULL,
  duracion_segundos         INTEGER NOT NULL,
  duracion_horas            REAL,
  lat_inicio                REAL NOT NULL,
  lon_inicio                REAL NOT NULL,
  lat_fin                   REAL NOT NULL,
  lon_fin                   REAL NOT NULL,
  total_snapshots           INTEGER NOT NULL,
  distancia_inicio_a_fin_km REAL,
  FOREIGN KEY(Avion_fisico_id) REFERENCES Avion_fisico(id)
);
`);
}
