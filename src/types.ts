/** Client credentials for the OpenSky OAuth2 client-credentials flow */
export interface Credentials {
  clientId: string;
  clientSecret: string;
}

/** Bearer token; lives only as long as one ingestion run */
export interface AccessToken {
  token: string;
  expiresIn: number | null; // seconds
}

/** Decoded entry of the positional `states` array returned by /states/all */
export interface StateVector {
  icao24: string; // 24-bit ICAO address (lowercase hex)
  callsign: string | null;
  originCountry: string | null;
  timePosition: number | null; // unix seconds of last position update
  lastContact: number | null;
  longitude: number | null;
  latitude: number | null;
  baroAltitude: number | null; // metres
  onGround: boolean;
  velocity: number | null; // m/s over ground
  trueTrack: number | null;
  verticalRate: number | null;
  geoAltitude: number | null; // metres
  squawk: string | null;
}

export interface StatesResponse {
  time: number | null;
  states: StateVector[];
  skipped: number; // malformed state arrays dropped while decoding
}

/** Row of Avion_fisico */
export type AircraftRow = {
  id: number;
  icao: string;
  call_sign: string | null;
  pais_origen: string | null;
};

/** Row of Snapshots */
export type SnapshotRow = {
  id: number;
  Avion_fisico_id: number;
  posicion_temporal: number | null;
  tiempo_de_captura: number;
  longitud: number | null;
  latitud: number | null;
  altitud: number | null;
  velocidad: number | null;
  call_sign: string | null;
};

/** Row of Trayectorias_validas */
export type TrajectoryRow = {
  Avion_fisico_id: number;
  icao: string;
  inicio: number;
  fin: number;
  duracion_segundos: number;
  duracion_horas: number | null;
  lat_inicio: number;
  lon_inicio: number;
  lat_fin: number;
  lon_fin: number;
  total_snapshots: number;
  distancia_inicio_a_fin_km: number | null;
};

export type FetchFn = typeof fetch;
