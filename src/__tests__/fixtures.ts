import { vi } from "vitest";
import type { FetchFn } from "../types.js";

export type RawState = (string | number | boolean | null | number[])[];

export interface RawStateFields {
  callsign?: string | null;
  country?: string | null;
  timePosition?: number | null;
  lon?: number | null;
  lat?: number | null;
  baroAltitude?: number | null;
  velocity?: number | null;
  geoAltitude?: number | null;
}

/** Builds a /states/all entry in OpenSky's positional layout */
export function rawState(icao24: string, fields: RawStateFields = {}): RawState {
  const timePosition = fields.timePosition === undefined ? 1_700_000_000 : fields.timePosition;
  return [
    icao24,
    fields.callsign === undefined ? "AMX123  " : fields.callsign,
    fields.country === undefined ? "Mexico" : fields.country,
    timePosition,
    timePosition ?? 1_700_000_000,
    fields.lon === undefined ? -99.1332 : fields.lon,
    fields.lat === undefined ? 19.4326 : fields.lat,
    fields.baroAltitude === undefined ? 10_000 : fields.baroAltitude,
    false,
    fields.velocity === undefined ? 230.5 : fields.velocity,
    90,
    0,
    null,
    fields.geoAltitude === undefined ? 10_100 : fields.geoAltitude,
    "1200",
    false,
    0,
  ];
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/** fetch stand-in answering each call with the next queued response */
export function mockFetch(...responses: Response[]) {
  const queue = [...responses];
  return vi.fn(async (..._args: Parameters<FetchFn>): Promise<Response> => {
    const next = queue.shift();
    if (!next) throw new Error("unexpected fetch call");
    return next;
  });
}

export const tokenBody = { access_token: "test-token", expires_in: 1800, token_type: "Bearer" };
