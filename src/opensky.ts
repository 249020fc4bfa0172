import { config } from "./config.js";
import { AuthenticationError, FetchError } from "./errors.js";
import type { AccessToken, Credentials, FetchFn, StateVector, StatesResponse } from "./types.js";
import { isRecord, numberOrNull, stringOrNull } from "./utils/guards.js";

export interface OpenSkyOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
  tokenUrl?: string;
  statesUrl?: string;
}

type HttpReply = { ok: boolean; status: number; text: string };

/** The abort timer stays armed until the whole body has been read. */
async function fetchText(fetchFn: FetchFn, url: string, init: RequestInit, timeoutMs: number): Promise<HttpReply> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchFn(url, { ...init, signal: controller.signal });
    return { ok: res.ok, status: res.status, text: await res.text() };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * OAuth2 client-credentials exchange against the OpenSky identity server.
 * The token is returned to the caller and never cached.
 */
export async function requestToken(credentials: Credentials, options: OpenSkyOptions = {}): Promise<AccessToken> {
  const fetchFn = options.fetchFn ?? fetch;
  const url = options.tokenUrl ?? config.tokenUrl;

  const body = new URLSearchParams({
    grant_type: "client_credentials",
    client_id: credentials.clientId,
    client_secret: credentials.clientSecret,
  });

  let res: HttpReply;
  try {
    res = await fetchText(
      fetchFn,
      url,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: body.toString(),
      },
      options.timeoutMs ?? config.httpTimeoutMs
    );
  } catch (err) {
    throw new AuthenticationError(`Token request failed: ${(err as Error).message}`, { cause: err });
  }

  if (!res.ok) {
    throw new AuthenticationError(`Token request rejected: ${res.status}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(res.text);
  } catch (err) {
    throw new AuthenticationError("Token response is not valid JSON", { cause: err });
  }

  if (!isRecord(data)) {
    throw new AuthenticationError("Token response is not an object");
  }

  const { access_token: accessToken, expires_in: expiresIn } = data;
  if (typeof accessToken !== "string" || accessToken === "") {
    throw new AuthenticationError("Token response has no access_token");
  }

  return { token: accessToken, expiresIn: numberOrNull(expiresIn) };
}

/**
 * Decodes one positional state array. Returns null when the entry is too short
 * or has no ICAO address.
 *
 * @see https://openskynetwork.github.io/opensky-api/rest.html#all-state-vectors
 */
export function decodeState(raw: unknown): StateVector | null {
  if (!Array.isArray(raw) || raw.length < 17) return null;

  const icao24 = stringOrNull(raw[0]);
  if (icao24 === null) return null;

  return {
    icao24: icao24.toLowerCase(),
    callsign: stringOrNull(raw[1]),
    originCountry: stringOrNull(raw[2]),
    timePosition: numberOrNull(raw[3]),
    lastContact: numberOrNull(raw[4]),
    longitude: numberOrNull(raw[5]),
    latitude: numberOrNull(raw[6]),
    baroAltitude: numberOrNull(raw[7]),
    onGround: raw[8] === true,
    velocity: numberOrNull(raw[9]),
    trueTrack: numberOrNull(raw[10]),
    verticalRate: numberOrNull(raw[11]),
    geoAltitude: numberOrNull(raw[13]),
    squawk: stringOrNull(raw[14]),
  };
}

/** Validates the /states/all payload. `states: null` is how OpenSky reports no aircraft. */
export function parseStatesPayload(data: unknown): StatesResponse {
  if (!isRecord(data) || !("states" in data)) {
    throw new FetchError("States payload has no top-level states list");
  }

  const { states } = data;
  if (states === null) {
    return { time: numberOrNull(data.time), states: [], skipped: 0 };
  }
  if (!Array.isArray(states)) {
    throw new FetchError("States payload field states is not a list");
  }

  const decoded: StateVector[] = [];
  let skipped = 0;
  for (const raw of states) {
    const state = decodeState(raw);
    if (state) decoded.push(state);
    else skipped++;
  }

  return { time: numberOrNull(data.time), states: decoded, skipped };
}

/** Single authenticated GET of every state vector currently visible to the account. */
export async function fetchStates(token: AccessToken, options: OpenSkyOptions = {}): Promise<StatesResponse> {
  const fetchFn = options.fetchFn ?? fetch;
  const url = options.statesUrl ?? config.statesUrl;

  let res: HttpReply;
  try {
    res = await fetchText(
      fetchFn,
      url,
      { headers: { Authorization: `Bearer ${token.token}` } },
      options.timeoutMs ?? config.httpTimeoutMs
    );
  } catch (err) {
    throw new FetchError(`States request failed: ${(err as Error).message}`, null, { cause: err });
  }

  if (!res.ok) {
    throw new FetchError(`OpenSky error: ${res.status}`, res.status);
  }

  let data: unknown;
  try {
    data = JSON.parse(res.text);
  } catch (err) {
    throw new FetchError("States response is not valid JSON", res.status, { cause: err });
  }

  const parsed = parseStatesPayload(data);
  if (parsed.skipped > 0) {
    console.warn(`Skipped ${parsed.skipped} malformed state vectors`);
  }
  return parsed;
}
