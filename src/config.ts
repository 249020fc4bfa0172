import dotenv from "dotenv";

dotenv.config();

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export const config = {
  credentialsPath: process.env.OPENSKY_CREDENTIALS || "credentials.json",
  tokenUrl:
    process.env.OPENSKY_TOKEN_URL ||
    "https://auth.opensky-network.org/auth/realms/opensky-network/protocol/openid-connect/token",
  statesUrl: process.env.OPENSKY_STATES_URL || "https://opensky-network.org/api/states/all",
  httpTimeoutMs: numberFromEnv("HTTP_TIMEOUT_MS", 10_000),
  // Unset keeps every aircraft in the feed
  originCountry: process.env.ORIGIN_COUNTRY?.trim() || null,
  validation: {
    minSnapshots: numberFromEnv("MIN_SNAPSHOTS", 2),
    minSpanSeconds: numberFromEnv("MIN_SPAN_SECONDS", 900),
  },
  dbPath: process.env.DB_PATH || "data/flights.db",
  port: numberFromEnv("PORT", 3000),
};
