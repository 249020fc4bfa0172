import fs from "fs";
import { ConfigurationError } from "./errors.js";
import type { Credentials } from "./types.js";
import { isRecord } from "./utils/guards.js";

function requireField(json: Record<string, unknown>, field: keyof Credentials, file: string): string {
  const value = json[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigurationError(`${file} is missing a non-empty "${field}"`);
  }
  return value.trim();
}

/**
 * Reads the OpenSky client id/secret pair from a JSON file shaped like
 * `{"clientId": "...", "clientSecret": "..."}`.
 */
export function loadCredentials(file: string): Credentials {
  let text: string;
  try {
    text = fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Credentials file ${file} could not be read`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Credentials file ${file} is not valid JSON`, { cause: err });
  }

  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Credentials file ${file} must contain a JSON object`);
  }

  return {
    clientId: requireField(parsed, "clientId", file),
    clientSecret: requireField(parsed, "clientSecret", file),
  };
}
