import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadCredentials } from "../credentials.js";
import { ConfigurationError } from "../errors.js";

describe("loadCredentials()", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "credentials-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(content: string): string {
    const file = path.join(dir, "credentials.json");
    fs.writeFileSync(file, content);
    return file;
  }

  it("returns both fields trimmed", () => {
    const file = write(JSON.stringify({ clientId: " test-client ", clientSecret: "test-secret\n" }));
    expect(loadCredentials(file)).toEqual({ clientId: "test-client", clientSecret: "test-secret" });
  });

  it("ignores extra keys", () => {
    const file = write(JSON.stringify({ clientId: "test-client", clientSecret: "test-secret", note: "x" }));
    expect(loadCredentials(file).clientSecret).toBe("test-secret");
  });

  it("fails when the file is missing", () => {
    expect(() => loadCredentials(path.join(dir, "nope.json"))).toThrow(ConfigurationError);
  });

  it("fails on invalid JSON", () => {
    const file = write("{ clientId: ");
    expect(() => loadCredentials(file)).toThrow(`Credentials file ${file} is not valid JSON`);
  });

  it("fails when the JSON is not an object", () => {
    expect(() => loadCredentials(write("[1, 2]"))).toThrow(ConfigurationError);
    expect(() => loadCredentials(write("null"))).toThrow(ConfigurationError);
  });

  it("fails when a field is missing or empty", () => {
    const missingSecret = write(JSON.stringify({ clientId: "test-client" }));
    expect(() => loadCredentials(missingSecret)).toThrow(`${missingSecret} is missing a non-empty "clientSecret"`);

    const emptyId = write(JSON.stringify({ clientId: "  ", clientSecret: "test-secret" }));
    expect(() => loadCredentials(emptyId)).toThrow(`${emptyId} is missing a non-empty "clientId"`);

    const numericId = write(JSON.stringify({ clientId: 12, clientSecret: "test-secret" }));
    expect(() => loadCredentials(numericId)).toThrow(ConfigurationError);
  });
});
