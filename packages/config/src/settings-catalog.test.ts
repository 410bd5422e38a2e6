import { describe, it, expect } from "vitest";
import {
  SETTING_DEFINITIONS,
  destinationSettingKey,
  getSettingDefinition,
} from "./settings-catalog.js";

describe("settings catalogue", () => {
  it("has unique keys and unique environment variables", () => {
    const keys = SETTING_DEFINITIONS.map((d) => d.key);
    const envs = SETTING_DEFINITIONS.map((d) => d.env);

    expect(new Set(keys).size).toBe(keys.length);
    expect(new Set(envs).size).toBe(envs.length);
  });

  it("never ships a default for a sensitive setting", () => {
    for (const definition of SETTING_DEFINITIONS.filter((d) => d.sensitive)) {
      expect(definition.default).toBeNull();
    }
  });

  it("returns static definitions by key", () => {
    expect(getSettingDefinition("renderer.url")).toMatchObject({
      env: "GOTENBERG_URL",
      default: "http://gotenberg:3000",
      sensitive: false,
    });
  });

  it("synthesizes definitions for destination credential fields", () => {
    const key = destinationSettingKey("nas-backup", "password");

    expect(key).toBe("destination.nas-backup.password");
    expect(getSettingDefinition(key)).toEqual({
      key,
      env: "DESTINATION_NAS_BACKUP_PASSWORD",
      default: null,
      sensitive: true,
      category: "Destination",
      description: 'Credential field "password" for destination nas-backup',
    });
  });

  it("treats non-secret destination fields as plaintext", () => {
    expect(getSettingDefinition("destination.nas-backup.username")?.sensitive).toBe(false);
  });

  it("returns null for unrecognized keys", () => {
    expect(getSettingDefinition("nope")).toBeNull();
    expect(getSettingDefinition("destination.../password")).toBeNull();
  });
});
