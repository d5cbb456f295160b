import { describe, expect, test } from "vitest";
import { buildEnvOverlay, parseEnvValue } from "../../src/config/env";

describe("environment overlay", () => {
  describe("parseEnvValue", () => {
    test("coerces booleans and integers", () => {
      expect(parseEnvValue("max_full_backups", "3")).toBe(3);
      expect(parseEnvValue("max_full_backups", "0")).toBe(0);
      expect(parseEnvValue("flag", "true")).toBe(true);
      expect(parseEnvValue("flag", "false")).toBe(false);
    });

    test("keeps numbers with a leading zero as strings", () => {
      expect(parseEnvValue("something", "0640")).toBe("0640");
    });

    test("parses bracketed lists", () => {
      expect(parseEnvValue("ignored_databases", "[system, 'default', \"logs\"]")).toEqual([
        "system",
        "default",
        "logs",
      ]);
      expect(parseEnvValue("ignored_databases", "[]")).toEqual([]);
    });

    test("never coerces string settings", () => {
      expect(parseEnvValue("password", "12345")).toBe("12345");
      expect(parseEnvValue("archive_mode", "640")).toBe("640");
      expect(parseEnvValue("user", "true")).toBe("true");
    });
  });

  describe("buildEnvOverlay", () => {
    test("maps prefixed variables to nested settings", () => {
      const overlay = buildEnvOverlay({
        CHBACKUP_CLICKHOUSE__HOST: "ch.internal",
        CHBACKUP_CLICKHOUSE__PORT: "8443",
        CHBACKUP_BACKUP__S3__BUCKET: "backups",
        CHBACKUP_BACKUP__MAX_FULL_BACKUPS: "1",
        PATH: "/usr/bin",
      });

      expect(overlay).toEqual({
        clickhouse: { host: "ch.internal", port: 8443 },
        backup: { s3: { bucket: "backups" }, max_full_backups: 1 },
      });
    });

    test("ignores variables without a section", () => {
      expect(buildEnvOverlay({ CHBACKUP_HOST: "x", CHBACKUP_BACKUP__: "y" })).toEqual({});
    });
  });
});
