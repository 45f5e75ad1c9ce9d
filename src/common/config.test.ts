import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { rawConfig } from "../../test/fixtures";
import { loadConfig, parseConfig, resolveConfigPath } from "./config";
import { ConfigError } from "./errors";

describe("config", () => {
  describe("parseConfig", () => {
    it("should fill in defaults", () => {
      const raw = rawConfig();
      const config = parseConfig({
        mqtt: raw.mqtt,
        types: raw.types,
        thermostats: raw.thermostats,
      });

      expect(config.topics).toEqual({
        base: "zigbee2mqtt",
        deviceSuffix: " Thermostat",
        monitorBase: "thermostat_monitor",
        query: "thermostat_monitor",
        staleReport: "thermostat_monitor_unseen",
      });
      expect(config.monitor).toEqual({
        staleAfterSec: 3600,
        staleCheckIntervalSec: 60,
        replyTimeoutSec: 5,
        batteryLowThreshold: 20,
      });
      expect(config.schedule).toEqual({ dryRun: false, publishDelayMs: 500 });
      expect(config.mqtt.keepaliveSec).toBe(60);
      expect(config.secrets).toBeUndefined();
      expect(config.registry.resolve("TR-M3Z").scheduleKeyPrefix).toBe("schedule");
    });

    it("should turn thermostats into named device configs", () => {
      const config = parseConfig(rawConfig());
      expect(config.devices.map((d) => d.name)).toEqual(["Bad OG", "Caros", "Garage"]);
      expect(config.devices[0]).toEqual({
        name: "Bad OG",
        dayTime: "05:00",
        dayTemperature: 21,
        nightTime: "23:00",
        nightTemperature: 19,
        type: "VNTH-T2_v2",
      });
    });

    it("should reject equal day and night times", () => {
      const raw = rawConfig();
      raw.thermostats.Caros.nightTime = "06:30";
      expect(() => parseConfig(raw)).toThrow(
        "Invalid configuration: thermostats.Caros.nightTime: dayTime and nightTime must differ"
      );
    });

    it("should reject malformed times", () => {
      const raw = rawConfig();
      raw.thermostats["Bad OG"].dayTime = "25:00";
      expect(() => parseConfig(raw)).toThrow(
        "Invalid configuration: thermostats.Bad OG.dayTime: expected a time of day as HH:MM"
      );
    });

    it("should reject types without mode fields", () => {
      const raw = rawConfig();
      const config = { ...raw, types: { ...raw.types, Empty: { modeFields: {} } } };
      expect(() => parseConfig(config)).toThrow(ConfigError);
      expect(() => parseConfig(config)).toThrow("types.Empty.modeFields: modeFields must not be empty");
    });

    it.each(["Bad/OG", "Bad+OG", "Bad#OG"])(
      "should reject the device name '%s'",
      (name) => {
        const raw = rawConfig();
        const config = {
          ...raw,
          thermostats: { [name]: raw.thermostats["Bad OG"] },
        };
        expect(() => parseConfig(config)).toThrow(
          `Invalid configuration: thermostats.${name}: device names must not contain '/', '+' or '#'`
        );
      }
    );

    it("should collect every issue", () => {
      try {
        parseConfig({ types: {}, thermostats: {} });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(ConfigError);
        if (e instanceof ConfigError) {
          expect(e.issues).toEqual(["mqtt: Required"]);
        }
      }
    });
  });

  describe("loadConfig", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "thermostat-config-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should read and validate a JSON file", () => {
      const path = join(dir, "config.json");
      writeFileSync(path, JSON.stringify(rawConfig()));
      expect(loadConfig(path).devices).toHaveLength(3);
    });

    it("should wrap unreadable files in a ConfigError", () => {
      const path = join(dir, "missing.json");
      expect(() => loadConfig(path)).toThrow(ConfigError);
      expect(() => loadConfig(path)).toThrow(`Cannot read config ${path}`);
    });

    it("should wrap invalid JSON in a ConfigError", () => {
      const path = join(dir, "broken.json");
      writeFileSync(path, "{ mqtt: ");
      expect(() => loadConfig(path)).toThrow(ConfigError);
    });
  });

  describe("resolveConfigPath", () => {
    it("should prefer CONFIG_PATH over the argument", () => {
      expect(resolveConfigPath("arg.json", { CONFIG_PATH: "env.json" })).toBe("env.json");
      expect(resolveConfigPath("arg.json", {})).toBe("arg.json");
      expect(resolveConfigPath(undefined, {})).toBeUndefined();
    });
  });
});
