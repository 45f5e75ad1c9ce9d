import { AppConfig, parseConfig } from "../src/common/config";

export const NOW = new Date("2026-01-15T12:00:00.000Z");

export function rawConfig() {
  return {
    mqtt: { url: "mqtt://broker.test:1883", clientId: "test-client" },
    secrets: { credentials: { username: "test-user", password: "test-secret" } },
    schedule: { publishDelayMs: 0 },
    monitor: { staleAfterSec: 3600, staleCheckIntervalSec: 60, replyTimeoutSec: 1 },
    types: {
      "VNTH-T2_v2": {
        modeFields: {
          temperature_sensitivity: 0.5,
          system_mode: "heat",
          preset: "schedule",
        },
      },
      "TR-M3Z": {
        modeFields: { system_mode: "heat", preset: "schedule" },
      },
    },
    thermostats: {
      "Bad OG": {
        dayTime: "05:00",
        dayTemperature: 21,
        nightTime: "23:00",
        nightTemperature: 19,
        type: "VNTH-T2_v2",
      },
      Caros: {
        dayTime: "06:30",
        dayTemperature: 20.5,
        nightTime: "22:00",
        nightTemperature: 18,
        type: "TR-M3Z",
      },
      Garage: {
        dayTime: "07:00",
        dayTemperature: 16,
        nightTime: "21:00",
        nightTemperature: 12,
        type: "MISSING",
      },
    },
  };
}

export function makeConfig(): AppConfig {
  return parseConfig(rawConfig());
}
