import { readFileSync } from "fs";
import { z } from "zod";
import { DEFAULT_DEVICE_SUFFIX } from "../clients/mqtt/topics";
import { DEFAULT_BATTERY_LOW_THRESHOLD } from "../reconcile/reconciler";
import { parseTimeOfDay } from "../schedule/generator";
import {
  DEFAULT_SCHEDULE_KEY_PREFIX,
  TypeProfileRegistry,
} from "../schedule/profiles";
import { DeviceConfig, TopicsConfig } from "../types";
import { ConfigError, describeError } from "./errors";

function minutesOrNull(s: string): number | null {
  try {
    return parseTimeOfDay(s);
  } catch {
    return null;
  }
}

const timeOfDay = z
  .string()
  .refine((s) => minutesOrNull(s) !== null, {
    message: "expected a time of day as HH:MM",
  });

const jsonScalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const ThermostatSchema = z
  .object({
    dayTime: timeOfDay,
    dayTemperature: z.number(),
    nightTime: timeOfDay,
    nightTemperature: z.number(),
    type: z.string().min(1),
  })
  .refine(
    (t) => {
      const day = minutesOrNull(t.dayTime);
      // malformed times are reported by the field itself
      return day === null || day !== minutesOrNull(t.nightTime);
    },
    {
      message: "dayTime and nightTime must differ",
      path: ["nightTime"],
    }
  );

export const TypeProfileSchema = z.object({
  modeFields: z
    .record(jsonScalar)
    .refine((f) => Object.keys(f).length > 0, "modeFields must not be empty"),
  scheduleKeyPrefix: z.string().min(1).default(DEFAULT_SCHEDULE_KEY_PREFIX),
});

// Names become topic levels, so MQTT separators and wildcards are not allowed.
const DeviceNameSchema = z
  .string()
  .min(1)
  .regex(/^[^/+#]+$/, "device names must not contain '/', '+' or '#'");

export const ConfigSchema = z.object({
  mqtt: z.object({
    url: z.string().min(1),
    clientId: z.string().optional(),
    keepaliveSec: z.number().int().positive().default(60),
    reconnectPeriodSec: z.number().nonnegative().default(5),
    connectTimeoutSec: z.number().positive().default(30),
  }),
  secrets: z
    .object({
      credentials: z.object({
        username: z.string(),
        password: z.string(),
      }),
    })
    .optional(),
  topics: z
    .object({
      base: z.string().min(1).default("zigbee2mqtt"),
      deviceSuffix: z.string().default(DEFAULT_DEVICE_SUFFIX),
      monitorBase: z.string().min(1).default("thermostat_monitor"),
      query: z.string().min(1).default("thermostat_monitor"),
      staleReport: z.string().min(1).default("thermostat_monitor_unseen"),
    })
    .default({}),
  monitor: z
    .object({
      staleAfterSec: z.number().positive().default(3600),
      staleCheckIntervalSec: z.number().positive().default(60),
      replyTimeoutSec: z.number().positive().default(5),
      batteryLowThreshold: z.number().default(DEFAULT_BATTERY_LOW_THRESHOLD),
    })
    .default({}),
  schedule: z
    .object({
      dryRun: z.boolean().default(false),
      publishDelayMs: z.number().nonnegative().default(500),
    })
    .default({}),
  types: z.record(TypeProfileSchema),
  thermostats: z.record(DeviceNameSchema, ThermostatSchema),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface AppConfig {
  mqtt: Config["mqtt"];
  secrets?: Config["secrets"];
  topics: TopicsConfig;
  monitor: Config["monitor"];
  schedule: Config["schedule"];
  registry: TypeProfileRegistry;
  devices: readonly DeviceConfig[];
}

export function parseConfig(raw: unknown): AppConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      "Invalid configuration",
      result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
    );
  }
  const cfg = result.data;
  const devices = Object.entries(cfg.thermostats).map(
    ([name, t]): DeviceConfig => Object.freeze({ name, ...t })
  );
  return {
    mqtt: cfg.mqtt,
    secrets: cfg.secrets,
    topics: Object.freeze({ ...cfg.topics }),
    monitor: cfg.monitor,
    schedule: cfg.schedule,
    registry: new TypeProfileRegistry(cfg.types),
    devices: Object.freeze(devices),
  };
}

export function loadConfig(path: string): AppConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (e) {
    throw new ConfigError(`Cannot read config ${path}: ${describeError(e)}`);
  }
  return parseConfig(raw);
}

/**
 * Config path from CONFIG_PATH, otherwise the given CLI argument.
 */
export function resolveConfigPath(
  arg: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): string | undefined {
  return env.CONFIG_PATH || arg;
}
