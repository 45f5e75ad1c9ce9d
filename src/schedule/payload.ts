import { commandTopic } from "../clients/mqtt/topics";
import type { JsonScalar } from "../common/values";
import { DeviceConfig, ExpectedPayload, TopicsConfig, WEEKDAYS } from "../types";
import { formatSchedule, generateSchedule } from "./generator";
import { TypeProfileRegistry } from "./profiles";

export interface DeviceCommand {
  payload: ExpectedPayload;
  topic: string;
  schedule: string;
}

export function scheduleKey(prefix: string, weekday: string): string {
  return `${prefix}_${weekday}`;
}

/**
 * Full set payload for one device: the type's mode fields plus the same
 * schedule string for every weekday. Throws UnknownTypeError or ParseError
 * for a misconfigured device.
 */
export function buildExpectedPayload(
  device: DeviceConfig,
  registry: TypeProfileRegistry,
  topics: TopicsConfig
): DeviceCommand {
  const profile = registry.resolve(device.type);
  const schedule = formatSchedule(
    generateSchedule(
      device.dayTime,
      device.dayTemperature,
      device.nightTime,
      device.nightTemperature
    )
  );

  const payload: Record<string, JsonScalar> = { ...profile.modeFields };
  for (const weekday of WEEKDAYS) {
    payload[scheduleKey(profile.scheduleKeyPrefix, weekday)] = schedule;
  }

  return {
    payload: Object.freeze(payload),
    topic: commandTopic(device.name, topics),
    schedule,
  };
}
