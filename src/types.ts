import type { JsonScalar, JsonValue } from "./common/values";

export interface DeviceConfig {
  name: string;
  dayTime: string; // "HH:MM"
  dayTemperature: number;
  nightTime: string;
  nightTemperature: number;
  type: string;
}

export interface TypeProfile {
  typeName: string;
  modeFields: Readonly<Record<string, JsonScalar>>;
  scheduleKeyPrefix: string;
}

export interface SchedulePoint {
  minutes: number; // since midnight, 0..1439
  temperature: number;
}

export type ExpectedPayload = Readonly<Record<string, JsonScalar>>;

export interface DeviceState {
  lastSeen: Date | null; // null = never seen
  reported: JsonValue | null; // parsed JSON, or the raw text when not JSON
}

export interface TopicsConfig {
  base: string; // e.g. zigbee2mqtt
  deviceSuffix: string;
  monitorBase: string;
  query: string;
  staleReport: string;
}

export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
] as const;

/** Reply published by the monitor for each device. */
export interface MonitorReply {
  last_seen: string | null;
  state: JsonValue | null;
}

export interface StalenessReport {
  timestamp: string;
  unseen: { name: string; last_seen: string | null }[];
}
