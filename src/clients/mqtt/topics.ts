import { TopicsConfig } from "../../types";

export const DEFAULT_DEVICE_SUFFIX = " Thermostat";

export function deviceDisplayName(name: string, topics: TopicsConfig): string {
  return `${name}${topics.deviceSuffix}`;
}

// zigbee2mqtt publishes device state on {base}/{friendly name}
export function stateTopic(name: string, topics: TopicsConfig): string {
  return `${topics.base}/${deviceDisplayName(name, topics)}`;
}

export function commandTopic(name: string, topics: TopicsConfig): string {
  return `${stateTopic(name, topics)}/set`;
}

export function replyTopic(name: string, topics: TopicsConfig): string {
  return `${topics.monitorBase}/${name}`;
}

export function replyPattern(topics: TopicsConfig): string {
  return `${topics.monitorBase}/+`;
}

/**
 * Device name from a reply topic, or null when the topic is not a reply.
 */
export function replyDeviceName(
  topic: string,
  topics: TopicsConfig
): string | null {
  const prefix = `${topics.monitorBase}/`;
  if (!topic.startsWith(prefix)) return null;
  const name = topic.slice(prefix.length);
  return name && !name.includes("/") ? name : null;
}

/**
 * MQTT topic filter matching with single-level (+) and multi-level (#)
 * wildcards.
 */
export function topicMatches(filter: string, topic: string): boolean {
  const f = filter.split("/");
  const t = topic.split("/");
  for (let i = 0; i < f.length; i++) {
    if (f[i] === "#") return true;
    if (i >= t.length) return false;
    if (f[i] !== "+" && f[i] !== t[i]) return false;
  }
  return f.length === t.length;
}
