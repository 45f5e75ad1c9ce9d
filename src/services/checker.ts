import { AppConfig } from "../common/config";
import { describeError } from "../common/errors";
import { Logger } from "../common/logger";
import { isoOrNull } from "../common/time";
import {
  batteryAnnotation,
  formatReported,
  MismatchReport,
  reconcile,
} from "../reconcile/reconciler";
import { buildExpectedPayload } from "../schedule/payload";
import { StateSource } from "./state-source";

export interface DeviceCheckResult {
  name: string;
  lastSeen: Date | null;
  stale: boolean;
  /** false when no state could be collected before the window closed */
  replied: boolean;
  mismatches: MismatchReport;
  battery: string | null;
  /** configuration problem for this device; it was not reconciled */
  error?: string;
}

export function isHealthy(result: DeviceCheckResult): boolean {
  return (
    !result.error &&
    result.replied &&
    !result.stale &&
    result.mismatches.length === 0
  );
}

/**
 * Reconciles every configured device against the state the source returns.
 * A device with a configuration error is reported and skipped; the others
 * are still checked.
 */
export async function checkDevices(
  config: AppConfig,
  source: StateSource,
  logger: Logger,
  now: () => Date = () => new Date()
): Promise<DeviceCheckResult[]> {
  const names = config.devices.map((d) => d.name);
  const collected = await source.collect(names);
  const checkedAt = now();
  const staleMs = config.monitor.staleAfterSec * 1000;

  const results: DeviceCheckResult[] = [];
  for (const device of config.devices) {
    const entry = collected.get(device.name);
    const state = entry?.state ?? { lastSeen: null, reported: null };
    const base = {
      name: device.name,
      lastSeen: state.lastSeen,
      stale:
        state.lastSeen === null ||
        checkedAt.getTime() - state.lastSeen.getTime() > staleMs,
      replied: entry !== undefined && entry.timeout === undefined,
      battery: batteryAnnotation(
        state.reported,
        config.monitor.batteryLowThreshold
      ),
    };

    if (entry?.timeout) {
      logger.with().str("device", device.name).logger().warn(entry.timeout.message);
    }

    let result: DeviceCheckResult;
    try {
      const { payload } = buildExpectedPayload(
        device,
        config.registry,
        config.topics
      );
      result = { ...base, mismatches: reconcile(payload, state.reported) };
    } catch (err) {
      result = { ...base, mismatches: [], error: describeError(err) };
    }
    logResult(logger, result);
    results.push(result);
  }

  return results.sort((a, b) => a.name.localeCompare(b.name));
}

function logResult(logger: Logger, result: DeviceCheckResult): void {
  const ctx = logger
    .with()
    .str("device", result.name)
    .str("lastSeen", isoOrNull(result.lastSeen))
    .bool("stale", result.stale)
    .bool("replied", result.replied);
  if (result.battery) {
    ctx.str("battery", result.battery);
  }

  if (result.error) {
    ctx.str("error", result.error).logger().error("Device not checked");
    return;
  }
  if (result.mismatches.length) {
    ctx
      .array(
        "mismatches",
        result.mismatches.map(
          (m) =>
            `${m.key}: expected ${JSON.stringify(m.expected)}, got ${formatReported(
              m.reported
            )}`
        )
      )
      .logger()
      .warn("Device state differs from configuration");
    return;
  }
  ctx.logger().info(isHealthy(result) ? "Device OK" : "Device matches, but needs attention");
}
