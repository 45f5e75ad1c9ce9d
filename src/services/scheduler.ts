import { Transport } from "../clients/mqtt";
import { AppConfig } from "../common/config";
import { describeError } from "../common/errors";
import { Logger } from "../common/logger";
import { delay } from "../common/time";
import { buildExpectedPayload } from "../schedule/payload";

export interface ScheduleOutcome {
  applied: string[];
  failed: { name: string; error: string }[];
}

/**
 * Publishes each device's schedule payload to its set topic. A device that
 * fails (unknown type, bad times, publish error) is logged and the rest are
 * still configured.
 */
export async function applySchedules(
  transport: Pick<Transport, "publish">,
  config: AppConfig,
  logger: Logger
): Promise<ScheduleOutcome> {
  const outcome: ScheduleOutcome = { applied: [], failed: [] };
  const { dryRun, publishDelayMs } = config.schedule;

  logger
    .with()
    .num("devices", config.devices.length)
    .str("base", config.topics.base)
    .bool("dryRun", dryRun)
    .logger()
    .info("Configuring thermostats");

  for (const [i, device] of config.devices.entries()) {
    try {
      const { payload, topic, schedule } = buildExpectedPayload(
        device,
        config.registry,
        config.topics
      );
      const log = logger
        .with()
        .str("device", device.name)
        .str("topic", topic)
        .str("schedule", schedule);

      if (dryRun) {
        log.any("payload", payload).logger().info("Dry run, not publishing");
      } else {
        await transport.publish(topic, JSON.stringify(payload), {
          atLeastOnce: true,
        });
        log.logger().info("Schedule sent");
      }
      outcome.applied.push(device.name);
    } catch (err) {
      logger
        .with()
        .str("device", device.name)
        .error(err)
        .logger()
        .error("Failed to configure thermostat");
      outcome.failed.push({ name: device.name, error: describeError(err) });
    }

    if (!dryRun && publishDelayMs > 0 && i < config.devices.length - 1) {
      await delay(publishDelayMs);
    }
  }

  return outcome;
}
