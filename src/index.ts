/**
 * index.ts
 *
 * Command line entry point:
 *  - schedule: publish every thermostat's day/night schedule
 *  - monitor:  track device liveness, answer queries, report stale devices
 *  - check:    query the monitor and compare each device with its config
 *
 * Usage: node dist/index.js <schedule|monitor|check> [config.json]
 * (CONFIG_PATH overrides the config argument)
 */
import { newTransport, MqttTransport } from "./clients/mqtt";
import { AppConfig, loadConfig, resolveConfigPath } from "./common/config";
import { getLogger } from "./common/logger";
import { checkDevices, isHealthy } from "./services/checker";
import { MonitorService } from "./services/monitor";
import { applySchedules } from "./services/scheduler";
import { MonitorQueryStateSource } from "./services/state-source";

const COMMANDS = ["schedule", "monitor", "check"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(s: string | undefined): s is Command {
  return COMMANDS.some((c) => c === s);
}

const logger = getLogger();

function connect(config: AppConfig): MqttTransport {
  return newTransport({
    serverUrl: config.mqtt.url,
    clientId: config.mqtt.clientId,
    username: config.secrets?.credentials.username,
    password: config.secrets?.credentials.password,
    keepalive: config.mqtt.keepaliveSec,
    reconnectPeriod: config.mqtt.reconnectPeriodSec * 1000,
    connectTimeout: config.mqtt.connectTimeoutSec * 1000,
    logger,
  });
}

async function runSchedule(config: AppConfig): Promise<number> {
  if (config.schedule.dryRun) {
    const outcome = await applySchedules(offlineTransport, config, logger);
    return outcome.failed.length ? 1 : 0;
  }
  const transport = connect(config);
  try {
    await transport.waitForConnect();
    const outcome = await applySchedules(transport, config, logger);
    logger
      .with()
      .num("applied", outcome.applied.length)
      .num("failed", outcome.failed.length)
      .logger()
      .info("Configuration complete");
    return outcome.failed.length ? 1 : 0;
  } finally {
    await transport.end();
  }
}

async function runCheck(config: AppConfig): Promise<number> {
  const transport = connect(config);
  try {
    await transport.waitForConnect();
    const source = new MonitorQueryStateSource(
      transport,
      config.topics,
      config.monitor.replyTimeoutSec * 1000,
      logger
    );
    const results = await checkDevices(config, source, logger);
    const unhealthy = results.filter((r) => !isHealthy(r));
    logger
      .with()
      .num("devices", results.length)
      .array(
        "unhealthy",
        unhealthy.map((r) => r.name)
      )
      .logger()
      .info("Check complete");
    return unhealthy.length ? 1 : 0;
  } finally {
    await transport.end();
  }
}

async function runMonitor(config: AppConfig): Promise<void> {
  const transport = connect(config);
  await transport.waitForConnect();
  const monitor = new MonitorService(transport, config, logger);
  await monitor.start();

  // Graceful shutdown
  function shutdown(sig: string) {
    logger.info(`Received ${sig}, shutting down...`);
    monitor
      .stop()
      .catch((err) =>
        logger.with().error(err).logger().warn("Unsubscribe on shutdown failed")
      )
      .finally(() => transport.end())
      .finally(() => process.exit(0));
  }
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

// Dry runs never touch the broker
const offlineTransport = {
  async publish(): Promise<void> {
    throw new Error("Publishing is disabled in dry-run mode");
  },
};

async function main(): Promise<void> {
  const command = process.argv[2];
  if (!isCommand(command)) {
    console.error(
      `Usage: ${COMMANDS.join("|")} [config.json] (or set CONFIG_PATH)`
    );
    process.exit(1);
  }
  const configPath = resolveConfigPath(process.argv[3]);
  if (!configPath) {
    console.error(
      "Please provide the path to the configuration file as an argument."
    );
    process.exit(1);
  }
  const config = loadConfig(configPath);

  switch (command) {
    case "schedule":
      process.exitCode = await runSchedule(config);
      break;
    case "check":
      process.exitCode = await runCheck(config);
      break;
    case "monitor":
      await runMonitor(config);
      break;
  }
}

main().catch((err) => {
  logger.with().error(err).logger().error("Fatal startup error");
  process.exit(1);
});
