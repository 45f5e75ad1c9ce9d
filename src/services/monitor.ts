/**
 * monitor.ts
 *
 * Long-running observer that:
 *  - records every device state message in a LivenessTracker
 *  - answers "get" on the query topic with one reply per device on
 *    {monitorBase}/{device}
 *  - publishes a staleness report on a timer when any device is unseen
 */
import { MessageListener, Transport } from "../clients/mqtt";
import { replyTopic, stateTopic } from "../clients/mqtt/topics";
import { AppConfig } from "../common/config";
import { Logger } from "../common/logger";
import { isoOrNull } from "../common/time";
import { LivenessTracker } from "../liveness/tracker";
import { DeviceState, MonitorReply, StalenessReport } from "../types";

export const QUERY_COMMAND = "get";

export function toReply(state: DeviceState): MonitorReply {
  return {
    last_seen: isoOrNull(state.lastSeen),
    state: state.reported,
  };
}

export function buildStalenessReport(
  tracker: LivenessTracker,
  now: Date,
  thresholdSeconds: number
): StalenessReport | null {
  const unseen = tracker.stalenessReport(now, thresholdSeconds);
  if (!unseen.length) return null;
  return {
    timestamp: now.toISOString(),
    unseen: unseen.map((d) => ({ name: d.name, last_seen: isoOrNull(d.lastSeen) })),
  };
}

export class MonitorService {
  readonly tracker: LivenessTracker;
  private readonly topicToName = new Map<string, string>();
  private timer: NodeJS.Timeout | null = null;
  private readonly listener: MessageListener;

  constructor(
    private readonly transport: Transport,
    private readonly config: AppConfig,
    private readonly logger: Logger,
    private readonly clock: () => Date = () => new Date()
  ) {
    const names = config.devices.map((d) => d.name);
    this.tracker = new LivenessTracker(names, logger);
    for (const name of names) {
      this.topicToName.set(stateTopic(name, config.topics), name);
    }
    this.listener = (topic, payload, receivedAt) =>
      this.onMessage(topic, payload, receivedAt);
  }

  async start(): Promise<void> {
    this.transport.on("message", this.listener);
    for (const topic of this.topicToName.keys()) {
      await this.transport.subscribe(topic);
    }
    await this.transport.subscribe(this.config.topics.query);
    this.logger
      .with()
      .num("devices", this.topicToName.size)
      .str("query", this.config.topics.query)
      .logger()
      .info("Monitor subscribed");

    this.timer = setInterval(() => {
      this.publishStaleness().catch((err) =>
        this.logger.with().error(err).logger().error("Staleness report failed")
      );
    }, this.config.monitor.staleCheckIntervalSec * 1000);
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.transport.off("message", this.listener);
    for (const topic of this.topicToName.keys()) {
      await this.transport.unsubscribe(topic);
    }
    await this.transport.unsubscribe(this.config.topics.query);
  }

  onMessage(topic: string, payload: Buffer, receivedAt: Date): void {
    if (topic === this.config.topics.query) {
      const command = payload.toString("utf8").trim().toLowerCase();
      if (command === QUERY_COMMAND) {
        this.answerQuery().catch((err) =>
          this.logger.with().error(err).logger().error("Query reply failed")
        );
      }
      return;
    }

    const name = this.topicToName.get(topic);
    if (!name) return;
    this.tracker.record(name, receivedAt, payload);
    if (this.logger.isDebugEnabled()) {
      this.logger.with().str("device", name).logger().debug("State recorded");
    }
  }

  /**
   * Publishes every device's state and returns how many replies were sent.
   * The snapshot is taken before the first publish, so replies reflect a
   * single point in time. A failed reply is logged and the rest still go out.
   */
  async answerQuery(): Promise<number> {
    const states = this.tracker.snapshotAll();
    let sent = 0;
    for (const [name, state] of states) {
      try {
        await this.transport.publish(
          replyTopic(name, this.config.topics),
          JSON.stringify(toReply(state)),
          { atLeastOnce: true }
        );
        sent++;
      } catch (err) {
        this.logger
          .with()
          .str("device", name)
          .error(err)
          .logger()
          .error("Failed to publish monitor reply");
      }
    }
    this.logger
      .with()
      .num("devices", states.size)
      .num("sent", sent)
      .logger()
      .info("Answered query");
    return sent;
  }

  async publishStaleness(): Promise<StalenessReport | null> {
    const report = buildStalenessReport(
      this.tracker,
      this.clock(),
      this.config.monitor.staleAfterSec
    );
    if (!report) return null;
    this.logger
      .with()
      .array(
        "unseen",
        report.unseen.map((d) => d.name)
      )
      .logger()
      .warn("Devices not seen recently");
    await this.transport.publish(
      this.config.topics.staleReport,
      JSON.stringify(report),
      { atLeastOnce: true }
    );
    return report;
  }
}
