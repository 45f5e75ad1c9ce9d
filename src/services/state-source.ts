import { z } from "zod";
import { MessageListener, Transport } from "../clients/mqtt";
import { replyDeviceName, replyPattern } from "../clients/mqtt/topics";
import { TransportTimeout } from "../common/errors";
import { Logger } from "../common/logger";
import { delay, parseIso } from "../common/time";
import { decodePayload, JsonValue } from "../common/values";
import { DeviceState, TopicsConfig } from "../types";
import { QUERY_COMMAND } from "./monitor";

export interface CollectedState {
  state: DeviceState;
  /** Set when the device's state could not be collected in time. */
  timeout?: TransportTimeout;
}

export interface StateSource {
  collect(devices: readonly string[]): Promise<Map<string, CollectedState>>;
}

const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValue),
    z.record(jsonValue),
  ])
);

export const MonitorReplySchema = z.object({
  last_seen: z.string().nullable(),
  state: jsonValue,
});

/**
 * Asks the monitor for its view of each device and collects replies for a
 * fixed window. Replies are push based, so the window is best effort: a
 * device that stays silent is returned with a TransportTimeout.
 */
export class MonitorQueryStateSource implements StateSource {
  constructor(
    private readonly transport: Transport,
    private readonly topics: TopicsConfig,
    private readonly windowMs: number,
    private readonly logger: Logger
  ) {}

  async collect(devices: readonly string[]) {
    const wanted = new Set(devices);
    const replies = new Map<string, DeviceState>();

    const listener: MessageListener = (topic, payload) => {
      const name = replyDeviceName(topic, this.topics);
      if (name === null || !wanted.has(name)) return;
      const state = this.parseReply(name, payload);
      if (state) replies.set(name, state);
    };

    this.transport.on("message", listener);
    const pattern = replyPattern(this.topics);
    try {
      await this.transport.subscribe(pattern);
      await this.transport.publish(this.topics.query, QUERY_COMMAND, {
        atLeastOnce: true,
      });
      await delay(this.windowMs);
    } finally {
      this.transport.off("message", listener);
      await this.transport.unsubscribe(pattern).catch((err) =>
        this.logger
          .with()
          .str("topic", pattern)
          .error(err)
          .logger()
          .warn("Unsubscribe from monitor replies failed")
      );
    }

    const out = new Map<string, CollectedState>();
    for (const name of devices) {
      const state = replies.get(name);
      if (state) {
        out.set(name, { state });
      } else {
        out.set(name, {
          state: { lastSeen: null, reported: null },
          timeout: new TransportTimeout(name, this.windowMs),
        });
      }
    }
    return out;
  }

  private parseReply(name: string, payload: Buffer): DeviceState | null {
    const { value } = decodePayload(payload);
    const parsed = MonitorReplySchema.safeParse(value);
    if (!parsed.success) {
      this.logger
        .with()
        .str("device", name)
        .logger()
        .warn("Ignoring malformed monitor reply");
      return null;
    }
    return {
      lastSeen: parseIso(parsed.data.last_seen),
      reported: parsed.data.state,
    };
  }
}
