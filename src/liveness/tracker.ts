import { Logger } from "../common/logger";
import { decodePayload, JsonValue } from "../common/values";
import { DeviceState } from "../types";

export interface StaleDevice {
  name: string;
  lastSeen: Date | null;
}

const NEVER_SEEN: DeviceState = { lastSeen: null, reported: null };

/**
 * Last-seen time and last payload per device.
 *
 * Only `record` writes. Reads hand out copies, so a caller holding a
 * snapshot across an await never observes a later write.
 */
export class LivenessTracker {
  private readonly states = new Map<string, DeviceState>();

  constructor(devices: Iterable<string> = [], private readonly logger?: Logger) {
    for (const name of devices) {
      this.states.set(name, NEVER_SEEN);
    }
  }

  /**
   * Stores the payload as JSON when it decodes, otherwise as raw text.
   */
  record(device: string, timestamp: Date, raw: Buffer | string): DeviceState {
    const { value, decoded } = decodePayload(raw);
    if (!decoded) {
      this.logger
        ?.with()
        .str("device", device)
        .logger()
        .debug("State payload is not JSON, keeping raw value");
    }
    const state: DeviceState = {
      lastSeen: new Date(timestamp.getTime()),
      reported: value,
    };
    this.states.set(device, state);
    return copyState(state);
  }

  snapshot(device: string): DeviceState {
    return copyState(this.states.get(device) ?? NEVER_SEEN);
  }

  snapshotAll(): Map<string, DeviceState> {
    const out = new Map<string, DeviceState>();
    for (const [name, state] of this.states) {
      out.set(name, copyState(state));
    }
    return out;
  }

  devices(): string[] {
    return [...this.states.keys()];
  }

  /**
   * Devices never seen, or not seen for more than thresholdSeconds.
   */
  stalenessReport(now: Date, thresholdSeconds: number): StaleDevice[] {
    const limitMs = thresholdSeconds * 1000;
    const stale: StaleDevice[] = [];
    for (const [name, state] of this.states) {
      if (
        state.lastSeen === null ||
        now.getTime() - state.lastSeen.getTime() > limitMs
      ) {
        stale.push({
          name,
          lastSeen: state.lastSeen ? new Date(state.lastSeen.getTime()) : null,
        });
      }
    }
    return stale;
  }
}

function copyState(state: DeviceState): DeviceState {
  return {
    lastSeen: state.lastSeen ? new Date(state.lastSeen.getTime()) : null,
    reported: copyValue(state.reported),
  };
}

function copyValue(v: JsonValue | null): JsonValue | null {
  return v !== null && typeof v === "object" ? structuredClone(v) : v;
}
