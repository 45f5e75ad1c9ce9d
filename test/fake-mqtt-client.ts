import events from "events";

type Callback = (err?: Error | null) => void;

/**
 * Stand-in for mqtt.js' MqttClient, returned by a mocked mqtt.connect.
 */
export class FakeMqttClient extends events.EventEmitter {
  static instances: FakeMqttClient[] = [];

  readonly subscribed: { topic: string; options: unknown }[] = [];
  readonly unsubscribed: string[] = [];
  readonly published: { topic: string; payload: unknown; options: unknown }[] = [];
  publishError: Error | null = null;
  ended = false;

  constructor(readonly url: string, readonly options: Record<string, unknown>) {
    super();
    FakeMqttClient.instances.push(this);
  }

  subscribe(topic: string, options: unknown, cb: Callback) {
    this.subscribed.push({ topic, options });
    cb(null);
    return this;
  }

  unsubscribe(topic: string, cb: Callback) {
    this.unsubscribed.push(topic);
    cb();
    return this;
  }

  publish(topic: string, payload: unknown, options: unknown, cb: Callback) {
    this.published.push({ topic, payload, options });
    cb(this.publishError ?? undefined);
    return this;
  }

  end(_force: boolean, _opts: unknown, cb: () => void) {
    this.ended = true;
    cb();
    return this;
  }

  static latest(): FakeMqttClient {
    const client = FakeMqttClient.instances[FakeMqttClient.instances.length - 1];
    if (!client) throw new Error("mqtt.connect was not called");
    return client;
  }
}
