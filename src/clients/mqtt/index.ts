import * as mqtt from "mqtt";
import type { IClientOptions, MqttClient } from "mqtt";
import events from "events";
import { Logger } from "../../common/logger";

function getRequiredProperty<
  C extends Record<string, unknown>,
  P extends keyof C & string
>(config: C, propName: P): NonNullable<C[P]> {
  const value = config[propName];
  if (value !== undefined && value !== null) {
    return value;
  }
  throw new Error("Missing required configuration property '" + propName + "'");
}

function getProperty<C, P extends keyof C, DEFAULT extends C[P]>(
  config: C,
  propName: P,
  defaultValue: DEFAULT
): Exclude<C[P], undefined> | DEFAULT {
  const value = config[propName];
  if (value !== undefined) {
    return value as Exclude<C[P], undefined>;
  } else {
    return defaultValue;
  }
}

export interface PublishOptions {
  /** QoS 1 when true, QoS 0 otherwise. */
  atLeastOnce?: boolean;
  retain?: boolean;
}

export type MessageListener = (
  topic: string,
  payload: Buffer,
  receivedAt: Date
) => void;

/**
 * What the scheduler, monitor and checker need from a broker connection.
 */
export interface Transport {
  subscribe(pattern: string): Promise<void>;
  unsubscribe(pattern: string): Promise<void>;
  publish(
    topic: string,
    payload: string | Buffer,
    options?: PublishOptions
  ): Promise<void>;
  on(event: "message", listener: MessageListener): this;
  off(event: "message", listener: MessageListener): this;
  end(): Promise<void>;
}

export type MqttTransportOptions = {
  serverUrl: string;
  username?: string;
  password?: string;
  clientId?: string;
  keepalive?: number;
  /** ms between reconnect attempts, 0 disables reconnecting */
  reconnectPeriod?: number;
  connectTimeout?: number;
  logger: Logger;
  mqttOptions?: Omit<
    IClientOptions,
    | "clientId"
    | "clean"
    | "keepalive"
    | "reconnectPeriod"
    | "connectTimeout"
    | "username"
    | "password"
  >;
};

export interface MqttTransport extends events.EventEmitter {
  /** MQTT client event */
  on(
    event: "connect" | "close" | "reconnect" | "offline" | "end",
    listener: () => void
  ): this;
  /** MQTT client event */
  on(event: "error", listener: (error: Error) => void): this;
  on(event: "message", listener: MessageListener): this;

  emit(event: "connect" | "close" | "reconnect" | "offline" | "end"): boolean;
  emit(event: "error", error: Error): boolean;
  emit(
    event: "message",
    topic: string,
    payload: Buffer,
    receivedAt: Date
  ): boolean;
}

/*
 * Thin wrapper over mqtt.js: connection lifecycle, logging and promise based
 * subscribe/publish.
 */
export class MqttTransport extends events.EventEmitter implements Transport {
  private serverUrl: string;
  private mqttOptions: IClientOptions;

  private client: MqttClient;
  private connecting = false;
  private connected = false;
  private readonly connectedOnce: Promise<void>;

  private logger: Logger;

  constructor(config: MqttTransportOptions) {
    super();
    this.logger = getRequiredProperty(config, "logger");
    this.serverUrl = getRequiredProperty(config, "serverUrl");

    const username = getProperty(config, "username", undefined);
    const password = getProperty(config, "password", undefined);
    const clientId = getProperty(
      config,
      "clientId",
      `thermostat-${process.pid}-${Date.now().toString(36)}`
    );

    this.mqttOptions = {
      ...(config.mqttOptions || {}),
      clientId,
      clean: true,
      keepalive: getProperty(config, "keepalive", 60),
      reconnectPeriod: getProperty(config, "reconnectPeriod", 5000),
      connectTimeout: getProperty(config, "connectTimeout", 30000),
      username,
      password,
    };

    let resolveConnected: () => void = () => {};
    let rejectConnected: (e: Error) => void = () => {};
    this.connectedOnce = new Promise<void>((resolve, reject) => {
      resolveConnected = resolve;
      rejectConnected = reject;
    });
    // waitForConnect() may never be called
    this.connectedOnce.catch(() => undefined);

    this.client = this.init(resolveConnected, rejectConnected);
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * Resolves on the first successful connection, rejects if the first
   * attempt fails.
   */
  waitForConnect(): Promise<void> {
    return this.connectedOnce;
  }

  subscribe(pattern: string): Promise<void> {
    this.logger.info(`Subscribing to topic: ${pattern}`);
    return new Promise((resolve, reject) => {
      this.client.subscribe(pattern, { qos: 1 }, (err) =>
        err ? reject(err) : resolve()
      );
    });
  }

  unsubscribe(pattern: string): Promise<void> {
    this.logger.info(`Unsubscribing topic: ${pattern}`);
    return new Promise((resolve, reject) => {
      this.client.unsubscribe(pattern, (err) =>
        err ? reject(err) : resolve()
      );
    });
  }

  publish(
    topic: string,
    payload: string | Buffer,
    options: PublishOptions = {}
  ): Promise<void> {
    const qos = options.atLeastOnce ? 1 : 0;
    if (this.logger.isDebugEnabled()) {
      this.logger
        .with()
        .str("topic", topic)
        .num("qos", qos)
        .logger()
        .debug("Publishing message");
    }
    return new Promise((resolve, reject) => {
      this.client.publish(
        topic,
        payload,
        { qos, retain: options.retain ?? false },
        (err) => (err ? reject(err) : resolve())
      );
    });
  }

  end(): Promise<void> {
    return new Promise((resolve) => {
      this.client.end(false, {}, () => resolve());
    });
  }

  // Configures and connects the client
  private init(
    onFirstConnect: () => void,
    onFirstFailure: (e: Error) => void
  ): MqttClient {
    this.connecting = true;
    this.logger.info("Attempting to connect: " + this.serverUrl);
    const client = mqtt.connect(this.serverUrl, this.mqttOptions);

    client.on("connect", () => {
      this.logger.info("Client has connected");
      this.connecting = false;
      this.connected = true;
      onFirstConnect();
      this.emit("connect");
    });

    client.on("error", (error) => {
      this.logger.with().error(error).logger().error("MQTT error");
      if (this.connecting) {
        this.connecting = false;
        onFirstFailure(error);
      }
      // an unhandled "error" event would throw
      if (this.listenerCount("error") > 0) {
        this.emit("error", error);
      }
    });

    client.on("close", () => {
      if (this.connected) {
        this.connected = false;
        this.emit("close");
      }
    });

    client.on("reconnect", () => {
      this.logger.info("Reconnecting");
      this.emit("reconnect");
    });

    client.on("offline", () => {
      this.logger.warn("Client is offline");
      this.emit("offline");
    });

    client.on("end", () => {
      this.emit("end");
    });

    client.on("message", (topic, message) => {
      const receivedAt = new Date();
      if (this.logger.isTraceEnabled()) {
        this.logger
          .with()
          .str("topic", topic)
          .num("bytes", message.length)
          .logger()
          .trace(`Received message on topic ${topic}`);
      }
      this.emit("message", topic, message, receivedAt);
    });

    return client;
  }
}

export function newTransport(config: MqttTransportOptions): MqttTransport {
  return new MqttTransport(config);
}
