// src/mqtt/mqtt-bus.ts

import { connect, type IClientOptions } from 'mqtt';
import { MqttBusError } from '../errors.js';
import { rootLogger } from '../logger.js';
import { toJson } from '../payload/register-value.js';
import type {
  ChangeSet,
  MqttConnection,
  MqttMessageHandler,
  MqttQos,
  MqttSettings,
} from '../types/nbe-types.js';
import { joinTopic, topicMatches } from './topics.js';

const logger = rootLogger.createLogger('MqttBus');

export type MqttConnector = (url: string, options: IClientOptions) => MqttConnection;

export interface MqttBusOptions {
  clientId: string;
  /** Prepended to every relative topic */
  prefix: string;
  /** Relative topic receiving `offline` when the connection drops */
  statusTopic?: string;
  connectTimeout?: number;
  reconnectPeriod?: number;
  connector?: MqttConnector;
}

interface Subscription {
  filter: string;
  qos: MqttQos;
  handler: MqttMessageHandler;
}

export const ONLINE = 'online';
export const OFFLINE = 'offline';

/**
 * Publishes register changes under `<prefix>/<category>/<key>` and routes
 * incoming messages to subscription handlers.
 */
export class MqttBus {
  public readonly prefix: string;
  private readonly settings: MqttSettings;
  private readonly options: Required<MqttBusOptions>;
  private readonly subscriptions: Subscription[] = [];
  private client: MqttConnection | null = null;

  constructor(settings: MqttSettings, options: MqttBusOptions) {
    this.settings = settings;
    this.prefix = options.prefix;
    this.options = {
      clientId: options.clientId,
      prefix: options.prefix,
      statusTopic: options.statusTopic ?? 'device/status',
      connectTimeout: options.connectTimeout ?? 30_000,
      reconnectPeriod: options.reconnectPeriod ?? 5_000,
      connector: options.connector ?? connect,
    };
  }

  get isConnected(): boolean {
    return this.client?.connected ?? false;
  }

  /**
   * Connects and resolves on the first CONNACK. Later reconnects restore the
   * subscriptions.
   */
  async connect(): Promise<void> {
    if (this.client) return;

    const client = this.options.connector(this.settings.url, {
      clientId: this.options.clientId,
      username: this.settings.username,
      password: this.settings.password,
      connectTimeout: this.options.connectTimeout,
      reconnectPeriod: this.options.reconnectPeriod,
      will: {
        topic: this.topic(this.options.statusTopic),
        payload: OFFLINE,
        qos: 0,
        retain: true,
      },
    });
    this.client = client;

    client.on('message', (topic, payload) => this._dispatch(topic, payload.toString('utf8')));
    client.on('offline', () => logger.warn('Broker connection lost'));
    client.on('reconnect', () => logger.info('Reconnecting to broker'));

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        reject(new MqttBusError(`Timed out connecting to ${this.settings.url}`));
      }, this.options.connectTimeout);

      client.on('connect', () => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          resolve();
          return;
        }
        logger.info('Reconnected to broker');
        this._resubscribe().catch((err: unknown) => {
          logger.error('Failed to restore subscriptions', err);
        });
      });
      client.on('error', err => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          const message = `Failed to connect to ${this.settings.url}: ${err.message}`;
          reject(new MqttBusError(message, err));
          return;
        }
        logger.error(`Broker error: ${err.message}`);
      });
    }).catch(async (err: unknown) => {
      this.client = null;
      await client.endAsync();
      throw err;
    });

    logger.info(`Connected to ${this.settings.url}`, { prefix: this.prefix });
  }

  /** Absolute topic for a topic relative to the prefix */
  topic(relative: string): string {
    return joinTopic(this.prefix, relative);
  }

  /**
   * Publishes each change retained at QoS 0. A failed message is logged and
   * does not stop the others.
   */
  async publishMany(category: string, changes: ChangeSet): Promise<void> {
    const client = this._requireClient();
    const publishes = Array.from(changes, async ([key, value]) => {
      const topic = this.topic(`${category}/${key}`);
      try {
        await client.publishAsync(topic, toJson(value), { qos: 0, retain: true });
      } catch (err: unknown) {
        logger.error(`Failed to publish ${topic}`, err, { category });
      }
    });
    await Promise.all(publishes);
  }

  /** Publishes a document on an absolute topic */
  async publishJson(topic: string, document: unknown, retain: boolean = true): Promise<void> {
    await this._publish(topic, JSON.stringify(document), retain);
  }

  /** Publishes plain text on a topic relative to the prefix */
  async publishText(relative: string, text: string, retain: boolean = true): Promise<void> {
    await this._publish(this.topic(relative), text, retain);
  }

  async publishStatus(online: boolean): Promise<void> {
    await this.publishText(this.options.statusTopic, online ? ONLINE : OFFLINE);
  }

  /**
   * Subscribes to a filter relative to the prefix. The handler receives the
   * absolute topic and the payload as text.
   */
  async subscribe(relative: string, handler: MqttMessageHandler, qos: MqttQos = 1): Promise<void> {
    const client = this._requireClient();
    const subscription: Subscription = { filter: this.topic(relative), qos, handler };
    this.subscriptions.push(subscription);
    try {
      await client.subscribeAsync(subscription.filter, { qos });
    } catch (err: unknown) {
      this.subscriptions.splice(this.subscriptions.indexOf(subscription), 1);
      throw new MqttBusError(`Failed to subscribe to ${subscription.filter}`, err);
    }
    logger.debug(`Subscribed to ${subscription.filter}`);
  }

  /** Publishes `offline` and disconnects */
  async end(): Promise<void> {
    const client = this.client;
    if (!client) return;
    if (client.connected) {
      try {
        await this.publishStatus(false);
      } catch (err: unknown) {
        logger.warn('Failed to publish offline status', err);
      }
    }
    this.client = null;
    this.subscriptions.length = 0;
    await client.endAsync();
    logger.info('Disconnected from broker');
  }

  private async _publish(topic: string, message: string, retain: boolean): Promise<void> {
    const client = this._requireClient();
    try {
      await client.publishAsync(topic, message, { qos: 0, retain });
    } catch (err: unknown) {
      throw new MqttBusError(`Failed to publish ${topic}`, err);
    }
  }

  private async _resubscribe(): Promise<void> {
    const client = this._requireClient();
    for (const { filter, qos } of this.subscriptions) {
      await client.subscribeAsync(filter, { qos });
    }
  }

  private _dispatch(topic: string, payload: string): void {
    for (const { filter, handler } of this.subscriptions) {
      if (!topicMatches(filter, topic)) continue;
      try {
        handler(topic, payload);
      } catch (err: unknown) {
        logger.error(`Handler for ${filter} failed`, err);
      }
    }
  }

  private _requireClient(): MqttConnection {
    if (!this.client) throw new MqttBusError('MQTT bus is not connected');
    return this.client;
  }
}
