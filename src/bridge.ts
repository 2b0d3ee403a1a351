// src/bridge.ts

import { NbeClient } from './client.js';
import { publishDiscovery } from './homeassistant/discovery.js';
import { rootLogger } from './logger.js';
import { BoilerMonitor } from './monitor/boiler-monitor.js';
import { SET_TOPIC_FILTER, createSetCommandHandler } from './mqtt/commands.js';
import { MqttBus, type MqttConnector } from './mqtt/mqtt-bus.js';
import { defaultPrefix } from './mqtt/topics.js';
import { textValue } from './payload/register-value.js';
import type {
  BoilerMonitorOptions,
  BridgeConfig,
  ChangeSet,
  NbeClientOptions,
} from './types/nbe-types.js';

const logger = rootLogger.createLogger('Bridge');

export interface BridgeOptions {
  client?: NbeClientOptions;
  monitor?: BoilerMonitorOptions;
  /** Replaces the mqtt package's connect, e.g. with an in-process broker */
  mqttConnector?: MqttConnector;
}

/**
 * A running bridge: one controller session, one broker connection and the
 * pollers between them.
 */
export class Bridge {
  public readonly client: NbeClient;
  public readonly bus: MqttBus;
  public readonly monitor: BoilerMonitor;
  /** Settles once Home Assistant discovery was published; null when disabled */
  public readonly discovery: Promise<number> | null;
  private stopped: boolean = false;

  constructor(
    client: NbeClient,
    bus: MqttBus,
    monitor: BoilerMonitor,
    discovery: Promise<number> | null
  ) {
    this.client = client;
    this.bus = bus;
    this.monitor = monitor;
    this.discovery = discovery;
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.monitor.stop();
    try {
      await this.bus.end();
    } finally {
      await this.client.close();
    }
    logger.info('Bridge stopped');
  }
}

/**
 * Connects to the controller and the broker, then starts polling. Setting
 * topics under `<prefix>/set/` are turned into authenticated writes.
 */
export async function startBridge(
  config: BridgeConfig,
  options: BridgeOptions = {}
): Promise<Bridge> {
  const client = await NbeClient.connect(config.controller, options.client);
  const serial = client.session.serial;
  logger.info(`Connected to boiler at ${config.controller.host}`, { serial });

  const prefix = config.mqtt.prefix ?? defaultPrefix(serial);
  const bus = new MqttBus(config.mqtt, {
    clientId: `nbemqtt-${serial}`,
    prefix,
    connector: options.mqttConnector,
  });

  try {
    await bus.connect();
    await bus.subscribe(SET_TOPIC_FILTER, createSetCommandHandler(client));
    await bus.publishStatus(true);
    await bus.publishMany(
      'device',
      new Map([
        ['serial', textValue(serial)],
        ['ip_address', textValue(config.controller.host)],
      ])
    );
  } catch (err: unknown) {
    await bus.end();
    await client.close();
    throw err;
  }
  logger.info(`Publishing on "${prefix}"`, { serial });

  const publish = (category: string, changes: ChangeSet): void => {
    if (changes.size === 0) return;
    bus.publishMany(category, changes).catch((err: unknown) => {
      logger.error('Failed to publish changes', err, { category });
    });
  };
  const monitor = new BoilerMonitor(client, publish, options.monitor);
  monitor.start();

  let discovery: Promise<number> | null = null;
  if (config.homeAssistant) {
    discovery = publishDiscovery(bus, serial, prefix, monitor.whenReady()).catch(
      (err: unknown) => {
        logger.error('Home Assistant discovery failed', err, { serial });
        return 0;
      }
    );
  }

  return new Bridge(client, bus, monitor, discovery);
}
