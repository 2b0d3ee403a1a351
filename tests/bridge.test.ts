import forge from 'node-forge';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import BoilerEmulator from '../src/boiler-emulator/boiler-emulator.js';
import { startBridge, type Bridge, type BridgeOptions } from '../src/bridge.js';
import { MqttBusError } from '../src/errors.js';
import type { BridgeConfig } from '../src/types/nbe-types.js';
import { recordingConnector, type RecordingConnector } from './helpers/fake-mqtt.js';

describe('bridge', () => {
  let keyPair: forge.pki.rsa.KeyPair;
  let emulator: BoilerEmulator;
  let mqtt: RecordingConnector;
  let bridge: Bridge | null = null;

  beforeAll(() => {
    keyPair = forge.pki.rsa.generateKeyPair({ bits: 512, e: 0x10001 });
  });

  beforeEach(async () => {
    emulator = new BoilerEmulator({ keyPair });
    await emulator.start();
    mqtt = recordingConnector(true);
  });

  afterEach(async () => {
    await bridge?.stop();
    bridge = null;
    await emulator.stop();
  });

  function config(overrides: Partial<BridgeConfig> = {}): BridgeConfig {
    return {
      logLevel: 'error',
      controller: { serial: '0', pinCode: '0123456789', host: '127.0.0.1', port: emulator.port },
      mqtt: { url: 'mqtt://broker:1883' },
      homeAssistant: true,
      ...overrides,
    };
  }

  function options(): BridgeOptions {
    return {
      client: { responseTimeout: 1000 },
      monitor: {
        categories: ['boiler', 'hot_water'],
        settingsInterval: 60_000,
        dataInterval: 60_000,
      },
      mqttConnector: mqtt.connector,
    };
  }

  it('publishes device info, registers and discovery', async () => {
    bridge = await startBridge(config(), options());
    const { connection } = mqtt;

    expect(mqtt.calls[0]?.options.clientId).toBe('nbemqtt-12345');
    expect(connection.subscribed).toEqual([{ topic: 'nbe/12345/set/+/+', qos: 1 }]);
    expect(connection.last('nbe/12345/device/status')).toBe('online');
    expect(connection.last('nbe/12345/device/serial')).toBe('"12345"');
    expect(connection.last('nbe/12345/device/ip_address')).toBe('"127.0.0.1"');

    await expect(bridge.discovery).resolves.toBe(23);
    expect(connection.last('nbe/12345/boiler/temp')).toBe('70');
    expect(connection.last('nbe/12345/hot_water/temp')).toBe('55');
    expect(connection.last('nbe/12345/operating_data/boiler_temp')).toBe('61.50');
    expect(connection.last('nbe/12345/operating_data/state_text')).toBe('"Power"');
    expect(connection.last('nbe/12345/operating_data/state_on')).toBe('"ON"');

    const switchConfig = connection.last('homeassistant/switch/nbe_12345/power_switch/config');
    expect(switchConfig && JSON.parse(switchConfig)).toMatchObject({
      uniq_id: 'nbe_12345_power_switch',
      state_topic: 'nbe/12345/operating_data/state_on',
      cmd_t: 'nbe/12345/set/device/power_switch',
      avty_t: 'nbe/12345/device/status',
    });
  });

  it('turns set topics into controller writes', async () => {
    bridge = await startBridge(config({ homeAssistant: false }), options());
    expect(bridge.discovery).toBeNull();

    mqtt.connection.deliver('nbe/12345/set/boiler/temp', '75');
    await vi.waitFor(() => expect(emulator.getValue('boiler', 'temp')).toBe('75'));

    mqtt.connection.deliver('nbe/12345/set/device/power_switch', 'OFF');
    await vi.waitFor(() => expect(emulator.getValue('operating_data', 'state')).toBe('14'));
  });

  it('uses the prefix from the broker URI', async () => {
    bridge = await startBridge(
      config({ mqtt: { url: 'mqtt://broker:1883', prefix: 'home/boiler' }, homeAssistant: false }),
      options()
    );
    expect(mqtt.connection.subscribed).toEqual([{ topic: 'home/boiler/set/+/+', qos: 1 }]);
    expect(mqtt.connection.last('home/boiler/device/status')).toBe('online');
  });

  it('announces offline and closes both sides on stop', async () => {
    const running = await startBridge(config({ homeAssistant: false }), options());
    await running.stop();

    expect(mqtt.connection.last('nbe/12345/device/status')).toBe('offline');
    expect(mqtt.connection.ended).toBe(true);
    expect(running.client.isOpen).toBe(false);
    expect(running.monitor.getStats().runningTasks).toBe(0);
  });

  it('closes the controller session when the broker refuses', async () => {
    mqtt = recordingConnector(new Error('Connection refused: Not authorized'));
    await expect(startBridge(config(), options())).rejects.toBeInstanceOf(MqttBusError);
    expect(mqtt.connection.ended).toBe(true);
  });
});
