import forge from 'node-forge';
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import BoilerEmulator from '../src/boiler-emulator/boiler-emulator.js';
import { NbeClient } from '../src/client.js';
import { NbeFunction } from '../src/constants/constants.js';
import {
  NbeDiscoveryError,
  NbeEncryptionError,
  NbeFieldOverflowError,
  NbeSendError,
  NbeTimeoutError,
} from '../src/errors.js';
import { describePayload, getRegister } from '../src/payload/payload.js';
import { floatValue, integerValue, textValue } from '../src/payload/register-value.js';
import { NbeSession } from '../src/session.js';
import type { ControllerAddress, ResponseFrame, Transport } from '../src/types/nbe-types.js';
import { UdpTransport } from '../src/transport/udp-transport.js';

describe('NbeClient against the boiler emulator', () => {
  let keyPair: forge.pki.rsa.KeyPair;
  let emulator: BoilerEmulator;
  let client: NbeClient | null = null;

  beforeAll(() => {
    keyPair = forge.pki.rsa.generateKeyPair({ bits: 512, e: 0x10001 });
  });

  beforeEach(async () => {
    emulator = new BoilerEmulator({ keyPair });
    await emulator.start();
  });

  afterEach(async () => {
    await client?.close();
    client = null;
    await emulator.stop();
  });

  function address(pinCode: string = '0123456789'): ControllerAddress {
    return { serial: '0', pinCode, host: '127.0.0.1', port: emulator.port };
  }

  async function connect(pinCode?: string, responseTimeout: number = 1000): Promise<NbeClient> {
    client = await NbeClient.connect(address(pinCode), { responseTimeout });
    return client;
  }

  it('discovers the serial number and loads the public key', async () => {
    const nbe = await connect();
    expect(nbe.isOpen).toBe(true);
    expect(nbe.session.serial).toBe('12345');
    expect(nbe.session.canWrite).toBe(true);
    expect(nbe.session.publicKey?.n.toString(16)).toBe(keyPair.publicKey.n.toString(16));

    expect(emulator.requests.map(r => [r.function, r.seqNo])).toEqual([
      [NbeFunction.DISCOVERY, 1],
      [NbeFunction.GET_SETUP, 2],
    ]);
    expect(emulator.requests[0]?.appId).toMatch(/^[A-Z]{12}$/);
    expect(emulator.requests[0]?.controllerId).toMatch(/^[A-Z]{6}$/);
  });

  it('skips the key request when a key is configured', async () => {
    client = await NbeClient.connect(address(), { publicKey: emulator.publicKeyBase64 });
    expect(client.session.canWrite).toBe(true);
    expect(emulator.requests).toHaveLength(1);
  });

  it('reads settings and operating data', async () => {
    const nbe = await connect();

    const boiler = await nbe.get(NbeFunction.GET_SETUP, 'boiler.*');
    expect(boiler.seqNo).toBe(3);
    expect(boiler.status).toBe(0);
    expect(boiler.payload).toEqual({
      kind: 'registers',
      values: new Map([
        ['temp', integerValue(70)],
        ['diff_over', integerValue(5)],
        ['diff_under', integerValue(5)],
        ['min_return', integerValue(45)],
      ]),
    });

    const data = await nbe.get(NbeFunction.GET_OPERATING_DATA, '*');
    expect(getRegister(data.payload, 'boiler_temp')).toEqual(floatValue(61.5));
    expect(getRegister(data.payload, 'state')).toEqual(integerValue(5));
  });

  it('reads setting ranges', async () => {
    const nbe = await connect();
    const ranges = await nbe.get(NbeFunction.GET_SETUP_RANGE, 'hopper.*');
    expect(getRegister(ranges.payload, 'content')).toEqual({
      kind: 'range',
      min: integerValue(0),
      max: integerValue(1000),
      default: integerValue(250),
      decimals: integerValue(1),
    });
  });

  it('answers asynchronous requests through the callback', async () => {
    const nbe = await connect();
    const answer = new Promise<ResponseFrame>(resolve => {
      nbe.getAsync(NbeFunction.GET_ADVANCED_DATA, 'fan_speed', resolve).catch(() => undefined);
    });
    const response = await answer;
    expect(response.seqNo).toBe(3);
    expect(getRegister(response.payload, 'fan_speed')).toEqual(integerValue(42));
    expect(nbe.pendingCount).toBe(0);
  });

  it('writes a setting with an encrypted request', async () => {
    const nbe = await connect();
    const response = await nbe.set('boiler.temp', '72');

    expect(response.status).toBe(0);
    expect(emulator.getValue('boiler', 'temp')).toBe('72');
    const write = emulator.requests[emulator.requests.length - 1];
    expect(write?.encrypted).toBe(true);
    expect(write?.pinCode).toBe('0123456789');
  });

  it('starts and stops the boiler through misc writes', async () => {
    const nbe = await connect();
    await nbe.set('misc.stop', '1');
    const stopped = await nbe.get(NbeFunction.GET_OPERATING_DATA, 'state');
    expect(getRegister(stopped.payload, 'state')).toEqual(integerValue(14));

    await nbe.set('misc.start', '1');
    const started = await nbe.get(NbeFunction.GET_OPERATING_DATA, 'state');
    expect(getRegister(started.payload, 'state')).toEqual(integerValue(5));
  });

  it('gets a refusal for a wrong PIN code', async () => {
    const nbe = await connect('1111');
    const response = await nbe.set('boiler.temp', '72');

    expect(response.status).toBe(1);
    expect(describePayload(response.payload)).toBe('Wrong PIN code');
    expect(emulator.getValue('boiler', 'temp')).toBe('70');
  });

  it('gets an empty refusal for an unknown path', async () => {
    const nbe = await connect();
    const response = await nbe.get(NbeFunction.GET_SETUP, 'nowhere.*');
    expect(response.status).toBe(1);
    expect(response.payload).toEqual({ kind: 'registers', values: new Map() });
  });

  it('times out and frees the slot when nothing answers', async () => {
    const nbe = await connect(undefined, 150);
    emulator.setMode('silent');

    await expect(nbe.get(NbeFunction.GET_OPERATING_DATA, '*')).rejects.toThrow(NbeTimeoutError);
    expect(nbe.pendingCount).toBe(0);
  });

  it('never hands protocol error frames to a waiting request', async () => {
    const nbe = await connect(undefined, 150);
    emulator.setMode('protocol-error');

    await expect(nbe.get(NbeFunction.GET_OPERATING_DATA, '*')).rejects.toThrow(
      'Timeout waiting for response to request 3 after 150ms'
    );
    expect(nbe.pendingCount).toBe(0);
  });

  it('drops frames that do not decode', async () => {
    const nbe = await connect(undefined, 150);
    emulator.setMode('malformed');

    await expect(nbe.get(NbeFunction.GET_OPERATING_DATA, '*')).rejects.toThrow(NbeTimeoutError);

    emulator.setMode('normal');
    const response = await nbe.get(NbeFunction.GET_OPERATING_DATA, 'state');
    expect(response.seqNo).toBe(4);
  });

  it('fails to connect to a controller that stays silent', async () => {
    emulator.setMode('silent');
    await expect(NbeClient.connect(address(), { responseTimeout: 100 })).rejects.toThrow(
      NbeDiscoveryError
    );
  });

  it('refuses writes before a key is known', async () => {
    const transport = new UdpTransport('127.0.0.1', emulator.port);
    const session = new NbeSession({ serial: '12345', pinCode: '0123456789' });
    client = new NbeClient(transport, session, { responseTimeout: 500 });
    await client.open();

    await expect(client.set('boiler.temp', '72')).rejects.toThrow(NbeEncryptionError);
    const response = await client.get(NbeFunction.DISCOVERY, 'NBE Discovery');
    expect(getRegister(response.payload, 'ip')).toEqual(textValue('127.0.0.1'));
    expect(getRegister(response.payload, 'type')).toEqual(textValue('v13'));
  });

  it('carries non-ASCII text as UTF-8 both ways', async () => {
    const nbe = await connect();
    emulator.setValue('boiler', 'name', 'Kedel æ');
    const read = await nbe.get(NbeFunction.GET_SETUP, 'boiler.name');
    expect(getRegister(read.payload, 'name')).toEqual(textValue('Kedel æ'));

    const write = await nbe.set('boiler.name', 'Ærø');
    expect(write.status).toBe(0);
    expect(emulator.getValue('boiler', 'name')).toBe('Ærø');
  });

  it('frees the slot when a request does not encode', async () => {
    const nbe = await connect();
    await expect(nbe.get(NbeFunction.GET_SETUP, 'x'.repeat(1000))).rejects.toThrow(
      NbeFieldOverflowError
    );
    expect(nbe.pendingCount).toBe(0);

    const next = await nbe.get(NbeFunction.GET_OPERATING_DATA, 'state');
    expect(next.seqNo).toBe(4);
    expect(nbe.pendingCount).toBe(0);
  });

  it('frees the slot when the datagram cannot be sent', async () => {
    const write = vi
      .fn<Transport['write']>()
      .mockRejectedValue(new NbeSendError('Network is unreachable'));
    const transport: Transport = {
      isOpen: true,
      open: () => Promise.resolve(),
      write,
      close: () => Promise.resolve(),
      setFrameHandler: () => undefined,
    };
    client = new NbeClient(transport, new NbeSession({ serial: '12345', pinCode: '0123456789' }));

    await expect(client.get(NbeFunction.GET_OPERATING_DATA, '*')).rejects.toThrow(
      'Failed to send request: Network is unreachable'
    );
    expect(write).toHaveBeenCalledOnce();
    expect(client.pendingCount).toBe(0);
  });
});
