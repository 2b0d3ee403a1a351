// src/boiler-emulator/boiler-emulator.ts

import * as dgram from 'node:dgram';
import forge from 'node-forge';
import {
  ADVANCED_DATA_CATEGORY,
  END_MARKER,
  ERROR_SEQUENCE,
  FIELD_SIZES,
  IDLE_STATE,
  NbeFunction,
  OPERATING_DATA_CATEGORY,
  RSA_KEY_PATH,
  STATUS_DENIED,
  STATUS_OK,
} from '../constants/constants.js';
import { decryptCommand, exportPublicKey } from '../crypto/command-cipher.js';
import { NbeError } from '../errors.js';
import { RequestFramer, requestPayloadText } from '../framers/request-framer.js';
import { ResponseFramer } from '../framers/response-framer.js';
import { rootLogger } from '../logger.js';
import type {
  BoilerEmulatorOptions,
  DecodedRequestFrame,
  EmulatorMode,
  LoggerInstance,
  RegisterTable,
} from '../types/nbe-types.js';
import { asciiToBytes, concatUint8Arrays, padField, toHex } from '../utils/utils.js';
import defaults from './default-registers.json' with { type: 'json' };

/** State reported after a `misc.start` write */
const RUNNING_STATE = 5;

interface Reply {
  status: number;
  payload: string;
}

function toRegisterMap(values: Record<string, string>): Map<string, string> {
  return new Map(Object.entries(values));
}

function serialize(values: Iterable<[string, string]>): string {
  return Array.from(values, ([key, value]) => `${key}=${value}`).join(';');
}

/**
 * In-process NBE controller on a loopback UDP socket.
 *
 * Answers discovery, setting, range and data reads from its register tables,
 * and decrypts authenticated writes with its own RSA key.
 */
class BoilerEmulator {
  public readonly serial: string;
  public readonly pinCode: string;
  public readonly host: string;
  public readonly keyPair: forge.pki.rsa.KeyPair;
  /** Every request decoded so far, oldest first */
  public readonly requests: DecodedRequestFrame[] = [];
  public mode: EmulatorMode = 'normal';

  private readonly settings: Map<string, Map<string, string>>;
  private readonly operatingData: Map<string, string>;
  private readonly advancedData: Map<string, string>;
  private readonly ranges: Map<string, string>;
  private readonly requestFramer: RequestFramer;
  private readonly responseFramer: ResponseFramer = new ResponseFramer();
  private readonly logger: LoggerInstance;
  private socket: dgram.Socket | null = null;

  constructor(options: BoilerEmulatorOptions = {}) {
    this.serial = options.serial ?? '12345';
    this.pinCode = options.pinCode ?? '0123456789';
    this.host = options.host ?? '127.0.0.1';
    this.keyPair = options.keyPair ?? forge.pki.rsa.generateKeyPair({ bits: 512, e: 0x10001 });

    const settings: RegisterTable = options.settings ?? defaults.settings;
    this.settings = new Map(
      Object.entries(settings).map(([group, values]) => [group, toRegisterMap(values)])
    );
    this.operatingData = toRegisterMap(options.operatingData ?? defaults.operatingData);
    this.advancedData = toRegisterMap(options.advancedData ?? defaults.advancedData);
    this.ranges = toRegisterMap(options.ranges ?? defaults.ranges);

    const privateKey = this.keyPair.privateKey;
    this.requestFramer = new RequestFramer(cipher => decryptCommand(cipher, privateKey));

    this.logger = rootLogger.createLogger('BoilerEmulator');
    this.logger.setLevel(options.loggerEnabled ? 'info' : 'error');
  }

  /** Base64 SubjectPublicKeyInfo, as returned for `misc.rsa_key` */
  get publicKeyBase64(): string {
    return exportPublicKey(this.keyPair.publicKey);
  }

  get port(): number {
    if (!this.socket) throw new NbeError('Emulator is not running');
    return this.socket.address().port;
  }

  get isRunning(): boolean {
    return this.socket !== null;
  }

  /** Binds an ephemeral port and returns it */
  async start(): Promise<number> {
    if (this.socket) return this.port;

    const socket = dgram.createSocket('udp4');
    await new Promise<void>((resolve, reject) => {
      socket.once('error', reject);
      socket.bind(0, this.host, () => {
        socket.off('error', reject);
        resolve();
      });
    });
    socket.on('message', (msg: Buffer, rinfo: dgram.RemoteInfo) => {
      const reply = this.handleRequest(new Uint8Array(msg));
      if (!reply) return;
      socket.send(reply, rinfo.port, rinfo.address, err => {
        if (err) this.logger.error(`Failed to answer ${rinfo.address}:${rinfo.port}`, err);
      });
    });
    socket.on('error', err => this.logger.error(`Socket error: ${err.message}`));

    this.socket = socket;
    this.logger.info(`Listening on ${this.host}:${this.port}`, { serial: this.serial });
    return this.port;
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    await new Promise<void>(resolve => socket.close(() => resolve()));
    this.logger.info('Stopped', { serial: this.serial });
  }

  setMode(mode: EmulatorMode): void {
    this.mode = mode;
  }

  /**
   * Stores a raw register value. `category` is a setting group,
   * `operating_data` or `advanced_data`.
   */
  setValue(category: string, key: string, value: string): void {
    this._table(category, true).set(key, value);
  }

  getValue(category: string, key: string): string | undefined {
    return this._table(category, false)?.get(key);
  }

  /**
   * Answers one datagram; null means no answer is sent.
   */
  handleRequest(datagram: Uint8Array): Uint8Array | null {
    let request: DecodedRequestFrame;
    try {
      request = this.requestFramer.decode(datagram);
    } catch (err: unknown) {
      this.logger.warn('Dropping undecodable request', err, { data: toHex(datagram) });
      return null;
    }
    this.requests.push(request);

    const context = { seqNo: request.seqNo, function: request.function };
    this.logger.info(`Request ${requestPayloadText(request)}`, context);

    switch (this.mode) {
      case 'silent':
        return null;
      case 'malformed':
        return this._malformedReply(request);
      case 'protocol-error':
        return this._encode(request, ERROR_SEQUENCE, {
          status: STATUS_DENIED,
          payload: 'error=Unsupported request',
        });
      case 'normal':
        return this._encode(request, request.seqNo, this._answer(request));
    }
  }

  private _answer(request: DecodedRequestFrame): Reply {
    const path = requestPayloadText(request);
    switch (request.function) {
      case NbeFunction.DISCOVERY:
        return {
          status: STATUS_OK,
          payload: serialize([
            ['serial', this.serial],
            ['ip', this.host],
            ['type', 'v13'],
          ]),
        };
      case NbeFunction.GET_SETUP:
        if (path === RSA_KEY_PATH) {
          return { status: STATUS_OK, payload: `rsa_key=${this.publicKeyBase64}` };
        }
        return this._read(this._settingsLookup(path));
      case NbeFunction.SET_SETUP:
        return this._write(request, path);
      case NbeFunction.GET_SETUP_RANGE:
        return this._read(this._rangeLookup(path));
      case NbeFunction.GET_OPERATING_DATA:
        return this._read(this._select(this.operatingData, path));
      case NbeFunction.GET_ADVANCED_DATA:
        return this._read(this._select(this.advancedData, path));
      default:
        return { status: STATUS_DENIED, payload: '' };
    }
  }

  private _read(values: Array<[string, string]> | null): Reply {
    if (values === null) return { status: STATUS_DENIED, payload: '' };
    return { status: STATUS_OK, payload: serialize(values) };
  }

  /** `<group>.*` or `<group>.<key>` */
  private _settingsLookup(path: string): Array<[string, string]> | null {
    const [group = '', key = ''] = path.split('.', 2);
    const table = this.settings.get(group);
    return table ? this._select(table, key) : null;
  }

  private _rangeLookup(path: string): Array<[string, string]> | null {
    const [group = '', key = ''] = path.split('.', 2);
    const matches = Array.from(this.ranges).filter(([name]) =>
      key === '*' ? name.startsWith(`${group}.`) : name === path
    );
    if (matches.length === 0) return null;
    return matches.map(([name, value]) => [name.slice(group.length + 1), value]);
  }

  private _select(table: Map<string, string>, key: string): Array<[string, string]> | null {
    if (key === '*') return Array.from(table);
    const value = table.get(key);
    return value === undefined ? null : [[key, value]];
  }

  private _write(request: DecodedRequestFrame, command: string): Reply {
    if (!request.encrypted) {
      return { status: STATUS_DENIED, payload: 'error=Encryption required' };
    }
    if (request.pinCode !== padField(this.pinCode, FIELD_SIZES.PIN_CODE)) {
      this.logger.warn('Rejected write with wrong PIN code', { seqNo: request.seqNo });
      return { status: STATUS_DENIED, payload: 'error=Wrong PIN code' };
    }

    const eq = command.indexOf('=');
    const [group = '', key = ''] = command.slice(0, Math.max(eq, 0)).split('.', 2);
    const table = this.settings.get(group);
    if (eq < 0 || !table || key === '') {
      return { status: STATUS_DENIED, payload: 'error=Unknown setting' };
    }

    const value = command.slice(eq + 1);
    table.set(key, value);
    if (group === 'misc' && key === 'start') {
      this.operatingData.set('state', String(RUNNING_STATE));
    } else if (group === 'misc' && key === 'stop') {
      this.operatingData.set('state', String(IDLE_STATE));
    }
    this.logger.info(`Set ${group}.${key} to ${value}`, { seqNo: request.seqNo });
    return { status: STATUS_OK, payload: '' };
  }

  private _table(category: string, create: true): Map<string, string>;
  private _table(category: string, create: false): Map<string, string> | undefined;
  private _table(category: string, create: boolean): Map<string, string> | undefined {
    if (category === OPERATING_DATA_CATEGORY) return this.operatingData;
    if (category === ADVANCED_DATA_CATEGORY) return this.advancedData;
    let table = this.settings.get(category);
    if (!table && create) {
      table = new Map();
      this.settings.set(category, table);
    }
    return table;
  }

  private _encode(request: DecodedRequestFrame, seqNo: number, reply: Reply): Uint8Array {
    return this.responseFramer.encode({
      appId: request.appId,
      controllerId: request.controllerId,
      function: request.function,
      seqNo,
      status: reply.status,
      payload: reply.payload,
    });
  }

  /** Correct ids and a broken start marker */
  private _malformedReply(request: DecodedRequestFrame): Uint8Array {
    return concatUint8Arrays([
      asciiToBytes(request.appId + request.controllerId),
      Uint8Array.of(0x7f),
      asciiToBytes('0100000'),
      Uint8Array.of(END_MARKER),
    ]);
  }
}

export default BoilerEmulator;
