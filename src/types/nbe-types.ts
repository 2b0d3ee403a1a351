// src/types/nbe-types.ts

import type forge from 'node-forge';
import type { NbeFunction } from '../constants/constants.js';

// !=============================================================================
// ! Register values
// !=============================================================================

/** Signed 32-bit integer register */
export interface IntegerValue {
  kind: 'integer';
  value: number;
}

/** Float register, compared and rendered with two decimals */
export interface FloatValue {
  kind: 'float';
  value: number;
}

/** Anything that is neither an integer nor a float */
export interface TextValue {
  kind: 'text';
  value: string;
}

export type ScalarValue = IntegerValue | FloatValue | TextValue;

/** Setting bounds, only returned by GET_SETUP_RANGE */
export interface RangeValue {
  kind: 'range';
  min: ScalarValue;
  max: ScalarValue;
  default: ScalarValue;
  decimals: ScalarValue;
}

export type RegisterValue = ScalarValue | RangeValue;

/** Ordered key -> value mapping, as received or as changed */
export type RegisterMap = Map<string, RegisterValue>;

export type ChangeSet = RegisterMap;

// !=============================================================================
// ! Frames
// !=============================================================================

/** Parsed RSA public key of a controller */
export type RsaPublicKey = forge.pki.rsa.PublicKey;

export interface RequestFrame {
  appId: string;
  controllerId: string;
  function: NbeFunction;
  seqNo: number;
  pinCode?: string;
  /** Filled with the current time on encode when absent */
  timestamp?: Date;
  payload: Uint8Array;
  /** Presence switches the frame to the encrypted form */
  publicKey?: RsaPublicKey;
}

/** Request as seen by the controller side after decoding */
export interface DecodedRequestFrame {
  appId: string;
  controllerId: string;
  encrypted: boolean;
  function: NbeFunction;
  seqNo: number;
  pinCode: string;
  timestamp: Date;
  payload: Uint8Array;
}

export type ResponsePayload =
  | { kind: 'registers'; values: RegisterMap }
  | { kind: 'error'; error: string };

export interface ResponseFrame {
  appId: string;
  controllerId: string;
  /** -1 when the function field did not parse */
  function: NbeFunction;
  /** -1 marks a protocol error frame */
  seqNo: number;
  status: number;
  payload: ResponsePayload;
}

/** Response fields used when building a frame on the controller side */
export interface ResponseFrameInit {
  appId: string;
  controllerId: string;
  function: NbeFunction;
  seqNo: number;
  status: number;
  payload: string;
}

export type ResponseCallback = (response: ResponseFrame) => void;

// !=============================================================================
// ! Transport and client
// !=============================================================================

export interface ControllerAddress {
  serial: string;
  pinCode: string;
  host: string;
  port: number;
}

export interface UdpTransportOptions {
  /** Interface to bind the local socket to */
  bindAddress?: string;
  /** Capacity of the receive queue */
  queueCapacity?: number;
}

export interface NbeClientOptions extends UdpTransportOptions {
  /** Milliseconds a synchronous request waits for its answer */
  responseTimeout?: number;
  /** Base64 SubjectPublicKeyInfo; skips fetching misc.rsa_key */
  publicKey?: string;
}

/** Frame-level transport the client talks through */
export interface Transport {
  readonly isOpen: boolean;
  open(): Promise<void>;
  write(datagram: Uint8Array): Promise<void>;
  close(): Promise<void>;
  setFrameHandler(handler: ((frame: ResponseFrame) => void) | null): void;
}

// !=============================================================================
// ! Logging
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  seqNo?: number;
  function?: number;
  category?: string;
  serial?: string;
  responseTime?: number;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogFormatField =
  | 'timestamp'
  | 'level'
  | 'logger'
  | 'serial'
  | 'category'
  | 'function'
  | 'seqNo'
  | 'responseTime';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
}

// !=============================================================================
// ! Polling
// !=============================================================================

export interface PollingManagerConfig {
  defaultTaskTimeout?: number;
}

export interface PollingTaskOptions<T = unknown> {
  id: string;
  name?: string;
  interval: number;
  fn(): Promise<T>;
  /** A run still pending after this many ms counts as failed */
  taskTimeout?: number;
}

export interface PollingTaskStats {
  totalRuns: number;
  successes: number;
  failures: number;
  lastError: Error | null;
  lastRunTime: number | null;
}

export interface PollingSystemStats {
  totalTasks: number;
  runningTasks: number;
  tasks: Record<string, PollingTaskStats>;
}

// !=============================================================================
// ! Monitor
// !=============================================================================

/** Receives the change set of every successful poll cycle */
export type ChangeSetPublisher = (category: string, changes: ChangeSet) => void;

/** Read side of the client used by the monitor */
export interface RegisterReader {
  get(fn: NbeFunction, path: string): Promise<ResponseFrame>;
}

export interface CategoryMonitorOptions {
  category: string;
  function: NbeFunction;
  path: string;
  interval: number;
  /** Adds state_text and state_on next to a changed state */
  deriveState?: boolean;
}

export interface BoilerMonitorOptions {
  /** Setting groups to poll; all known groups by default */
  categories?: readonly string[];
  settingsInterval?: number;
  dataInterval?: number;
}

// !=============================================================================
// ! MQTT
// !=============================================================================

export type MqttQos = 0 | 1 | 2;

/** Subset of the mqtt client the bus drives */
export interface MqttConnection {
  readonly connected: boolean;
  publishAsync(
    topic: string,
    message: string,
    options: { qos: MqttQos; retain: boolean }
  ): Promise<unknown>;
  subscribeAsync(topic: string, options: { qos: MqttQos }): Promise<unknown>;
  endAsync(): Promise<void>;
  on(event: 'connect' | 'reconnect' | 'offline' | 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  on(event: 'message', listener: (topic: string, payload: Buffer) => void): unknown;
}

export type MqttMessageHandler = (topic: string, payload: string) => void;

/** Write side of the client used by MQTT commands */
export interface SettingWriter {
  setAsync(path: string, value: string, callback: ResponseCallback): Promise<number>;
}

// !=============================================================================
// ! Configuration
// !=============================================================================

export interface MqttSettings {
  url: string;
  username?: string;
  password?: string;
  /** Topic prefix taken from the URL path; defaults to nbe/<serial> */
  prefix?: string;
}

export interface BridgeConfig {
  logLevel: LogLevel;
  controller: ControllerAddress;
  mqtt: MqttSettings;
  homeAssistant: boolean;
}

// !=============================================================================
// ! Emulator
// !=============================================================================

/** How the emulator answers requests */
export type EmulatorMode = 'normal' | 'silent' | 'malformed' | 'protocol-error';

/** Raw register text per setting group, as sent on the wire */
export type RegisterTable = Record<string, Record<string, string>>;

export interface BoilerEmulatorOptions {
  serial?: string;
  pinCode?: string;
  /** Address to bind to, 127.0.0.1 by default */
  host?: string;
  /** Reused key pair; a fresh 512-bit pair is generated otherwise */
  keyPair?: forge.pki.rsa.KeyPair;
  settings?: RegisterTable;
  operatingData?: Record<string, string>;
  advancedData?: Record<string, string>;
  /** `<group>.<key>` -> `min,max,default,decimals` */
  ranges?: Record<string, string>;
  loggerEnabled?: boolean;
}
