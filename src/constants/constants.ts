// src/constants/constants.ts

/**
 * NBE function codes
 */
export enum NbeFunction {
  DISCOVERY = 0,
  GET_SETUP = 1,
  SET_SETUP = 2,
  GET_SETUP_RANGE = 3,
  GET_OPERATING_DATA = 4,
  GET_ADVANCED_DATA = 5,
  GET_CONSUMPTION_DATA = 6,
  GET_CHART_DATA = 7,
  GET_EVENT_LOG = 8,
  GET_INFO = 9,
  GET_AVAILABLE_PROGRAMS = 10,
  UNKNOWN = -1,
}

export const FUNCTION_NAMES: ReadonlyMap<number, string> = new Map<NbeFunction, string>([
  [NbeFunction.DISCOVERY, 'DISCOVERY'],
  [NbeFunction.GET_SETUP, 'GET_SETUP'],
  [NbeFunction.SET_SETUP, 'SET_SETUP'],
  [NbeFunction.GET_SETUP_RANGE, 'GET_SETUP_RANGE'],
  [NbeFunction.GET_OPERATING_DATA, 'GET_OPERATING_DATA'],
  [NbeFunction.GET_ADVANCED_DATA, 'GET_ADVANCED_DATA'],
  [NbeFunction.GET_CONSUMPTION_DATA, 'GET_CONSUMPTION_DATA'],
  [NbeFunction.GET_CHART_DATA, 'GET_CHART_DATA'],
  [NbeFunction.GET_EVENT_LOG, 'GET_EVENT_LOG'],
  [NbeFunction.GET_INFO, 'GET_INFO'],
  [NbeFunction.GET_AVAILABLE_PROGRAMS, 'GET_AVAILABLE_PROGRAMS'],
  [NbeFunction.UNKNOWN, 'UNKNOWN'],
]);

/**
 * Frame field widths, in bytes
 */
export const FIELD_SIZES = {
  APP_ID: 12,
  CONTROLLER_ID: 6,
  ENCRYPTION: 1,
  FUNCTION: 2,
  SEQ_NO: 2,
  STATUS: 1,
  PIN_CODE: 10,
  TIMESTAMP: 10,
  EXTR_MARKER: 4,
  PAYLOAD_LEN: 3,
} as const;

export const START_MARKER = 0x02;
export const END_MARKER = 0x04;
export const EXTR_MARKER = 'extr';
export const ENCRYPTED_MARKER = '*';
export const PLAINTEXT_MARKER = ' ';
export const EMPTY_PIN_CODE = '0000000000';

/** Size of the RSA plaintext block used for authenticated writes */
export const RSA_BLOCK_SIZE = 64;

/** Sequence numbers live in [0, SEQUENCE_SPACE) */
export const SEQUENCE_SPACE = 100;
/** Sequence number the device uses for protocol error frames */
export const ERROR_SEQUENCE = -1;

export const DEFAULT_RESPONSE_TIMEOUT = 3000;
export const DEFAULT_CONTROLLER_PORT = 8483;
export const MAX_DATAGRAM_SIZE = 1024;

export const DISCOVERY_PAYLOAD = 'NBE Discovery';
export const RSA_KEY_PATH = 'misc.rsa_key';

export const SETTINGS_POLL_INTERVAL = 10_000;
export const DATA_POLL_INTERVAL = 5_000;

/**
 * Setting groups exposed by the controller, polled with GET_SETUP `<group>.*`
 */
export const SETTING_CATEGORIES = [
  'boiler',
  'hot_water',
  'regulation',
  'weather',
  'weather2',
  'oxygen',
  'cleaning',
  'hopper',
  'fan',
  'auger',
  'ignition',
  'pump',
  'sun',
  'vacuum',
  'misc',
  'alarm',
  'manual',
] as const;

export type SettingCategory = (typeof SETTING_CATEGORIES)[number];

export const OPERATING_DATA_CATEGORY = 'operating_data';
export const ADVANCED_DATA_CATEGORY = 'advanced_data';

/** Boiler state the controller reports while switched off */
export const IDLE_STATE = 14;

/**
 * Names for the operating-data `state` register
 */
export const POWER_STATES: Readonly<Record<number, string>> = {
  0: 'Waiting',
  1: 'Ignition 1',
  2: 'Ignition 2',
  3: 'Ignition 3',
  4: 'Ignition 4',
  5: 'Power',
  6: 'Modulation',
  7: 'Stopped',
  8: 'Safety time',
  9: 'Back pressure',
  10: 'Cleaning',
  11: 'Alarm',
  12: 'Stop fire',
  13: 'Heating up',
  14: 'Off',
  15: 'Suspended',
  16: 'Hot water',
  17: 'Sun',
};

/** Response status codes */
export const STATUS_OK = 0;
export const STATUS_DENIED = 1;
