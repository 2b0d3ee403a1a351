// src/session.ts

import {
  DISCOVERY_PAYLOAD,
  FIELD_SIZES,
  NbeFunction,
  RSA_KEY_PATH,
} from './constants/constants.js';
import { parsePublicKey } from './crypto/command-cipher.js';
import { NbeDiscoveryError } from './errors.js';
import { rootLogger } from './logger.js';
import { getRegister } from './payload/payload.js';
import { formatValue } from './payload/register-value.js';
import type { ControllerAddress, RegisterReader, RsaPublicKey } from './types/nbe-types.js';
import { randomLetters } from './utils/utils.js';

const logger = rootLogger.createLogger('Session');

export interface SessionInit {
  serial: string;
  pinCode: string;
  appId?: string;
  controllerId?: string;
}

/**
 * Identity of one client/controller conversation.
 */
export class NbeSession {
  readonly appId: string;
  readonly controllerId: string;
  readonly pinCode: string;
  serial: string;
  publicKey: RsaPublicKey | null = null;

  constructor(init: SessionInit) {
    this.appId = init.appId ?? randomLetters(FIELD_SIZES.APP_ID);
    this.controllerId = init.controllerId ?? randomLetters(FIELD_SIZES.CONTROLLER_ID);
    this.serial = init.serial;
    this.pinCode = init.pinCode;
  }

  static fromController(controller: ControllerAddress): NbeSession {
    return new NbeSession({ serial: controller.serial, pinCode: controller.pinCode });
  }

  get canWrite(): boolean {
    return this.publicKey !== null;
  }
}

/**
 * Runs discovery, then loads the controller's public key unless one is given.
 */
export async function discover(
  reader: RegisterReader,
  session: NbeSession,
  publicKey?: string
): Promise<void> {
  const answer = await reader.get(NbeFunction.DISCOVERY, DISCOVERY_PAYLOAD);
  const serial = getRegister(answer.payload, 'serial');
  if (!serial) {
    throw new NbeDiscoveryError('controller did not report a serial number');
  }
  session.serial = formatValue(serial);
  logger.info('Controller discovered', { serial: session.serial });

  let keyText = publicKey;
  if (keyText === undefined) {
    const response = await reader.get(NbeFunction.GET_SETUP, RSA_KEY_PATH);
    const key = getRegister(response.payload, 'rsa_key');
    if (!key) {
      throw new NbeDiscoveryError('controller did not return misc.rsa_key');
    }
    keyText = formatValue(key);
  }
  session.publicKey = parsePublicKey(keyText);
  logger.debug('RSA public key loaded', { serial: session.serial });
}
