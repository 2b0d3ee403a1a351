// src/framers/request-framer.ts

import {
  EMPTY_PIN_CODE,
  ENCRYPTED_MARKER,
  END_MARKER,
  EXTR_MARKER,
  FIELD_SIZES,
  PLAINTEXT_MARKER,
  START_MARKER,
} from '../constants/constants.js';
import { encryptCommand } from '../crypto/command-cipher.js';
import { NbeFrameDecodeError, NbeFrameValidationError } from '../errors.js';
import type { DecodedRequestFrame, RequestFrame } from '../types/nbe-types.js';
import { asciiToBytes, bytesToUtf8, concatUint8Arrays, padField } from '../utils/utils.js';
import { FrameReader, formatAsciiInt } from './frame-helpers.js';
import type { NbeFramer } from './nbe-framer.js';

/** Turns the encrypted part of a request back into the plain body */
export type BodyDecryptor = (cipher: Uint8Array) => Uint8Array;

/**
 * Codec for client -> controller frames.
 *
 * Layout: AppID(12) ControllerID(6) marker(1) | 0x02 Function(2) SeqNo(2)
 * PinCode(10) Timestamp(10) "extr" PayloadLen(3) Payload 0x04.
 * With a public key the part after the marker is RSA encrypted and the
 * marker is `*`.
 */
export class RequestFramer implements NbeFramer<RequestFrame, DecodedRequestFrame> {
  constructor(private readonly decrypt?: BodyDecryptor) {}

  validate(frame: RequestFrame): void {
    if (frame.appId.length === 0) throw new NbeFrameValidationError('AppID');
    if (frame.controllerId.length === 0) throw new NbeFrameValidationError('ControllerID');
    if (frame.payload.length === 0) throw new NbeFrameValidationError('Payload');
  }

  /**
   * Plain frame body from the start marker through the end marker.
   */
  encodeBody(frame: RequestFrame): Uint8Array {
    const timestamp = frame.timestamp ?? new Date();
    const pinCode = frame.pinCode ? padField(frame.pinCode, FIELD_SIZES.PIN_CODE) : EMPTY_PIN_CODE;
    const fields =
      formatAsciiInt(frame.function, FIELD_SIZES.FUNCTION, 'Function') +
      formatAsciiInt(frame.seqNo, FIELD_SIZES.SEQ_NO, 'SeqNo') +
      pinCode +
      formatAsciiInt(Math.floor(timestamp.getTime() / 1000), FIELD_SIZES.TIMESTAMP, 'Timestamp') +
      EXTR_MARKER +
      formatAsciiInt(frame.payload.length, FIELD_SIZES.PAYLOAD_LEN, 'PayloadLen');

    return concatUint8Arrays([
      Uint8Array.of(START_MARKER),
      asciiToBytes(fields),
      frame.payload,
      Uint8Array.of(END_MARKER),
    ]);
  }

  encode(frame: RequestFrame): Uint8Array {
    this.validate(frame);
    const body = this.encodeBody(frame);
    const header =
      padField(frame.appId, FIELD_SIZES.APP_ID) +
      padField(frame.controllerId, FIELD_SIZES.CONTROLLER_ID);

    if (frame.publicKey) {
      return concatUint8Arrays([
        asciiToBytes(header + ENCRYPTED_MARKER),
        encryptCommand(body, frame.publicKey),
      ]);
    }
    return concatUint8Arrays([asciiToBytes(header + PLAINTEXT_MARKER), body]);
  }

  decode(data: Uint8Array): DecodedRequestFrame {
    const reader = new FrameReader(data);
    const appId = reader.readString(FIELD_SIZES.APP_ID, 'AppID');
    const controllerId = reader.readString(FIELD_SIZES.CONTROLLER_ID, 'ControllerID');
    const marker = reader.readString(FIELD_SIZES.ENCRYPTION, 'encryption');
    const encrypted = marker === ENCRYPTED_MARKER;

    let body: FrameReader = reader;
    if (encrypted) {
      if (!this.decrypt) {
        throw new NbeFrameDecodeError('Encrypted request and no private key to read it');
      }
      body = new FrameReader(this.decrypt(reader.rest()));
    }

    body.expectMarker(START_MARKER, 'start marker');
    const fn = body.readInt(FIELD_SIZES.FUNCTION, 'Function');
    const seqNo = body.readInt(FIELD_SIZES.SEQ_NO, 'SeqNo');
    const pinCode = body.readString(FIELD_SIZES.PIN_CODE, 'PinCode');
    const timestamp = body.readInt(FIELD_SIZES.TIMESTAMP, 'Timestamp');
    const extr = body.readString(FIELD_SIZES.EXTR_MARKER, 'extr marker');
    if (extr !== EXTR_MARKER) {
      throw new NbeFrameDecodeError(`Invalid extr marker: "${extr}"`);
    }
    const payloadLen = body.readInt(FIELD_SIZES.PAYLOAD_LEN, 'payload length');
    if (payloadLen < 0) {
      throw new NbeFrameDecodeError(`Invalid payload length: ${payloadLen}`);
    }
    const payload = Uint8Array.from(body.readBytes(payloadLen, 'payload'));
    body.expectMarker(END_MARKER, 'end marker');

    return {
      appId,
      controllerId,
      encrypted,
      function: fn,
      seqNo,
      pinCode,
      timestamp: new Date(timestamp * 1000),
      payload,
    };
  }
}

/**
 * Payload of a decoded request as text.
 */
export function requestPayloadText(frame: DecodedRequestFrame): string {
  return bytesToUtf8(frame.payload);
}
