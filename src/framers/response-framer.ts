// src/framers/response-framer.ts

import {
  END_MARKER,
  ERROR_SEQUENCE,
  FIELD_SIZES,
  NbeFunction,
  START_MARKER,
} from '../constants/constants.js';
import { NbeFrameDecodeError } from '../errors.js';
import { parsePayload } from '../payload/payload.js';
import type { ResponseFrame, ResponseFrameInit } from '../types/nbe-types.js';
import {
  asciiToBytes,
  bytesToUtf8,
  concatUint8Arrays,
  padField,
  utf8ToBytes,
} from '../utils/utils.js';
import { FrameReader, formatAsciiInt, parseAsciiInt } from './frame-helpers.js';
import type { NbeFramer } from './nbe-framer.js';

/**
 * Codec for controller -> client frames.
 *
 * Layout: AppID(12) ControllerID(6) 0x02 Function(2) SeqNo(2) Status(1)
 * PayloadLen(3) Payload 0x04.
 */
export class ResponseFramer implements NbeFramer<ResponseFrameInit, ResponseFrame> {
  encode(frame: ResponseFrameInit): Uint8Array {
    const payload = utf8ToBytes(frame.payload);
    const fields =
      formatAsciiInt(frame.function, FIELD_SIZES.FUNCTION, 'Function') +
      formatAsciiInt(frame.seqNo, FIELD_SIZES.SEQ_NO, 'SeqNo') +
      formatAsciiInt(frame.status, FIELD_SIZES.STATUS, 'Status') +
      formatAsciiInt(payload.length, FIELD_SIZES.PAYLOAD_LEN, 'PayloadLen');

    return concatUint8Arrays([
      asciiToBytes(
        padField(frame.appId, FIELD_SIZES.APP_ID) +
          padField(frame.controllerId, FIELD_SIZES.CONTROLLER_ID)
      ),
      Uint8Array.of(START_MARKER),
      asciiToBytes(fields),
      payload,
      Uint8Array.of(END_MARKER),
    ]);
  }

  /**
   * Function and SeqNo fall back to -1 when they do not parse; a broken
   * marker, status or length aborts the frame.
   */
  decode(data: Uint8Array): ResponseFrame {
    const reader = new FrameReader(data);
    const appId = reader.readString(FIELD_SIZES.APP_ID, 'AppID');
    const controllerId = reader.readString(FIELD_SIZES.CONTROLLER_ID, 'ControllerID');
    reader.expectMarker(START_MARKER, 'start marker');

    const fn: NbeFunction = reader.readIntOr(
      FIELD_SIZES.FUNCTION,
      'Function',
      NbeFunction.UNKNOWN
    );
    const seqNo = reader.readIntOr(FIELD_SIZES.SEQ_NO, 'SeqNo', ERROR_SEQUENCE);

    const status = reader.readInt(FIELD_SIZES.STATUS, 'Status');
    if (status < 0) {
      throw new NbeFrameDecodeError(`Invalid status: ${status}`);
    }

    // no trimming here: the length field is always three digits
    const lengthText = reader.readString(FIELD_SIZES.PAYLOAD_LEN, 'payload length');
    const payloadLen = parseAsciiInt(lengthText);
    if (payloadLen === null || payloadLen < 0) {
      throw new NbeFrameDecodeError(`Invalid payload length: "${lengthText}"`);
    }

    const payloadText = bytesToUtf8(reader.readBytes(payloadLen, 'payload'));
    reader.expectMarker(END_MARKER, 'end marker');

    return {
      appId,
      controllerId,
      function: fn,
      seqNo,
      status,
      payload: parsePayload(payloadText, fn),
    };
  }
}
