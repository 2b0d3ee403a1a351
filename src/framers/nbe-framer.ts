// src/framers/nbe-framer.ts

/**
 * Common shape of the request and response codecs.
 *
 * `TOut` is what a peer sends, `TIn` what comes out of decoding it.
 */
export interface NbeFramer<TOut, TIn> {
  /**
   * Builds the datagram for one frame
   */
  encode(frame: TOut): Uint8Array;

  /**
   * Parses one datagram, throwing NbeFrameDecodeError on malformed input
   */
  decode(data: Uint8Array): TIn;
}
