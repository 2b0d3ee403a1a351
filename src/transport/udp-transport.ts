// src/transport/udp-transport.ts

import * as dgram from 'node:dgram';
import { lookup } from 'node:dns/promises';
import { MAX_DATAGRAM_SIZE } from '../constants/constants.js';
import { NbeNotConnectedError, NbeSendError } from '../errors.js';
import { ResponseFramer } from '../framers/response-framer.js';
import { rootLogger } from '../logger.js';
import type { ResponseFrame, Transport, UdpTransportOptions } from '../types/nbe-types.js';
import { toHex } from '../utils/utils.js';
import { DEFAULT_QUEUE_CAPACITY, FrameQueue } from './frame-queue.js';

const logger = rootLogger.createLogger('UdpTransport');

/**
 * UDP socket bound to an ephemeral port, talking to one controller.
 *
 * Datagrams from any other address are ignored. Accepted datagrams are
 * decoded and queued; the queue is drained on a later turn of the event
 * loop so a slow frame handler never holds up the socket.
 */
export class UdpTransport implements Transport {
  public isOpen: boolean = false;
  private readonly host: string;
  private readonly port: number;
  private readonly options: Required<UdpTransportOptions>;
  private readonly framer: ResponseFramer = new ResponseFramer();
  private readonly queue: FrameQueue<ResponseFrame>;

  private socket: dgram.Socket | null = null;
  private remoteAddress: string | null = null;
  private frameHandler: ((frame: ResponseFrame) => void) | null = null;
  private drainScheduled: boolean = false;

  constructor(host: string, port: number, options: UdpTransportOptions = {}) {
    this.host = host;
    this.port = port;
    this.options = {
      bindAddress: options.bindAddress ?? '0.0.0.0',
      queueCapacity: options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
    };
    this.queue = new FrameQueue(this.options.queueCapacity);
  }

  public setFrameHandler(handler: ((frame: ResponseFrame) => void) | null): void {
    this.frameHandler = handler;
  }

  public async open(): Promise<void> {
    if (this.isOpen) return;

    const { address } = await lookup(this.host, { family: 4 });
    this.remoteAddress = address;

    const socket = dgram.createSocket('udp4');
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        socket.close();
        reject(err);
      };
      socket.once('error', onError);
      socket.bind(0, this.options.bindAddress, () => {
        socket.off('error', onError);
        resolve();
      });
    });

    socket.on('message', (msg: Buffer, rinfo: dgram.RemoteInfo) => this._onMessage(msg, rinfo));
    socket.on('error', err => logger.error(`Socket error: ${err.message}`));
    socket.on('close', () => {
      this.isOpen = false;
    });

    this.socket = socket;
    this.isOpen = true;
    const local = socket.address();
    logger.info(
      `Listening on ${local.address}:${local.port} for ${this.remoteAddress}:${this.port}`
    );
  }

  private _onMessage(msg: Buffer, rinfo: dgram.RemoteInfo): void {
    if (rinfo.address !== this.remoteAddress || rinfo.port !== this.port) {
      logger.trace(`Ignoring datagram from ${rinfo.address}:${rinfo.port}`);
      return;
    }
    if (msg.length > MAX_DATAGRAM_SIZE) {
      logger.warn(`Ignoring oversized datagram of ${msg.length} bytes`);
      return;
    }

    let frame: ResponseFrame;
    try {
      frame = this.framer.decode(new Uint8Array(msg));
    } catch (err: unknown) {
      logger.error('Failed to decode response', err, { data: toHex(msg) });
      return;
    }

    if (!this.queue.push(frame)) {
      logger.warn('Receive queue full, dropping frame', {
        seqNo: frame.seqNo,
        function: frame.function,
        capacity: this.queue.capacity,
      });
      return;
    }
    this._scheduleDrain();
  }

  private _scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => {
      this.drainScheduled = false;
      this._drain();
    });
  }

  private _drain(): void {
    let frame = this.queue.shift();
    while (frame !== undefined) {
      if (this.frameHandler) {
        try {
          this.frameHandler(frame);
        } catch (err: unknown) {
          logger.error('Frame handler failed', err, { seqNo: frame.seqNo });
        }
      }
      frame = this.queue.shift();
    }
  }

  public async write(datagram: Uint8Array): Promise<void> {
    const socket = this.socket;
    if (!this.isOpen || !socket) throw new NbeNotConnectedError();

    logger.trace(`>>> ${toHex(datagram)}`);
    await new Promise<void>((resolve, reject) => {
      socket.send(datagram, this.port, this.remoteAddress ?? this.host, err => {
        if (err) reject(new NbeSendError(err.message, err));
        else resolve();
      });
    });
  }

  public async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.queue.clear();
    if (!socket || !this.isOpen) {
      this.isOpen = false;
      return;
    }
    await new Promise<void>(resolve => socket.close(() => resolve()));
    this.isOpen = false;
    logger.info('Socket closed');
  }
}
