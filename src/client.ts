// src/client.ts

import {
  DEFAULT_RESPONSE_TIMEOUT,
  ERROR_SEQUENCE,
  NbeFunction,
} from './constants/constants.js';
import {
  NbeDiscoveryError,
  NbeEncryptionError,
  NbeProtocolError,
  NbeTimeoutError,
} from './errors.js';
import { RequestFramer } from './framers/request-framer.js';
import { rootLogger } from './logger.js';
import { describePayload } from './payload/payload.js';
import { NbeSession, discover } from './session.js';
import { PendingRequestTable } from './transport/pending-requests.js';
import { UdpTransport } from './transport/udp-transport.js';
import type {
  ControllerAddress,
  NbeClientOptions,
  RegisterReader,
  ResponseCallback,
  ResponseFrame,
  RsaPublicKey,
  Transport,
} from './types/nbe-types.js';
import { utf8ToBytes } from './utils/utils.js';

const logger = rootLogger.createLogger('NbeClient');

/** What a caller supplies; ids and sequence number come from the client */
export interface NbeRequest {
  function: NbeFunction;
  payload: string;
  pinCode?: string;
  publicKey?: RsaPublicKey;
}

/**
 * Request/response correlation over one transport.
 *
 * Every request takes the next sequence number and parks its callback in the
 * pending table; responses are matched back by sequence number. Nothing is
 * retried here.
 */
export class NbeClient implements RegisterReader {
  public readonly session: NbeSession;
  private readonly transport: Transport;
  private readonly pending: PendingRequestTable = new PendingRequestTable();
  private readonly framer: RequestFramer = new RequestFramer();
  private readonly responseTimeout: number;

  constructor(transport: Transport, session: NbeSession, options: NbeClientOptions = {}) {
    this.transport = transport;
    this.session = session;
    this.responseTimeout = options.responseTimeout ?? DEFAULT_RESPONSE_TIMEOUT;
    this.transport.setFrameHandler(frame => {
      this._dispatch(frame).catch((err: unknown) => {
        logger.error('Failed to dispatch response', err, { seqNo: frame.seqNo });
      });
    });
  }

  /**
   * Opens a UDP session to a controller: discovery first, then the public
   * key (fetched unless `options.publicKey` is given).
   */
  static async connect(
    controller: ControllerAddress,
    options: NbeClientOptions = {}
  ): Promise<NbeClient> {
    const transport = new UdpTransport(controller.host, controller.port, options);
    const client = new NbeClient(transport, NbeSession.fromController(controller), options);
    try {
      await client.open();
      await discover(client, client.session, options.publicKey);
    } catch (err: unknown) {
      await client.close();
      if (err instanceof NbeDiscoveryError) throw err;
      throw new NbeDiscoveryError(err instanceof Error ? err.message : String(err), err);
    }
    logger.info(`Connected to ${controller.host}:${controller.port}`, {
      serial: client.session.serial,
    });
    return client;
  }

  async open(): Promise<void> {
    await this.transport.open();
  }

  get isOpen(): boolean {
    return this.transport.isOpen;
  }

  /** Number of requests still waiting for an answer */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Sends a request and returns its sequence number; `callback` runs when the
   * matching response arrives. Nothing stays registered if the send fails.
   */
  async sendAsync(request: NbeRequest, callback: ResponseCallback): Promise<number> {
    const { seqNo, replaced } = await this.pending.register(callback);
    const context = { seqNo, function: request.function };
    if (replaced) {
      logger.warn('Sequence number reused while a request was still pending', context);
    }

    try {
      const datagram = this.framer.encode({
        appId: this.session.appId,
        controllerId: this.session.controllerId,
        function: request.function,
        seqNo,
        pinCode: request.pinCode,
        payload: utf8ToBytes(request.payload),
        publicKey: request.publicKey,
      });
      await this.transport.write(datagram);
    } catch (err: unknown) {
      await this.pending.release(seqNo, callback);
      throw err;
    }

    logger.debug(`send ${request.publicKey ? '<encrypted>' : request.payload}`, context);
    return seqNo;
  }

  /**
   * Sends a request and waits for its response, failing with
   * NbeTimeoutError after the response timeout.
   */
  async send(request: NbeRequest): Promise<ResponseFrame> {
    const started = Date.now();
    let settle: ResponseCallback = () => undefined;
    const answered = new Promise<ResponseFrame>(resolve => {
      settle = resolve;
    });
    const callback: ResponseCallback = response => settle(response);

    const seqNo = await this.sendAsync(request, callback);

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new NbeTimeoutError(seqNo, this.responseTimeout)),
        this.responseTimeout
      );
    });

    try {
      const response = await Promise.race([answered, timedOut]);
      logger.debug('Response received', {
        seqNo,
        function: request.function,
        responseTime: Date.now() - started,
      });
      return response;
    } catch (err: unknown) {
      await this.pending.release(seqNo, callback);
      logger.warn('Request timed out', { seqNo, function: request.function });
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }

  async get(fn: NbeFunction, path: string): Promise<ResponseFrame> {
    return this.send({ function: fn, payload: path });
  }

  async getAsync(fn: NbeFunction, path: string, callback: ResponseCallback): Promise<number> {
    return this.sendAsync({ function: fn, payload: path }, callback);
  }

  /**
   * Authenticated write of one setting, e.g. `set('boiler.temp', '70')`.
   */
  async set(path: string, value: string): Promise<ResponseFrame> {
    return this.send(this._setRequest(path, value));
  }

  async setAsync(path: string, value: string, callback: ResponseCallback): Promise<number> {
    return this.sendAsync(this._setRequest(path, value), callback);
  }

  private _setRequest(path: string, value: string): NbeRequest {
    const publicKey = this.session.publicKey;
    if (!publicKey) {
      throw new NbeEncryptionError();
    }
    return {
      function: NbeFunction.SET_SETUP,
      payload: `${path}=${value}`,
      pinCode: this.session.pinCode,
      publicKey,
    };
  }

  private async _dispatch(frame: ResponseFrame): Promise<void> {
    const context = { seqNo: frame.seqNo, function: frame.function };

    if (frame.seqNo === ERROR_SEQUENCE) {
      logger.error(new NbeProtocolError(describePayload(frame.payload)).message, context);
      return;
    }

    logger.debug(`recv status=${frame.status}`, context);
    const callback = await this.pending.take(frame.seqNo);
    if (!callback) {
      logger.info(`Sequence ${frame.seqNo} has no callback`, context);
      return;
    }

    try {
      callback(frame);
    } catch (err: unknown) {
      logger.error('Response callback failed', err, context);
    }
  }

  /**
   * Closes the socket and forgets every pending request. Synchronous waiters
   * run into their timeout.
   */
  async close(): Promise<void> {
    this.transport.setFrameHandler(null);
    await this.transport.close();
    await this.pending.clear();
  }
}
