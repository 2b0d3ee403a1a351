import * as dgram from 'node:dgram';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { NbeFunction } from '../src/constants/constants.js';
import { NbeNotConnectedError } from '../src/errors.js';
import { ResponseFramer } from '../src/framers/response-framer.js';
import { UdpTransport } from '../src/transport/udp-transport.js';
import type { ResponseFrame } from '../src/types/nbe-types.js';
import { asciiToBytes } from '../src/utils/utils.js';

function bindSocket(): Promise<dgram.Socket> {
  return new Promise((resolve, reject) => {
    const socket = dgram.createSocket('udp4');
    socket.once('error', reject);
    socket.bind(0, '127.0.0.1', () => resolve(socket));
  });
}

function nextSender(socket: dgram.Socket): Promise<dgram.RemoteInfo> {
  return new Promise(resolve => socket.once('message', (_msg, rinfo) => resolve(rinfo)));
}

function sendFrom(socket: dgram.Socket, data: Uint8Array, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    socket.send(data, port, '127.0.0.1', err => (err ? reject(err) : resolve()));
  });
}

function closeSocket(socket: dgram.Socket): Promise<void> {
  return new Promise(resolve => socket.close(() => resolve()));
}

function answer(seqNo: number): Uint8Array {
  return new ResponseFramer().encode({
    appId: 'ABCDEFGHIJKL',
    controllerId: 'MNOPQR',
    function: NbeFunction.GET_OPERATING_DATA,
    seqNo,
    status: 0,
    payload: 'state=5',
  });
}

describe('UdpTransport', () => {
  const sockets: dgram.Socket[] = [];
  let transport: UdpTransport | null = null;

  afterEach(async () => {
    await transport?.close();
    transport = null;
    await Promise.all(sockets.splice(0).map(closeSocket));
  });

  async function setup() {
    const controller = await bindSocket();
    const stranger = await bindSocket();
    sockets.push(controller, stranger);

    const frames = vi.fn<(frame: ResponseFrame) => void>();
    const udp = new UdpTransport('127.0.0.1', controller.address().port, {
      bindAddress: '127.0.0.1',
    });
    transport = udp;
    udp.setFrameHandler(frames);
    await udp.open();

    const sender = nextSender(controller);
    await udp.write(asciiToBytes('hello'));
    const { port } = await sender;
    return { udp, controller, stranger, frames, port };
  }

  it('hands decoded frames from the controller to the handler', async () => {
    const { controller, frames, port } = await setup();
    await sendFrom(controller, answer(7), port);

    await vi.waitFor(() => expect(frames).toHaveBeenCalledOnce());
    expect(frames.mock.calls[0]?.[0]).toMatchObject({ seqNo: 7, status: 0 });
  });

  it('ignores datagrams from any other port', async () => {
    const { controller, stranger, frames, port } = await setup();
    await sendFrom(stranger, answer(8), port);
    await sendFrom(controller, answer(7), port);

    await vi.waitFor(() => expect(frames).toHaveBeenCalledOnce());
    await new Promise(resolve => setTimeout(resolve, 50));
    expect(frames).toHaveBeenCalledOnce();
    expect(frames.mock.calls[0]?.[0]).toMatchObject({ seqNo: 7 });
  });

  it('drops datagrams that do not decode', async () => {
    const { controller, frames, port } = await setup();
    await sendFrom(controller, asciiToBytes('garbage'), port);
    await sendFrom(controller, answer(9), port);

    await vi.waitFor(() => expect(frames).toHaveBeenCalledOnce());
    expect(frames.mock.calls[0]?.[0]).toMatchObject({ seqNo: 9 });
  });

  it('refuses to write once closed', async () => {
    const { udp } = await setup();
    await udp.close();
    expect(udp.isOpen).toBe(false);
    await expect(udp.write(asciiToBytes('late'))).rejects.toBeInstanceOf(NbeNotConnectedError);
  });
});
