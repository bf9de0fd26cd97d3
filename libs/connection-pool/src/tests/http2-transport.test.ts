/**
 * Http2 Transport Test Suite
 * Runs against an in-process cleartext http2 server on the loopback interface
 */

import { once } from 'events';
import * as http2 from 'http2';
import * as net from 'net';
import pino from 'pino';
import { Http2Transport } from '../http2-transport';

describe('Http2Transport', () => {
  const logger = pino({ level: 'silent' });
  let server: http2.Http2Server;
  let port: number;
  let transport: Http2Transport | undefined;

  beforeAll(async () => {
    server = http2.createServer();
    server.on('stream', (stream) => {
      stream.respond({ ':status': 200 });
      stream.end('ok');
    });
    server.listen(0, '127.0.0.1');
    await once(server, 'listening');

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    port = address.port;
  });

  afterAll(async () => {
    server.close();
    await once(server, 'close');
  });

  afterEach(() => {
    transport?.session.destroy();
    transport = undefined;
  });

  const connect = async (): Promise<Http2Transport> => {
    const socket = net.connect({ host: '127.0.0.1', port });
    await once(socket, 'connect');
    transport = Http2Transport.viaSocket(socket, { host: '127.0.0.1', port }, logger);
    return transport;
  };

  const drain = async (stream: http2.ClientHttp2Stream): Promise<void> => {
    stream.resume();
    await once(stream, 'close');
  };

  test('should be open after connecting', async () => {
    const h2 = await connect();

    expect(h2.isOpen).toBe(true);
    expect(h2.activeStreams).toBe(0);
  });

  test('should open a session for an IPv6 authority', async () => {
    const socket = net.connect({ host: '127.0.0.1', port });
    await once(socket, 'connect');
    transport = Http2Transport.viaSocket(socket, { host: '::1', port }, logger);

    const stream = transport.request({ ':path': '/' });
    const [headers] = await once(stream, 'response');
    await drain(stream);

    expect(headers[':status']).toBe(200);
  });

  test('should report the transition to active and back to idle', async () => {
    const h2 = await connect();
    const transitions: boolean[] = [];
    h2.onActiveStateChanged(isActive => transitions.push(isActive));

    const stream = h2.request({ ':path': '/' });
    expect(transitions).toEqual([true]);
    expect(h2.activeStreams).toBe(1);

    await drain(stream);
    expect(transitions).toEqual([true, false]);
    expect(h2.activeStreams).toBe(0);
  });

  test('should report one transition for concurrent streams', async () => {
    const h2 = await connect();
    const transitions: boolean[] = [];
    h2.onActiveStateChanged(isActive => transitions.push(isActive));

    const first = h2.request({ ':path': '/one' });
    const second = h2.request({ ':path': '/two' });
    expect(h2.activeStreams).toBe(2);

    await Promise.all([drain(first), drain(second)]);
    expect(transitions).toEqual([true, false]);
  });

  test('should stop notifying after unsubscribe', async () => {
    const h2 = await connect();
    const transitions: boolean[] = [];
    const unsubscribe = h2.onActiveStateChanged(isActive => transitions.push(isActive));

    unsubscribe();
    await drain(h2.request({ ':path': '/' }));

    expect(transitions).toEqual([]);
  });

  test('should close gracefully and tolerate repeated finish', async () => {
    const h2 = await connect();

    h2.finish();
    expect(h2.isOpen).toBe(false);

    expect(() => h2.finish()).not.toThrow();
    await once(h2.session, 'close');
  });
});
