/**
 * Socket and TLS channel setup on top of node:net and node:tls
 */

import * as net from 'net';
import * as tls from 'tls';
import { Duplex } from 'stream';
import { Logger } from 'pino';
import { BadCertificateError, ConnectTimeoutError } from '@muxpool/errors';
import { authorityKey } from './authority';
import { Authority, ChannelFactory, ClientSetting } from './types';

export const ALPN_PROTOCOLS = ['h2'];

type ReadyEvent = 'connect' | 'secureConnect';

function waitUntilReady(
  socket: net.Socket,
  readyEvent: ReadyEvent,
  authority: string,
  timeout: number
): Promise<void> {
  return new Promise((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const cleanup = () => {
      if (timer) {
        clearTimeout(timer);
      }
      socket.off(readyEvent, onReady);
      socket.off('error', onError);
    };
    const onReady = () => {
      cleanup();
      resolve();
    };
    const onError = (error: Error) => {
      cleanup();
      reject(error);
    };

    socket.once(readyEvent, onReady);
    socket.once('error', onError);

    if (timeout > 0) {
      timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(new ConnectTimeoutError(authority, timeout));
      }, timeout);
    }
  });
}

export class NodeChannelFactory implements ChannelFactory {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'NodeChannelFactory' });
  }

  async connectSecure(target: Authority, setting: ClientSetting, timeout: number): Promise<Duplex> {
    const authority = authorityKey(target);
    const socket = tls.connect({
      host: target.host,
      port: target.port,
      ...this.tlsOptions(target.host, setting)
    });

    await waitUntilReady(socket, 'secureConnect', authority, timeout);
    this.verifyPeer(socket, authority, setting);
    return socket;
  }

  async connectPlain(host: string, port: number, timeout: number): Promise<Duplex> {
    const socket = net.connect({ host, port });
    await waitUntilReady(socket, 'connect', `${host}:${port}`, timeout);
    return socket;
  }

  async upgrade(socket: Duplex, targetHost: string, setting: ClientSetting): Promise<Duplex> {
    const secured = tls.connect({
      socket,
      ...this.tlsOptions(targetHost, setting)
    });

    // the tunnel already honoured the connect timeout
    await waitUntilReady(secured, 'secureConnect', targetHost, 0);
    this.verifyPeer(secured, targetHost, setting);
    return secured;
  }

  private tlsOptions(host: string, setting: ClientSetting): tls.ConnectionOptions {
    return {
      // SNI must not be an IP address
      servername: net.isIP(host) === 0 ? host : undefined,
      secureContext: setting.context,
      ALPNProtocols: ALPN_PROTOCOLS,
      // with a bad-certificate hook the decision is taken in verifyPeer
      rejectUnauthorized: setting.onBadCertificate === undefined
    };
  }

  private verifyPeer(socket: tls.TLSSocket, authority: string, setting: ClientSetting): void {
    if (socket.alpnProtocol !== 'h2') {
      this.logger.debug({ authority, alpnProtocol: socket.alpnProtocol }, 'Peer did not negotiate h2');
    }

    if (socket.authorized || !setting.onBadCertificate) {
      return;
    }

    const reason = String(socket.authorizationError);
    if (setting.onBadCertificate(socket.getPeerCertificate())) {
      this.logger.warn({ authority, reason }, 'Accepting unverified certificate');
      return;
    }

    socket.destroy();
    throw new BadCertificateError(authority, reason);
  }
}
