/**
 * HTTP CONNECT tunnelling through a forward proxy
 */

import { Duplex } from 'stream';
import { ProxyTunnelFailedError } from '@muxpool/errors';
import { authorityKey } from './authority';
import { Authority, ChannelFactory, ClientSetting, ProxyTarget } from './types';

const CRLF = '\r\n';

export function buildConnectRequest(target: Authority, proxy: ProxyTarget): string {
  const authority = authorityKey(target);
  const lines = [`CONNECT ${authority} HTTP/1.1`, `Host: ${authority}`];

  const credentials = Buffer.from(proxy.userInfo ?? '', 'utf8').toString('base64');
  if (credentials.length > 0) {
    lines.push(`Proxy-Authorization: Basic ${credentials}`);
  }

  return lines.join(CRLF) + CRLF + CRLF;
}

interface TunnelResponse {
  established: Promise<void>;
  /** Stop listening to the raw proxy socket */
  detach(): void;
}

/**
 * Wait for the proxy's answer. Only the status line of the first chunk is
 * inspected.
 */
function listenForTunnelResponse(socket: Duplex, authority: string, proxy: string): TunnelResponse {
  let detach: () => void = () => undefined;

  const established = new Promise<void>((resolve, reject) => {
    let settled = false;
    const settle = (error?: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    const onData = (chunk: Buffer | string) => {
      const statusLine = chunk.toString().split(CRLF)[0];
      if (statusLine.startsWith('HTTP/1.1 200')) {
        settle();
      } else {
        settle(new ProxyTunnelFailedError(authority, proxy, statusLine));
      }
    };
    const onError = (error: Error) => {
      settle(new ProxyTunnelFailedError(authority, proxy, undefined, error));
    };
    const onClose = () => {
      settle(new ProxyTunnelFailedError(
        authority,
        proxy,
        undefined,
        new Error('Proxy closed the connection before responding')
      ));
    };

    socket.on('data', onData);
    socket.on('error', onError);
    socket.on('close', onClose);

    detach = () => {
      socket.off('data', onData);
      socket.off('error', onError);
      socket.off('close', onClose);
    };
  });

  return { established, detach: () => detach() };
}

/**
 * Open a secure channel to `target` through the proxy configured in `setting`.
 */
export async function openProxyTunnel(
  target: Authority,
  setting: ClientSetting & { proxy: ProxyTarget },
  timeout: number,
  channels: ChannelFactory
): Promise<Duplex> {
  const { proxy } = setting;
  const authority = authorityKey(target);
  const proxyName = `${proxy.host}:${proxy.port}`;

  const proxySocket = await channels.connectPlain(proxy.host, proxy.port, timeout);
  const response = listenForTunnelResponse(proxySocket, authority, proxyName);

  try {
    proxySocket.write(buildConnectRequest(target, proxy));
    await response.established;
  } catch (error) {
    response.detach();
    proxySocket.destroy();
    throw error;
  }

  const secured = channels.upgrade(proxySocket, target.host, setting);
  response.detach();
  return secured;
}
