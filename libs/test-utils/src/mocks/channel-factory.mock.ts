import { Duplex, PassThrough } from 'stream';
import { Authority, ChannelFactory, ClientSetting } from '@muxpool/connection-pool';
import { MockProxySocket, ProxyBehaviour } from './proxy-socket.mock';

export interface SecureCall {
  target: Authority;
  setting: ClientSetting;
  timeout: number;
}

export interface PlainCall {
  host: string;
  port: number;
  timeout: number;
}

export interface UpgradeCall {
  socket: Duplex;
  targetHost: string;
  setting: ClientSetting;
}

export class MockChannelFactory implements ChannelFactory {
  secureCalls: SecureCall[] = [];
  plainCalls: PlainCall[] = [];
  upgradeCalls: UpgradeCall[] = [];
  proxySockets: MockProxySocket[] = [];
  secureChannels: PassThrough[] = [];

  /** When set, every connect attempt fails with this error */
  failWith?: Error;
  proxyBehaviour: ProxyBehaviour = {
    kind: 'respond',
    response: 'HTTP/1.1 200 Connection established\r\n\r\n'
  };

  private held = false;
  private waiting: Array<() => void> = [];

  /** Keep connect attempts in flight until release() */
  hold(): void {
    this.held = true;
  }

  release(): void {
    this.held = false;
    const waiting = this.waiting;
    this.waiting = [];
    waiting.forEach(resolve => resolve());
  }

  async connectSecure(target: Authority, setting: ClientSetting, timeout: number): Promise<Duplex> {
    this.secureCalls.push({ target, setting, timeout });
    await this.gate();
    if (this.failWith) {
      throw this.failWith;
    }
    const channel = new PassThrough();
    this.secureChannels.push(channel);
    return channel;
  }

  async connectPlain(host: string, port: number, timeout: number): Promise<Duplex> {
    this.plainCalls.push({ host, port, timeout });
    await this.gate();
    if (this.failWith) {
      throw this.failWith;
    }
    const socket = new MockProxySocket(this.proxyBehaviour);
    this.proxySockets.push(socket);
    return socket;
  }

  async upgrade(socket: Duplex, targetHost: string, setting: ClientSetting): Promise<Duplex> {
    this.upgradeCalls.push({ socket, targetHost, setting });
    return new PassThrough();
  }

  private gate(): Promise<void> {
    if (!this.held) {
      return Promise.resolve();
    }
    return new Promise(resolve => this.waiting.push(resolve));
  }
}
