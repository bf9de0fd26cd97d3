import { Duplex } from 'stream';

export type ProxyBehaviour =
  | { kind: 'respond'; response: string }
  | { kind: 'fail'; error: Error }
  | { kind: 'hangup' };

/**
 * Plays the proxy side of a CONNECT exchange: once the request head is
 * complete it answers according to `behaviour`.
 */
export class MockProxySocket extends Duplex {
  written: string = '';

  constructor(private readonly behaviour: ProxyBehaviour) {
    super();
  }

  _read(): void {
    // data is pushed from _write
  }

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    if (this.behaviour.kind === 'fail') {
      callback(this.behaviour.error);
      return;
    }

    this.written += chunk.toString();
    callback();

    if (!this.written.endsWith('\r\n\r\n')) {
      return;
    }
    if (this.behaviour.kind === 'respond') {
      this.push(this.behaviour.response);
    } else {
      this.destroy();
    }
  }
}
