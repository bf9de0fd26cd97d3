/**
 * Http2 Transport
 * Wraps a Node http2 client session and reports stream activity
 */

import { EventEmitter } from 'events';
import * as http2 from 'http2';
import { Duplex } from 'stream';
import { TLSSocket } from 'tls';
import { Logger } from 'pino';
import { authorityKey } from './authority';
import { Authority, Transport } from './types';

const ACTIVE_STATE_CHANGED = 'activeStateChanged';

export class Http2Transport extends EventEmitter implements Transport {
  private logger: Logger;
  private openStreams = 0;
  private goawayReceived = false;

  constructor(readonly session: http2.ClientHttp2Session, logger: Logger) {
    super();
    this.logger = logger;

    session.on('goaway', (errorCode: number) => {
      this.goawayReceived = true;
      this.logger.debug({ errorCode }, 'Received GOAWAY');
    });
    session.on('error', (error: Error) => {
      this.logger.warn({ error }, 'Http2 session error');
    });
  }

  /**
   * Start an http2 session over an already connected channel.
   */
  static viaSocket(channel: Duplex, authority: Authority, logger: Logger): Http2Transport {
    const scheme = channel instanceof TLSSocket ? 'https' : 'http';
    const key = authorityKey(authority);
    const session = http2.connect(`${scheme}://${key}`, {
      createConnection: () => channel
    });
    return new Http2Transport(session, logger.child({ component: 'Http2Transport', authority: key }));
  }

  get isOpen(): boolean {
    return !this.session.closed && !this.session.destroyed && !this.goawayReceived;
  }

  get activeStreams(): number {
    return this.openStreams;
  }

  request(
    headers: http2.OutgoingHttpHeaders,
    options?: http2.ClientSessionRequestOptions
  ): http2.ClientHttp2Stream {
    const stream = this.session.request(headers, options);

    this.openStreams++;
    if (this.openStreams === 1) {
      this.emit(ACTIVE_STATE_CHANGED, true);
    }

    stream.once('close', () => {
      this.openStreams--;
      if (this.openStreams === 0) {
        this.emit(ACTIVE_STATE_CHANGED, false);
      }
    });

    return stream;
  }

  finish(): void {
    if (this.session.closed || this.session.destroyed) {
      return;
    }
    this.session.close();
  }

  onActiveStateChanged(listener: (isActive: boolean) => void): () => void {
    this.on(ACTIVE_STATE_CHANGED, listener);
    return () => {
      this.off(ACTIVE_STATE_CHANGED, listener);
    };
  }
}
