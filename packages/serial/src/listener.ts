/**
 * SerialListener - server side of a null-modem TCP line
 *
 * The emulator's null-modem device connects as a TCP client, so the harness
 * binds, listens and accepts exactly one connection. listen() and accept()
 * are separate so several lines can be listening before the readiness flag
 * tells the launcher to start the emulator.
 *
 * Neither call throws: failures come back as a tagged result carrying a
 * BindError or AcceptError, and the listening socket is closed.
 */

import net from 'node:net';
import { AcceptError, BindError } from '@nullmodem/utils/errors';
import { listenerLog, type Logger } from '@nullmodem/utils/logger';
import { NullModemChannel, type ChannelOptions } from './channel.js';
import type { ReadinessFlag } from './readiness-flag.js';

export type ListenResult = { ok: true; port: number } | { ok: false; error: BindError };

export type AcceptResult = { ok: true; channel: NullModemChannel } | { ok: false; error: AcceptError };

export type ConnectResult = { ok: true; channel: NullModemChannel } | { ok: false; error: BindError | AcceptError };

export interface SerialListenerOptions {
  /** Options for the channel created on accept */
  channel?: ChannelOptions;
  log?: Logger;
}

interface PendingAccept {
  resolve: (socket: net.Socket) => void;
  reject: (err: Error) => void;
}

export class SerialListener {
  readonly host: string;
  private readonly requestedPort: number;
  private readonly channelOptions: ChannelOptions;
  private readonly log: Logger;
  private server: net.Server | null = null;
  private queued: net.Socket | null = null;
  private queuedErrorHandler: ((err: Error) => void) | null = null;
  private waiter: PendingAccept | null = null;
  private acceptedOnce = false;

  constructor(host: string, port: number, options: SerialListenerOptions = {}) {
    this.host = host;
    this.requestedPort = port;
    this.channelOptions = options.channel ?? {};
    this.log = options.log ?? listenerLog;
  }

  get listening(): boolean {
    return this.server !== null;
  }

  /** Bound port (differs from the requested one when binding port 0). */
  get port(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.requestedPort;
  }

  /**
   * Bind and start listening without waiting for a connection.
   */
  listen(): Promise<ListenResult> {
    if (this.server) {
      return Promise.resolve({ ok: true, port: this.port });
    }

    return new Promise((resolve) => {
      const server = net.createServer();

      const onBindError = (err: Error): void => {
        server.close();
        const error = new BindError(this.host, this.requestedPort, err);
        this.log.error(error.message);
        resolve({ ok: false, error });
      };

      server.once('error', onBindError);
      server.on('connection', (socket) => this.handleConnection(socket));

      server.listen({ host: this.host, port: this.requestedPort, backlog: 1 }, () => {
        server.off('error', onBindError);
        server.on('error', (err) => this.handleServerError(err));
        this.server = server;
        this.log.info(`Listening on ${this.host}:${this.port} (waiting for emulator to connect)`);
        resolve({ ok: true, port: this.port });
      });
    });
  }

  /**
   * Wait up to `timeoutMs` for the emulator to connect. The listening
   * socket is closed afterwards whatever the outcome.
   */
  async accept(timeoutMs: number): Promise<AcceptResult> {
    if (!this.server) {
      const error = new AcceptError(this.host, this.port, 'error', timeoutMs, new Error('listen() must succeed before accept()'));
      this.log.error(error.message);
      return { ok: false, error };
    }

    const port = this.port;
    try {
      const socket = await this.nextConnection(timeoutMs);
      const channel = new NullModemChannel(socket, this.channelOptions);
      this.log.info(`Emulator connected from ${socket.remoteAddress}:${socket.remotePort} on port ${port}`);
      return { ok: true, channel };
    } catch (err) {
      const error = err instanceof AcceptError ? err : new AcceptError(this.host, port, 'error', timeoutMs, err);
      this.log.error(error.message);
      return { ok: false, error };
    } finally {
      this.close();
    }
  }

  /**
   * Listen, raise the readiness flag, accept. The flag is removed when the
   * attempt concludes by any path.
   */
  async connect(timeoutMs: number, flag?: ReadinessFlag): Promise<ConnectResult> {
    const listening = await this.listen();
    if (!listening.ok) {
      return listening;
    }
    if (!flag) {
      return this.accept(timeoutMs);
    }
    return flag.during(() => this.accept(timeoutMs));
  }

  /** Stop listening; an accepted channel is not affected. */
  close(): void {
    const queued = this.takeQueued();
    if (queued) {
      queued.destroy();
    }
    if (this.server) {
      // Stops listening now; the callback would wait for accepted sockets
      this.server.close();
      this.server = null;
    }
  }

  private nextConnection(timeoutMs: number): Promise<net.Socket> {
    const queued = this.takeQueued();
    if (queued) {
      this.acceptedOnce = true;
      return Promise.resolve(queued);
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new AcceptError(this.host, this.port, 'timeout', timeoutMs));
      }, timeoutMs);

      this.waiter = {
        resolve: (socket) => {
          clearTimeout(timer);
          this.waiter = null;
          this.acceptedOnce = true;
          resolve(socket);
        },
        reject: (err) => {
          clearTimeout(timer);
          this.waiter = null;
          reject(err);
        },
      };
    });
  }

  private handleConnection(socket: net.Socket): void {
    // One line, one peer
    if (this.acceptedOnce || this.queued) {
      this.log.warn('Rejecting extra connection', { port: this.port, from: socket.remoteAddress });
      socket.destroy();
      return;
    }

    if (this.waiter) {
      this.waiter.resolve(socket);
      return;
    }

    // Connected before accept() was called; hold it until then
    const onEarlyError = (err: Error): void => {
      this.log.warn('Queued connection failed before accept', { port: this.port, error: err.message });
      this.takeQueued();
      socket.destroy();
    };
    socket.once('error', onEarlyError);
    this.queued = socket;
    this.queuedErrorHandler = onEarlyError;
  }

  private takeQueued(): net.Socket | null {
    const socket = this.queued;
    if (socket && this.queuedErrorHandler) {
      socket.off('error', this.queuedErrorHandler);
    }
    this.queued = null;
    this.queuedErrorHandler = null;
    return socket;
  }

  private handleServerError(err: Error): void {
    if (this.waiter) {
      this.waiter.reject(new AcceptError(this.host, this.port, 'error', 0, err));
      return;
    }
    this.log.error('Listening socket error', { port: this.port, error: err.message });
  }
}
