/**
 * NullModemChannel - buffered, marker-driven serial terminal over TCP
 *
 * Wraps one accepted null-modem socket:
 * 1. drain() reads into the pending buffer until the line goes quiet
 * 2. waitFor() polls drain() until a literal marker shows up, then consumes
 *    the buffer through the end of the marker
 * 3. send()/sendRaw() write to the peer and flag a dropped line as
 *    ConnectionLostError
 *
 * The pending buffer only grows by drain() and only shrinks by a
 * successful waitFor() or an explicit discardPending().
 */

import type { Socket } from 'node:net';
import {
  ConnectionLostError,
  MarkerTimeoutError,
  SerialIoError,
  isConnectionLostCode,
} from '@nullmodem/utils/errors';
import { channelLog, type Logger } from '@nullmodem/utils/logger';
import { alwaysAlive, type LivenessProbe } from '@nullmodem/utils/liveness';
import { sleep, tail } from '@nullmodem/utils/text';
import { SerialDecoder } from './decoder.js';
import type { ChannelObserver } from './observers.js';

export interface ChannelConfig {
  /** Longest a drain() waits for the first byte, and the quiet gap that ends it */
  readTimeoutMs: number;
  /** Pause between waitFor() iterations */
  pollIntervalMs: number;
  /** Quiet interval between progress lines (and liveness checks) */
  progressIntervalMs: number;
  /** Buffer tail shown in progress lines */
  progressTailChars: number;
  /** Buffer tail carried by MarkerTimeoutError */
  timeoutTailChars: number;
}

export const DEFAULT_CHANNEL_CONFIG: Readonly<ChannelConfig> = {
  readTimeoutMs: 200,
  pollIntervalMs: 50,
  progressIntervalMs: 10_000,
  progressTailChars: 80,
  timeoutTailChars: 200,
};

export interface ChannelOptions {
  /** Name used in log lines, e.g. 'console' or 'midi' */
  label?: string;
  observers?: ChannelObserver[];
  /** Consulted at progress checkpoints; a dead peer aborts the wait */
  liveness?: LivenessProbe;
  log?: Logger;
  config?: Partial<ChannelConfig>;
}

export interface SendCommandOptions {
  /** Marker that ends the command's output */
  waitFor?: string;
  timeoutMs?: number;
  /** Without a marker: how long to let output arrive before draining */
  settleMs?: number;
}

const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;
const DEFAULT_COMMAND_SETTLE_MS = 500;

export class NullModemChannel {
  readonly label: string;
  private socket: Socket | null;
  private open = true;
  private pending = '';
  private inbound: Buffer[] = [];
  private closedReason: string | null = null;
  private wake: (() => void) | null = null;
  private readonly decoder = new SerialDecoder();
  private readonly observers: ChannelObserver[];
  private readonly liveness: LivenessProbe;
  private readonly log: Logger;
  private readonly config: ChannelConfig;

  constructor(socket: Socket, options: ChannelOptions = {}) {
    this.socket = socket;
    this.label = options.label ?? 'console';
    this.observers = options.observers ?? [];
    this.liveness = options.liveness ?? alwaysAlive;
    this.log = options.log ?? channelLog;
    this.config = { ...DEFAULT_CHANNEL_CONFIG, ...options.config };

    socket.setNoDelay(true);
    socket.on('data', (chunk: Buffer) => {
      this.inbound.push(chunk);
      this.notifyReadable();
    });
    socket.on('end', () => this.markPeerGone('peer closed the null-modem socket'));
    socket.on('error', (err) => {
      this.markPeerGone(isConnectionLostCode(err) ? 'connection reset by peer' : `socket error: ${err.message}`);
    });
    socket.on('close', () => this.markPeerGone('socket closed'));
  }

  get connected(): boolean {
    return this.open && this.socket !== null;
  }

  /** Unconsumed text, without consuming it. */
  peekPending(): string {
    return this.pending;
  }

  /** Drop everything buffered so far; returns what was dropped. */
  discardPending(): string {
    const dropped = this.pending;
    this.pending = '';
    return dropped;
  }

  /**
   * Read all bytes currently available into the pending buffer.
   * Returns the newly received text (may be empty).
   * Throws ConnectionLostError if the line is closed or broken.
   */
  drain(): Promise<string> {
    return this.drainWithin(this.config.readTimeoutMs);
  }

  /**
   * Block until `marker` appears in the pending buffer.
   * Returns everything up to and including the marker and removes it from
   * the buffer; text after the marker stays for the next call.
   */
  async waitFor(marker: string, timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS): Promise<string> {
    const { readTimeoutMs, pollIntervalMs, progressIntervalMs, progressTailChars, timeoutTailChars } = this.config;
    const deadline = performance.now() + timeoutMs;
    let lastProgress = performance.now();

    while (performance.now() < deadline) {
      await this.drainWithin(Math.min(readTimeoutMs, deadline - performance.now()), deadline);

      const captured = this.consumeThrough(marker);
      if (captured !== null) {
        return captured;
      }

      const now = performance.now();
      if (now - lastProgress > progressIntervalMs) {
        const remaining = Math.max(0, Math.round((deadline - now) / 1000));
        const bufTail = this.pending ? tail(this.pending, progressTailChars) : '(empty)';
        this.log.info(
          `  ... still waiting for ${JSON.stringify(marker)} (${remaining}s left, buf tail: ${JSON.stringify(bufTail)})`
        );
        lastProgress = now;

        if (!this.liveness()) {
          throw new ConnectionLostError(`emulator process died while waiting for ${JSON.stringify(marker)}`);
        }
      }

      await sleep(pollIntervalMs);
    }

    throw new MarkerTimeoutError(marker, timeoutMs, this.pending, timeoutTailChars);
  }

  async send(text: string): Promise<void> {
    const socket = this.requireSocket();
    for (const observer of this.observers) observer.sent?.(text);
    await this.write(socket, Buffer.from(text, 'utf-8'), 'send');
  }

  /** Write bytes as-is, e.g. MIDI messages on an auxiliary line. */
  async sendRaw(data: Uint8Array): Promise<void> {
    const socket = this.requireSocket();
    for (const observer of this.observers) observer.sentRaw?.(data);
    await this.write(socket, data, 'send_raw');
  }

  /**
   * Send a keypress or command line. With `waitFor`, returns the capture up
   * to the marker; otherwise lets output settle, drains, and returns the
   * pending buffer without consuming it.
   */
  async sendCommand(text: string, options: SendCommandOptions = {}): Promise<string> {
    this.log.info(`  > sending ${JSON.stringify(text)}`);
    await this.send(text);
    if (options.waitFor !== undefined) {
      return this.waitFor(options.waitFor, options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS);
    }
    await this.settle(options.settleMs ?? DEFAULT_COMMAND_SETTLE_MS);
    return this.pending;
  }

  /** Give the peer `ms` to produce output, then drain it. */
  async settle(ms: number): Promise<string> {
    await sleep(ms);
    return this.drain();
  }

  close(): void {
    this.open = false;
    this.notifyReadable();
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
  }

  /**
   * Wait up to `waitMs` for the first byte, then keep reading until one
   * read-timeout window passes with nothing new. No wait runs past `deadline`.
   */
  private async drainWithin(waitMs: number, deadline = Number.POSITIVE_INFINITY): Promise<string> {
    if (!this.connected) {
      throw new ConnectionLostError(this.closedReason ?? 'not connected');
    }

    if (this.inbound.length === 0 && this.closedReason === null) {
      await this.waitReadable(waitMs);
    }

    const chunks: Buffer[] = [];
    let next = this.takeInbound();
    while (next.length > 0) {
      chunks.push(next);
      if (!this.connected || this.closedReason !== null) break;
      const quietMs = Math.min(this.config.readTimeoutMs, deadline - performance.now());
      if (quietMs <= 0) break;
      await this.waitReadable(quietMs);
      next = this.takeInbound();
    }
    const received = chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);
    let text = received.length > 0 ? this.decoder.push(received) : '';

    if (this.closedReason !== null) {
      // The peer is gone: deliver what arrived first, report the loss next call
      this.open = false;
      if (received.length === 0) {
        throw new ConnectionLostError(this.closedReason);
      }
      text += this.decoder.flush();
    }

    if (received.length > 0) {
      for (const observer of this.observers) observer.receivedRaw?.(received);
    }
    if (text.length > 0) {
      this.pending += text;
      for (const observer of this.observers) observer.received?.(text);
    }
    return text;
  }

  private consumeThrough(marker: string): string | null {
    const idx = this.pending.indexOf(marker);
    if (idx < 0) return null;
    const end = idx + marker.length;
    const captured = this.pending.slice(0, end);
    this.pending = this.pending.slice(end);
    return captured;
  }

  private takeInbound(): Buffer {
    if (this.inbound.length === 0) return Buffer.alloc(0);
    const chunks = this.inbound;
    this.inbound = [];
    return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);
  }

  private waitReadable(ms: number): Promise<void> {
    if (ms <= 0) return Promise.resolve();
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }

  private notifyReadable(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private markPeerGone(reason: string): void {
    if (this.closedReason === null) {
      this.closedReason = reason;
      this.log.debug('Peer gone', { line: this.label, reason });
    }
    this.notifyReadable();
  }

  private requireSocket(): Socket {
    if (!this.connected || this.socket === null) {
      throw new ConnectionLostError('not connected');
    }
    return this.socket;
  }

  private write(socket: Socket, data: Uint8Array, operation: string): Promise<void> {
    return new Promise((resolve, reject) => {
      socket.write(data, (err) => {
        if (!err) {
          resolve();
          return;
        }
        if (isConnectionLostCode(err)) {
          this.open = false;
          reject(new ConnectionLostError(`${operation} failed: ${err.message}`, { cause: err }));
        } else {
          reject(new SerialIoError(operation, err));
        }
      });
    });
  }
}
