/**
 * Error Types for the null-modem harness
 *
 * Every failure that crosses a component boundary carries a `kind` tag so
 * callers branch on meaning instead of platform error codes.
 */

import { tail } from './text.js';

export type HarnessErrorKind = 'connection_lost' | 'timeout' | 'bind_failed' | 'accept_failed' | 'other';

export class HarnessError extends Error {
  readonly kind: HarnessErrorKind;

  constructor(kind: HarnessErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HarnessError';
    this.kind = kind;
  }
}

/** The peer closed, reset or otherwise dropped the line. Never retried. */
export class ConnectionLostError extends HarnessError {
  constructor(reason: string, options?: { cause?: unknown }) {
    super('connection_lost', `Connection lost: ${reason}`, options);
    this.name = 'ConnectionLostError';
  }
}

export class MarkerTimeoutError extends HarnessError {
  readonly marker: string;
  readonly timeoutMs: number;
  readonly bufferedLength: number;
  readonly bufferTail: string;

  constructor(marker: string, timeoutMs: number, buffered: string, tailChars: number = 200) {
    const bufferTail = tail(buffered, tailChars);
    super(
      'timeout',
      `Timeout (${timeoutMs}ms) waiting for ${JSON.stringify(marker)}; ` +
        `buffer length=${buffered.length}, last buffer tail: ${JSON.stringify(bufferTail)}`
    );
    this.name = 'MarkerTimeoutError';
    this.marker = marker;
    this.timeoutMs = timeoutMs;
    this.bufferedLength = buffered.length;
    this.bufferTail = bufferTail;
  }
}

export class BindError extends HarnessError {
  constructor(host: string, port: number, cause: unknown) {
    super('bind_failed', `Could not bind to ${host}:${port}: ${describeError(cause)}`, { cause });
    this.name = 'BindError';
  }
}

export type AcceptFailureReason = 'timeout' | 'error';

export class AcceptError extends HarnessError {
  readonly reason: AcceptFailureReason;

  constructor(host: string, port: number, reason: AcceptFailureReason, timeoutMs: number, cause?: unknown) {
    super(
      'accept_failed',
      reason === 'timeout'
        ? `No connection received on ${host}:${port} after ${timeoutMs}ms`
        : `Accept failed on ${host}:${port}: ${describeError(cause)}`,
      { cause }
    );
    this.name = 'AcceptError';
    this.reason = reason;
  }
}

/** An I/O failure that does not mean the peer is gone. */
export class SerialIoError extends HarnessError {
  constructor(operation: string, cause: unknown) {
    super('other', `${operation} failed: ${describeError(cause)}`, { cause });
    this.name = 'SerialIoError';
  }
}

export class ConfigError extends HarnessError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('other', `Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function isHarnessError(err: unknown, kind?: HarnessErrorKind): err is HarnessError {
  return err instanceof HarnessError && (kind === undefined || err.kind === kind);
}

const CONNECTION_LOST_CODES = new Set([
  'ECONNRESET',
  'EPIPE',
  'ECONNABORTED',
  'ERR_STREAM_DESTROYED',
  'ERR_STREAM_WRITE_AFTER_END',
]);

export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/** True when a socket error means the peer is gone rather than a transient fault. */
export function isConnectionLostCode(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && CONNECTION_LOST_CODES.has(code);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
