import { describe, it, expect } from 'vitest';
import {
  HarnessError,
  ConnectionLostError,
  MarkerTimeoutError,
  BindError,
  AcceptError,
  SerialIoError,
  ConfigError,
  isHarnessError,
  isConnectionLostCode,
  errorCode,
} from './errors.js';

function errnoError(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`simulated ${code}`);
  err.code = code;
  return err;
}

describe('Error Classes', () => {
  describe('HarnessError', () => {
    it('carries its kind tag', () => {
      const err = new HarnessError('other', 'test error');
      expect(err.message).toBe('test error');
      expect(err.kind).toBe('other');
      expect(err.name).toBe('HarnessError');
      expect(err).toBeInstanceOf(Error);
    });
  });

  describe('ConnectionLostError', () => {
    it('prefixes the reason', () => {
      const err = new ConnectionLostError('connection reset by peer');
      expect(err.message).toBe('Connection lost: connection reset by peer');
      expect(err.kind).toBe('connection_lost');
      expect(err.name).toBe('ConnectionLostError');
      expect(err).toBeInstanceOf(HarnessError);
    });
  });

  describe('MarkerTimeoutError', () => {
    it('reports marker, buffered length and tail', () => {
      const err = new MarkerTimeoutError('A>', 1500, 'abcdef', 3);
      expect(err.kind).toBe('timeout');
      expect(err.marker).toBe('A>');
      expect(err.timeoutMs).toBe(1500);
      expect(err.bufferedLength).toBe(6);
      expect(err.bufferTail).toBe('def');
      expect(err.message).toBe('Timeout (1500ms) waiting for "A>"; buffer length=6, last buffer tail: "def"');
    });

    it('keeps at most 200 characters of tail by default', () => {
      const err = new MarkerTimeoutError('X', 10, 'y'.repeat(500));
      expect(err.bufferTail).toHaveLength(200);
      expect(err.bufferedLength).toBe(500);
    });
  });

  describe('BindError', () => {
    it('names host, port and cause', () => {
      const err = new BindError('localhost', 4000, errnoError('EADDRINUSE'));
      expect(err.kind).toBe('bind_failed');
      expect(err.message).toBe('Could not bind to localhost:4000: simulated EADDRINUSE');
    });
  });

  describe('AcceptError', () => {
    it('describes a timeout', () => {
      const err = new AcceptError('localhost', 4000, 'timeout', 2000);
      expect(err.kind).toBe('accept_failed');
      expect(err.reason).toBe('timeout');
      expect(err.message).toBe('No connection received on localhost:4000 after 2000ms');
    });

    it('describes an accept error', () => {
      const err = new AcceptError('localhost', 4000, 'error', 2000, new Error('boom'));
      expect(err.reason).toBe('error');
      expect(err.message).toBe('Accept failed on localhost:4000: boom');
    });
  });

  it('SerialIoError is not a connection loss', () => {
    const err = new SerialIoError('send', errnoError('EAGAIN'));
    expect(err.kind).toBe('other');
    expect(err.message).toBe('send failed: simulated EAGAIN');
  });

  it('ConfigError lists every issue', () => {
    const err = new ConfigError(['SERIAL_PORT: bad', 'CMD_TIMEOUT: bad']);
    expect(err.issues).toHaveLength(2);
    expect(err.message).toBe('Invalid configuration: SERIAL_PORT: bad; CMD_TIMEOUT: bad');
  });
});

describe('isHarnessError', () => {
  it('matches any kind without a filter', () => {
    expect(isHarnessError(new ConnectionLostError('x'))).toBe(true);
    expect(isHarnessError(new Error('x'))).toBe(false);
  });

  it('filters by kind', () => {
    const err = new ConnectionLostError('x');
    expect(isHarnessError(err, 'connection_lost')).toBe(true);
    expect(isHarnessError(err, 'timeout')).toBe(false);
  });
});

describe('isConnectionLostCode', () => {
  it.each(['ECONNRESET', 'EPIPE', 'ECONNABORTED', 'ERR_STREAM_DESTROYED', 'ERR_STREAM_WRITE_AFTER_END'])(
    'treats %s as connection lost',
    (code) => {
      expect(isConnectionLostCode(errnoError(code))).toBe(true);
    }
  );

  it('does not treat other codes as connection lost', () => {
    expect(isConnectionLostCode(errnoError('EAGAIN'))).toBe(false);
    expect(isConnectionLostCode(new Error('no code'))).toBe(false);
    expect(isConnectionLostCode('ECONNRESET')).toBe(false);
  });

  it('errorCode reads string codes only', () => {
    expect(errorCode(errnoError('EPIPE'))).toBe('EPIPE');
    expect(errorCode({ code: 42 })).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});
