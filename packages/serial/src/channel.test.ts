import { describe, it, expect, vi } from 'vitest';
import { EventEmitter } from 'node:events';
import type { Socket } from 'node:net';
import { ConnectionLostError, MarkerTimeoutError, SerialIoError } from '@nullmodem/utils/errors';
import type { Logger } from '@nullmodem/utils/logger';
import { NullModemChannel, type ChannelOptions } from './channel.js';
import type { ChannelObserver } from './observers.js';

class MockSocket extends EventEmitter {
  public written: Buffer[] = [];
  public destroyed = false;
  public writeError: NodeJS.ErrnoException | null = null;

  setNoDelay(): this {
    return this;
  }

  write(data: Uint8Array, cb?: (err?: Error | null) => void): boolean {
    const err = this.writeError;
    if (err) {
      process.nextTick(() => cb?.(err));
      return false;
    }
    this.written.push(Buffer.from(data));
    process.nextTick(() => cb?.(null));
    return true;
  }

  destroy(): this {
    this.destroyed = true;
    return this;
  }
}

function errnoError(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`simulated ${code}`);
  err.code = code;
  return err;
}

const quietLog = (): Logger => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() });

const FAST = { readTimeoutMs: 20, pollIntervalMs: 10 };

function makeChannel(options: ChannelOptions = {}) {
  const socket = new MockSocket();
  const log = quietLog();
  const channel = new NullModemChannel(socket as unknown as Socket, {
    log,
    ...options,
    config: { ...FAST, ...options.config },
  });
  return { socket, channel, log };
}

describe('NullModemChannel', () => {
  describe('drain', () => {
    it('returns newly received text and buffers it', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('RomWBW HBIOS\r\n'));

      expect(await channel.drain()).toBe('RomWBW HBIOS\n');
      expect(channel.peekPending()).toBe('RomWBW HBIOS\n');
    });

    it('buffers successive chunks in order without gaps', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('ab\r'));
      await channel.drain();
      socket.emit('data', Buffer.from('\ncd'));
      socket.emit('data', Buffer.from('ef'));
      await channel.drain();

      expect(channel.peekPending()).toBe('ab\ncdef');
    });

    it('strips idle filler before buffering', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from([0x4f, 0x4b, 0xff, 0xff, 0xff, 0x0d, 0x0a]));

      expect(await channel.drain()).toBe('OK\n');
      expect(channel.peekPending()).toBe('OK\n');
    });

    it('returns empty text when nothing arrives within the read timeout', async () => {
      const { channel } = makeChannel();
      const started = performance.now();

      expect(await channel.drain()).toBe('');
      expect(performance.now() - started).toBeGreaterThanOrEqual(15);
      expect(channel.connected).toBe(true);
    });

    it('returns one quiet window after the last byte', async () => {
      const { socket, channel } = makeChannel({ config: { readTimeoutMs: 300 } });
      setTimeout(() => socket.emit('data', Buffer.from('late')), 10);
      const started = performance.now();

      expect(await channel.drain()).toBe('late');
      const elapsed = performance.now() - started;
      expect(elapsed).toBeGreaterThanOrEqual(300);
      expect(elapsed).toBeLessThan(1_000);
    });

    it('keeps reading a line that arrives in pieces', async () => {
      const { socket, channel } = makeChannel({ config: { readTimeoutMs: 100 } });
      socket.emit('data', Buffer.from('Note: '));
      setTimeout(() => socket.emit('data', Buffer.from('C4\r\n')), 30);

      expect(await channel.drain()).toBe('Note: C4\n');
      expect(channel.peekPending()).toBe('Note: C4\n');
    });

    it('stops reading once the line is closed locally', async () => {
      const { socket, channel } = makeChannel({ config: { readTimeoutMs: 5_000 } });
      socket.emit('data', Buffer.from('bye'));
      setTimeout(() => channel.close(), 20);
      const started = performance.now();

      expect(await channel.drain()).toBe('bye');
      expect(performance.now() - started).toBeLessThan(1_000);
    });

    it('delivers bytes that arrived before the close, then reports the loss', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('Ready.'));
      socket.emit('end');

      expect(await channel.drain()).toBe('Ready.');
      expect(channel.connected).toBe(false);
      await expect(channel.drain()).rejects.toThrow('Connection lost: peer closed the null-modem socket');
    });

    it('reports the loss at once when the peer closed with nothing pending', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('end');

      await expect(channel.drain()).rejects.toBeInstanceOf(ConnectionLostError);
      expect(channel.connected).toBe(false);
    });

    it('treats a reset as connection lost', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('error', errnoError('ECONNRESET'));

      await expect(channel.drain()).rejects.toThrow('Connection lost: connection reset by peer');
    });

    it('treats a filler-only final chunk as delivered', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from([0xff, 0xff]));
      socket.emit('end');

      expect(await channel.drain()).toBe('');
      await expect(channel.drain()).rejects.toBeInstanceOf(ConnectionLostError);
    });

    it('mirrors raw and decoded traffic to observers', async () => {
      const observer: ChannelObserver = { received: vi.fn(), receivedRaw: vi.fn() };
      const { socket, channel } = makeChannel({ observers: [observer] });
      socket.emit('data', Buffer.from([0x41, 0xff, 0x0d]));
      await channel.drain();

      expect(observer.receivedRaw).toHaveBeenCalledWith(Buffer.from([0x41, 0xff, 0x0d]));
      expect(observer.received).toHaveBeenCalledWith('A\n');
    });

    it('does not notify received for filler-only chunks', async () => {
      const observer: ChannelObserver = { received: vi.fn(), receivedRaw: vi.fn() };
      const { socket, channel } = makeChannel({ observers: [observer] });
      socket.emit('data', Buffer.from([0xff]));
      await channel.drain();

      expect(observer.receivedRaw).toHaveBeenCalledTimes(1);
      expect(observer.received).not.toHaveBeenCalled();
    });
  });

  describe('waitFor', () => {
    it('returns the capture through the marker and keeps the rest', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('RomWBW\nBoot [H=Help]: C>'));

      expect(await channel.waitFor('Boot [H=Help]:', 1_000)).toBe('RomWBW\nBoot [H=Help]:');
      expect(channel.peekPending()).toBe(' C>');
    });

    it('ends the capture at the first occurrence of the marker', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('A> dir\nA> '));

      expect(await channel.waitFor('A>', 1_000)).toBe('A>');
      expect(await channel.waitFor('A>', 1_000)).toBe(' dir\nA>');
      expect(channel.peekPending()).toBe(' ');
    });

    it('matches the marker literally, not as a pattern', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('abc [H=Help]: .*'));

      expect(await channel.waitFor('.*', 1_000)).toBe('abc [H=Help]: .*');
    });

    it('waits for a marker split across late chunks', async () => {
      const { socket, channel } = makeChannel();
      setTimeout(() => socket.emit('data', Buffer.from('Rea')), 20);
      setTimeout(() => socket.emit('data', Buffer.from('dy.\r\n')), 60);

      expect(await channel.waitFor('Ready.', 2_000)).toBe('Ready.');
      expect(channel.peekPending()).toBe('\n');
    });

    it('never re-observes text consumed by an earlier wait', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('Ready.\n'));
      await channel.waitFor('Ready.', 1_000);

      await expect(channel.waitFor('Ready.', 100)).rejects.toBeInstanceOf(MarkerTimeoutError);
    });

    it('times out with buffer diagnostics no earlier than the timeout', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('garbled output'));
      const started = performance.now();

      const err = await channel.waitFor('Data port:', 150).catch((e: unknown) => e);
      const elapsed = performance.now() - started;

      expect(err).toBeInstanceOf(MarkerTimeoutError);
      if (!(err instanceof MarkerTimeoutError)) return;
      expect(err.marker).toBe('Data port:');
      expect(err.bufferedLength).toBe(14);
      expect(err.bufferTail).toBe('garbled output');
      expect(elapsed).toBeGreaterThanOrEqual(150);
      expect(elapsed).toBeLessThan(150 + 250);
      // Unmatched text stays buffered for the next step
      expect(channel.peekPending()).toBe('garbled output');
    });

    it('does not let a trickle of unmatched output run past the deadline', async () => {
      const { socket, channel } = makeChannel({ config: { readTimeoutMs: 1_000 } });
      const trickle = setInterval(() => socket.emit('data', Buffer.from('.')), 20);
      const started = performance.now();

      try {
        await expect(channel.waitFor('A>', 200)).rejects.toBeInstanceOf(MarkerTimeoutError);
      } finally {
        clearInterval(trickle);
      }
      expect(performance.now() - started).toBeLessThan(700);
    });

    it('logs progress and checks liveness at quiet intervals', async () => {
      const liveness = vi.fn(() => true);
      const { channel, log } = makeChannel({ liveness, config: { progressIntervalMs: 40 } });

      await expect(channel.waitFor('never', 300)).rejects.toBeInstanceOf(MarkerTimeoutError);

      expect(liveness).toHaveBeenCalled();
      expect(vi.mocked(log.info).mock.calls.length).toBe(liveness.mock.calls.length);
      expect(String(vi.mocked(log.info).mock.calls[0][0])).toContain('still waiting for "never"');
      expect(String(vi.mocked(log.info).mock.calls[0][0])).toContain('buf tail: "(empty)"');
    });

    it('does not check liveness between checkpoints', async () => {
      const liveness = vi.fn(() => true);
      const { channel } = makeChannel({ liveness, config: { progressIntervalMs: 10_000 } });

      await expect(channel.waitFor('never', 120)).rejects.toBeInstanceOf(MarkerTimeoutError);
      expect(liveness).not.toHaveBeenCalled();
    });

    it('aborts early when the emulator process is gone', async () => {
      const { channel } = makeChannel({ liveness: () => false, config: { progressIntervalMs: 30 } });
      const started = performance.now();

      await expect(channel.waitFor('B>', 5_000)).rejects.toThrow(
        'Connection lost: emulator process died while waiting for "B>"'
      );
      expect(performance.now() - started).toBeLessThan(2_000);
    });

    it('surfaces a dropped line as connection lost', async () => {
      const { socket, channel } = makeChannel();
      setTimeout(() => socket.emit('end'), 20);

      await expect(channel.waitFor('A>', 2_000)).rejects.toBeInstanceOf(ConnectionLostError);
    });

    it('succeeds when the marker arrives together with the close', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('Ready.'));
      socket.emit('end');

      expect(await channel.waitFor('Ready.', 1_000)).toBe('Ready.');
      await expect(channel.drain()).rejects.toBeInstanceOf(ConnectionLostError);
    });
  });

  describe('send', () => {
    it('writes UTF-8 text and notifies observers', async () => {
      const observer: ChannelObserver = { sent: vi.fn() };
      const { socket, channel } = makeChannel({ observers: [observer] });

      await channel.send('midisyn\r');

      expect(socket.written).toEqual([Buffer.from('midisyn\r')]);
      expect(observer.sent).toHaveBeenCalledWith('midisyn\r');
    });

    it('writes raw bytes untouched', async () => {
      const observer: ChannelObserver = { sentRaw: vi.fn() };
      const { socket, channel } = makeChannel({ observers: [observer] });
      const noteOn = Uint8Array.from([0x90, 0x3c, 0x64]);

      await channel.sendRaw(noteOn);

      expect(socket.written).toEqual([Buffer.from([0x90, 0x3c, 0x64])]);
      expect(observer.sentRaw).toHaveBeenCalledWith(noteOn);
    });

    it('maps a broken pipe to connection lost and marks the channel down', async () => {
      const { socket, channel } = makeChannel();
      socket.writeError = errnoError('EPIPE');

      await expect(channel.send('h')).rejects.toThrow('Connection lost: send failed: simulated EPIPE');
      expect(channel.connected).toBe(false);
    });

    it('maps a reset during a raw send to connection lost', async () => {
      const { socket, channel } = makeChannel();
      socket.writeError = errnoError('ECONNRESET');

      await expect(channel.sendRaw(Uint8Array.from([0x80]))).rejects.toThrow(
        'Connection lost: send_raw failed: simulated ECONNRESET'
      );
    });

    it('keeps other write errors distinct from connection loss', async () => {
      const { socket, channel } = makeChannel();
      socket.writeError = errnoError('EAGAIN');

      const err = await channel.send('h').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SerialIoError);
      expect(err).not.toBeInstanceOf(ConnectionLostError);
      expect(channel.connected).toBe(true);
    });

    it('refuses to send on a closed channel', async () => {
      const { socket, channel } = makeChannel();
      channel.close();

      expect(socket.destroyed).toBe(true);
      expect(channel.connected).toBe(false);
      await expect(channel.send('q')).rejects.toThrow('Connection lost: not connected');
    });
  });

  describe('sendCommand', () => {
    it('waits for the marker when one is given', async () => {
      const { socket, channel } = makeChannel();
      setTimeout(() => socket.emit('data', Buffer.from('Register port: 0xD8\r\nData port: 0xD0\r\n')), 10);

      const out = await channel.sendCommand('i', { waitFor: 'Data port:', timeoutMs: 1_000 });

      expect(socket.written).toEqual([Buffer.from('i')]);
      expect(out).toBe('Register port: 0xD8\nData port:');
    });

    it('returns the unconsumed buffer after settling when no marker is given', async () => {
      const { socket, channel } = makeChannel();
      socket.emit('data', Buffer.from('Status: OK\r\n'));

      const out = await channel.sendCommand('s', { settleMs: 10 });

      expect(out).toBe('Status: OK\n');
      expect(channel.peekPending()).toBe('Status: OK\n');
    });
  });

  it('discardPending empties the buffer and returns what it held', async () => {
    const { socket, channel } = makeChannel();
    socket.emit('data', Buffer.from('stale'));
    await channel.drain();

    expect(channel.discardPending()).toBe('stale');
    expect(channel.peekPending()).toBe('');
  });

  it('settle drains what arrives during the pause', async () => {
    const { socket, channel } = makeChannel();
    setTimeout(() => socket.emit('data', Buffer.from('Note: C4\r\n')), 5);

    expect(await channel.settle(30)).toBe('Note: C4\n');
  });
});
