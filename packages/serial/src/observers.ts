/**
 * Observation sinks for channel traffic.
 *
 * Everything a channel receives or sends is mirrored to its observers so a
 * failed run can be diagnosed from the transcript afterwards.
 */

import fs from 'node:fs';
import path from 'node:path';
import type { Writable } from 'node:stream';
import { hasNonPrintable, hexBytes, splitLinesKeepEnds } from '@nullmodem/utils/text';

export interface ChannelObserver {
  /** Decoded, normalized text appended to the pending buffer */
  received?(text: string): void;
  /** Raw bytes as read from the socket, before filler stripping */
  receivedRaw?(data: Uint8Array): void;
  sent?(text: string): void;
  sentRaw?(data: Uint8Array): void;
}

function clockTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export interface SerialIoLogOptions {
  /** Prefix for entries, e.g. 'AUX' for a secondary line */
  label?: string;
  now?: () => Date;
}

/**
 * Timestamped TX/RX transcript file.
 *
 * Text is written one line per entry as a JSON string; raw chunks that
 * contain non-printable bytes are also written as a hex dump.
 */
export class SerialIoLog implements ChannelObserver {
  readonly filePath: string;
  private fd: number | null;
  private readonly prefix: string;
  private readonly now: () => Date;

  constructor(filePath: string, options: SerialIoLogOptions = {}) {
    this.filePath = filePath;
    this.prefix = options.label ? `${options.label} ` : '';
    this.now = options.now ?? (() => new Date());
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.fd = fs.openSync(filePath, 'w');
  }

  received(text: string): void {
    this.writeText('RX', text);
  }

  receivedRaw(data: Uint8Array): void {
    if (!hasNonPrintable(data)) return;
    this.writeLine(`RX_HEX (${data.length} bytes) ${hexBytes(data)}`);
  }

  sent(text: string): void {
    this.writeText('TX', text);
  }

  sentRaw(data: Uint8Array): void {
    this.writeLine(`TX_RAW (${data.length} bytes) ${hexBytes(data)}`);
  }

  /** Derive a sink for another line that appends to the same file. */
  forLine(label: string): ChannelObserver {
    const tag = `${label} `;
    return {
      received: (text) => this.writeText(`${tag}RX`, text),
      receivedRaw: (data) => {
        if (hasNonPrintable(data)) this.writeLine(`${tag}RX_HEX (${data.length} bytes) ${hexBytes(data)}`);
      },
      sent: (text) => this.writeText(`${tag}TX`, text),
      sentRaw: (data) => this.writeLine(`${tag}TX_RAW (${data.length} bytes) ${hexBytes(data)}`),
    };
  }

  close(): void {
    if (this.fd === null) return;
    fs.closeSync(this.fd);
    this.fd = null;
  }

  private writeText(direction: string, text: string): void {
    for (const line of splitLinesKeepEnds(text)) {
      this.writeLine(`${direction} ${JSON.stringify(line)}`);
    }
  }

  private writeLine(entry: string): void {
    if (this.fd === null) return;
    fs.writeSync(this.fd, `[${clockTime(this.now())}] ${this.prefix}${entry}\n`);
  }
}

/** Echo received text to a stream so CI logs show the console output. */
export class ConsoleEcho implements ChannelObserver {
  constructor(private readonly out: Writable = process.stdout) {}

  received(text: string): void {
    this.out.write(text);
  }
}
