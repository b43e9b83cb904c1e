/**
 * In-process stand-in for the emulated machine, for session tests.
 *
 * Plays the ROM boot loader, CP/M and the synthesizer program over real
 * loopback sockets: it waits for the readiness flag, connects to the
 * console (and optionally MIDI) port like the emulator's null-modem device
 * does, and answers each command the way the program prints it.
 */

import fs from 'node:fs';
import net from 'node:net';

export const BOOT_BANNER =
  'RomWBW HBIOS v3.4.0, 2024-01-02\r\n\r\nRC2014 [RCZ80_std] Z80 @ 7.372MHz\r\n\r\nBoot [H=Help]: ';

export const SYNTH_REPLIES: Readonly<Record<string, string>> = {
  h: 'RC2014 MIDI Synthesizer Commands\r\n  h/H - Show this help\r\n  s/S - Status\r\n  q/Q - Quit program\r\n===\r\n',
  s: 'Chips: 1 x YM2149\r\nVoices: 3\r\n',
  i: 'Register port: 0xD8\r\nData port: 0xD0\r\n',
  t: 'Audio Test\r\nPlaying scale...\r\nComplete\r\n',
};

export interface FakeConsoleBehavior {
  /** Keys or command lines that get no reply */
  mute?: string[];
  /** Close the console socket instead of answering this key or line */
  hangUpOn?: string;
  /** Prefix every reply with 0xFF idle filler */
  idleFiller?: boolean;
}

export interface FakeEmulatorOptions {
  readyFlag: string;
  host: string;
  consolePort: number;
  midiPort?: number;
  behavior?: FakeConsoleBehavior;
  /** Give up waiting for the readiness flag after this long */
  flagTimeoutMs?: number;
}

type Mode = 'loader' | 'cpm' | 'synth' | 'keyboard';

export class FakeSynthConsole {
  /** Everything the harness typed, in order */
  readonly typed: string[] = [];
  /** Raw bytes received on the MIDI line */
  readonly midiBytes: number[] = [];
  private mode: Mode = 'loader';
  private line = '';
  private biosMidi = false;
  private consoleSocket: net.Socket | null = null;
  private midiSocket: net.Socket | null = null;
  private stopped = false;

  constructor(private readonly options: FakeEmulatorOptions) {}

  /** Wait for the flag, then connect the lines and print the boot banner. */
  async start(): Promise<void> {
    await this.waitForFlag();
    this.consoleSocket = await this.connectLine(this.options.consolePort);
    this.consoleSocket.on('data', (chunk: Buffer) => this.onConsoleInput(chunk.toString('utf-8')));
    this.consoleSocket.on('error', () => this.consoleSocket?.destroy());

    if (this.options.midiPort !== undefined) {
      this.midiSocket = await this.connectLine(this.options.midiPort);
      this.midiSocket.on('data', (chunk: Buffer) => this.onMidiInput(chunk));
      this.midiSocket.on('error', () => this.midiSocket?.destroy());
    }

    this.print(BOOT_BANNER);
  }

  stop(): void {
    this.stopped = true;
    this.consoleSocket?.destroy();
    this.midiSocket?.destroy();
  }

  private async waitForFlag(): Promise<void> {
    const deadline = Date.now() + (this.options.flagTimeoutMs ?? 5_000);
    while (!fs.existsSync(this.options.readyFlag)) {
      if (this.stopped || Date.now() > deadline) {
        throw new Error(`readiness flag never appeared: ${this.options.readyFlag}`);
      }
      await new Promise((resolve) => setTimeout(resolve, 5));
    }
  }

  private connectLine(port: number): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host: this.options.host, port }, () => {
        socket.off('error', reject);
        resolve(socket);
      });
      socket.once('error', reject);
    });
  }

  private onConsoleInput(text: string): void {
    for (const ch of text) {
      if (this.mode === 'loader' || this.mode === 'cpm') {
        if (ch === '\r') {
          const line = this.line;
          this.line = '';
          this.typed.push(line);
          this.answerLine(line);
        } else {
          this.line += ch;
        }
      } else {
        this.typed.push(ch);
        this.answerKey(ch);
      }
    }
  }

  private answerLine(line: string): void {
    if (this.intercept(line)) return;

    if (this.mode === 'loader') {
      this.mode = 'cpm';
      this.print(`${line}\r\n\r\nBooting ROM disk...\r\n\r\nCP/M-80 v2.2\r\n\r\nB>`);
      return;
    }
    if (line.toUpperCase() === 'C:') {
      this.print('\r\nC>');
      return;
    }
    if (line === 'midisyn') {
      this.mode = 'synth';
      this.print('\r\nRC2014 Multi-Chip MIDI Synthesizer v1.0\r\nFound YM2149 at 0xD8\r\nReady.\r\n');
      return;
    }
    this.print(`\r\n${line.toUpperCase()}?\r\nC>`);
  }

  private answerKey(key: string): void {
    if (this.intercept(key)) return;

    if (this.mode === 'keyboard') {
      switch (key) {
        case 'z':
          this.print('Note: C4\r\n');
          return;
        case 'x':
          this.print('Note: D4\r\n');
          return;
        case ' ':
          this.print('Note off: D4\r\n');
          return;
        case '`':
          this.mode = 'synth';
          this.print('Keyboard MIDI mode off\r\n');
          return;
        default:
          return;
      }
    }

    switch (key) {
      case 'k':
        this.mode = 'keyboard';
        this.print('Keyboard MIDI mode on. Use ` to exit.\r\n');
        return;
      case 'm':
        this.biosMidi = !this.biosMidi;
        this.print(`BIOS MIDI mode ${this.biosMidi ? 'on' : 'off'}\r\n`);
        return;
      case 'q':
        this.mode = 'cpm';
        this.print('Goodbye\r\n\r\nC>');
        return;
      default: {
        const reply = SYNTH_REPLIES[key];
        if (reply !== undefined) this.print(reply);
      }
    }
  }

  private onMidiInput(chunk: Buffer): void {
    for (const byte of chunk) {
      this.midiBytes.push(byte);
    }
    if (!this.biosMidi) return;
    const status = chunk[0];
    if (status !== undefined && (status & 0xf0) === 0x90) {
      this.print(`MIDI IN: ${Array.from(chunk, (b) => b.toString(16).padStart(2, '0')).join(' ')}\r\n`);
    }
  }

  /** Apply mute and hang-up behavior. Returns true when the input was handled. */
  private intercept(input: string): boolean {
    const behavior = this.options.behavior ?? {};
    if (behavior.hangUpOn === input) {
      this.consoleSocket?.end();
      return true;
    }
    return behavior.mute?.includes(input) ?? false;
  }

  private print(text: string): void {
    const socket = this.consoleSocket;
    if (!socket || socket.destroyed) return;
    const body = Buffer.from(text, 'utf-8');
    socket.write(this.options.behavior?.idleFiller ? Buffer.concat([Buffer.from([0xff, 0xff]), body]) : body);
  }
}

/** Reserve a free loopback port by binding port 0 and releasing it. */
export function freePort(host = '127.0.0.1'): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once('error', reject);
    server.listen(0, host, () => {
      const address = server.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      server.close(() => resolve(port));
    });
  });
}
