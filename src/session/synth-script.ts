/**
 * Scripted session against the synthesizer console.
 *
 * Boots CP/M from the ROM loader, launches midisyn from C:, then walks the
 * program's single-key commands, recording a check per observable result.
 * Boot and launch steps are required; later steps tolerate garbled or
 * truncated output and move on.
 */

import { HarnessError, MarkerTimeoutError, isHarnessError } from '@nullmodem/utils/errors';
import { sleep } from '@nullmodem/utils/text';
import type { NullModemChannel } from '@nullmodem/serial';
import type { SessionOutcome } from './outcome.js';

/** Pauses (ms) that let the console finish printing between steps. */
export interface SessionPauses {
  /** Before answering the boot loader prompt */
  beforeBootKey: number;
  /** After the CP/M prompt appears */
  afterBoot: number;
  /** After the synthesizer reports ready */
  afterLaunch: number;
  /** sendCommand() settle time when no marker is awaited */
  commandSettle: number;
  /** After the long help and status listings */
  afterListing: number;
  /** After mode toggles and short replies */
  short: number;
  /** After a keyboard note is played */
  keyboardNote: number;
  /** After a note-on is sent on the MIDI line */
  midiNote: number;
}

export const DEFAULT_SESSION_PAUSES: Readonly<SessionPauses> = {
  beforeBootKey: 500,
  afterBoot: 500,
  afterLaunch: 1_000,
  commandSettle: 500,
  afterListing: 2_000,
  short: 1_000,
  keyboardNote: 2_000,
  midiNote: 3_000,
};

export interface SynthScriptOptions {
  bootDisk: string;
  bootTimeoutMs: number;
  cmdTimeoutMs: number;
  /** How long the audio test is given to run */
  audioTimeoutMs: number;
  pauses?: Partial<SessionPauses>;
}

/** A required step did not complete; the run cannot continue. */
export class StepAbortedError extends HarnessError {
  readonly detail: string;

  constructor(detail: string, cause: MarkerTimeoutError) {
    super('timeout', `${detail}: ${cause.message}`, { cause });
    this.name = 'StepAbortedError';
    this.detail = detail;
  }
}

export const MIDI_NOTE_ON_C = Uint8Array.from([0x90, 0x3c, 0x64]);
export const MIDI_NOTE_OFF_C = Uint8Array.from([0x80, 0x3c, 0x00]);
export const MIDI_NOTE_ON_E = Uint8Array.from([0x90, 0x40, 0x50]);
export const MIDI_NOTE_OFF_E = Uint8Array.from([0x80, 0x40, 0x00]);

export class SynthScript {
  private readonly pauses: SessionPauses;

  constructor(
    private readonly term: NullModemChannel,
    private readonly midi: NullModemChannel | null,
    private readonly outcome: SessionOutcome,
    private readonly options: SynthScriptOptions
  ) {
    this.pauses = { ...DEFAULT_SESSION_PAUSES, ...options.pauses };
  }

  /**
   * Run every step. Throws StepAbortedError when a required step times out;
   * connection loss propagates as ConnectionLostError.
   */
  async run(): Promise<void> {
    const startup = await this.bootToCpm();
    await this.launchSynth(startup);
    await this.help();
    await this.status();
    await this.ioports();
    await this.keyboardMidi();
    await this.biosMidi();
    await this.audioTest();
    await this.quit();
  }

  private async bootToCpm(): Promise<string> {
    const { term, outcome, options } = this;

    outcome.note(`Waiting for RomWBW boot loader (up to ${seconds(options.bootTimeoutMs)}s) ...`);
    const loader = await this.required(
      term.waitFor('Boot [H=Help]:', options.bootTimeoutMs),
      "RomWBW boot loader did not appear (no 'Boot [H=Help]:' seen)"
    );
    outcome.note('RomWBW boot loader reached');
    outcome.check(loader.includes('RomWBW HBIOS'), 'boot: RomWBW HBIOS banner present');

    outcome.note(`Sending '${options.bootDisk}' to boot CP/M from ROM ...`);
    await sleep(this.pauses.beforeBootKey);
    await term.send(`${options.bootDisk}\r`);

    outcome.note('Waiting for CP/M B> prompt ...');
    const boot = await this.required(
      term.waitFor('B>', options.bootTimeoutMs),
      'CP/M did not boot (no B> prompt seen)'
    );
    outcome.note('CP/M boot complete, got B> prompt');

    await term.settle(this.pauses.afterBoot);
    return boot;
  }

  private async launchSynth(bootOutput: string): Promise<void> {
    const { term, outcome, options } = this;

    // ROM boot maps the hard disk holding midisyn.com as C:
    outcome.note('Switching to C: drive (IDE0 hard disk) ...');
    await term.send('C:\r');
    await this.required(term.waitFor('C>', options.cmdTimeoutMs), 'failed to switch to C: drive');

    outcome.note('Launching midisyn ...');
    await term.send('midisyn\r');
    const launch = await this.required(
      term.waitFor('Ready.', options.cmdTimeoutMs),
      "midisynth did not start (no 'Ready.' seen)"
    );

    outcome.check((bootOutput + launch).includes('RC2014 Multi-Chip MIDI Synthesizer'), 'startup banner present');
    outcome.check(launch.includes('Ready.'), 'midisynth ready prompt present');

    await this.flush(this.pauses.afterLaunch);
  }

  private async help(): Promise<void> {
    const { outcome } = this;
    outcome.note("Running 'h' (help) ...");
    // The listing is long; wait for an early line rather than its footer
    const out = await this.optional(
      this.command('h', 'Quit program'),
      'help text garbled or truncated (serial overrun); continuing with remaining tests'
    );
    if (out !== null) {
      outcome.check(
        out.includes('RC2014 MIDI Synthesizer Commands') || out.includes('MIDI Synthesizer'),
        'help: command list header present'
      );
      outcome.check(out.includes('h/H') || out.includes('Show this help'), 'help: h command listed');
    }
    await this.flush(this.pauses.afterListing);
  }

  private async status(): Promise<void> {
    this.outcome.note("Running 's' (status) ...");
    await this.command('s');
    await this.flush(this.pauses.afterListing);
    this.outcome.note('  status command completed (output captured to log above)');
  }

  private async ioports(): Promise<void> {
    const { outcome } = this;
    outcome.note("Running 'i' (ioports) ...");
    const out = await this.optional(this.command('i', 'Data port:'), 'ioports output truncated; continuing');
    if (out !== null) {
      outcome.check(out.includes('Register port:') || out.includes('0x'), 'ioports: port info present');
      outcome.check(out.includes('Data port:'), 'ioports: Data port line present');
    }
    await this.flush(this.pauses.short);
  }

  private async keyboardMidi(): Promise<void> {
    const { outcome, pauses } = this;
    outcome.note("Running 'k' (keyboard MIDI mode) ...");
    const out = await this.optional(
      this.command('k', 'Keyboard MIDI mode on.'),
      'keyboard MIDI mode activation garbled; continuing'
    );
    if (out !== null) {
      outcome.check(out.includes('Keyboard MIDI mode on'), 'keyboard midi: mode activated');
    }
    await this.flush(pauses.short);

    outcome.note("  Sending 'z' (play C note in keyboard MIDI mode) ...");
    const noteOn = await this.keyAndCapture('z', pauses.keyboardNote);
    outcome.check(noteOn.includes('Note:'), 'keyboard midi: note-on feedback printed');

    outcome.note("  Sending 'x' (play D note) ...");
    await this.keyAndCapture('x', pauses.keyboardNote);

    outcome.note('  Sending space (note off) ...');
    const noteOff = await this.keyAndCapture(' ', pauses.short);
    outcome.check(noteOff.includes('Note off:'), 'keyboard midi: note-off feedback printed');

    outcome.note('  Sending backtick (exit keyboard MIDI mode) ...');
    const exit = await this.keyAndCapture('`', pauses.short);
    outcome.check(exit.includes('Keyboard MIDI mode off'), 'keyboard midi: mode deactivated');
  }

  private async biosMidi(): Promise<void> {
    const { term, midi, outcome, pauses } = this;
    if (!midi || !midi.connected) {
      outcome.note('MIDI serial port not available; skipping BIOS MIDI test');
      outcome.check(true, 'bios midi: skipped (no MIDI port)');
      return;
    }

    outcome.note('Running BIOS MIDI test via second serial port ...');
    outcome.note("  Activating BIOS MIDI mode ('m' command) ...");
    const on = await this.keyAndCapture('m', pauses.short);
    outcome.check(on.includes('BIOS MIDI mode on'), 'bios midi: mode activated');

    outcome.note('  Sending MIDI Note On (note 60, vel 100) via AUX port ...');
    await midi.sendRaw(MIDI_NOTE_ON_C);
    await term.settle(pauses.midiNote);
    outcome.check(term.discardPending().includes('MIDI IN:'), 'bios midi: note-on received via AUX');

    outcome.note('  Sending MIDI Note Off (note 60) via AUX port ...');
    await midi.sendRaw(MIDI_NOTE_OFF_C);
    await this.flush(pauses.short);

    // Second note checks running status handling
    outcome.note('  Sending MIDI Note On (note 64, vel 80) via AUX port ...');
    await midi.sendRaw(MIDI_NOTE_ON_E);
    await sleep(pauses.midiNote);
    await midi.sendRaw(MIDI_NOTE_OFF_E);
    await this.flush(pauses.short);

    outcome.check(true, 'bios midi: MIDI bytes sent (audio check deferred to WAV)');

    outcome.note("  Deactivating BIOS MIDI mode ('m' command) ...");
    const off = await this.keyAndCapture('m', pauses.short);
    outcome.check(off.includes('BIOS MIDI mode off'), 'bios midi: mode deactivated');
  }

  private async audioTest(): Promise<void> {
    const { term, outcome, options } = this;
    // Output during the tone test is usually overrun; give it a fixed window
    outcome.note(`Running 't' (audio test), waiting ${seconds(options.audioTimeoutMs)}s ...`);
    await this.command('t');
    outcome.note('  Audio test command sent, waiting for it to complete...');
    await term.settle(options.audioTimeoutMs);

    const out = term.discardPending();
    if (out.includes('Complete') || out.includes('Audio Test')) {
      outcome.check(true, 'audio test: completion marker found in serial output');
    } else {
      outcome.note('  Audio test completion marker not found in serial output (expected with serial overrun at high speed)');
      outcome.note('  Audio validation deferred to WAV file analysis');
      outcome.check(true, 'audio test: command sent (WAV check deferred)');
    }
  }

  private async quit(): Promise<void> {
    const { term, outcome, options } = this;
    outcome.note("Running 'q' (quit) ...");
    await this.command('q');
    const back = await this.optional(
      term.waitFor('C>', options.cmdTimeoutMs),
      'did not see C> after quit (program may have exited cleanly anyway)'
    );
    if (back !== null) {
      outcome.check(true, 'quit: returned to CP/M C> prompt');
    }
  }

  private command(key: string, marker?: string): Promise<string> {
    return this.term.sendCommand(key, {
      waitFor: marker,
      timeoutMs: this.options.cmdTimeoutMs,
      settleMs: this.pauses.commandSettle,
    });
  }

  /** Send a key, let the reply arrive, and take everything buffered. */
  private async keyAndCapture(key: string, pauseMs: number): Promise<string> {
    await this.term.send(key);
    await this.term.settle(pauseMs);
    return this.term.discardPending();
  }

  /** Let trailing output arrive, then drop it so the next step starts clean. */
  private async flush(pauseMs: number): Promise<void> {
    await this.term.settle(pauseMs);
    this.term.discardPending();
  }

  private async required(step: Promise<string>, detail: string): Promise<string> {
    try {
      return await step;
    } catch (err) {
      if (err instanceof MarkerTimeoutError) {
        this.outcome.error(err.message);
        throw new StepAbortedError(detail, err);
      }
      throw err;
    }
  }

  /** A marker timeout becomes a warning and null; anything else propagates. */
  private async optional(step: Promise<string>, warning: string): Promise<string | null> {
    try {
      return await step;
    } catch (err) {
      if (isHarnessError(err, 'timeout')) {
        this.outcome.warn(warning);
        return null;
      }
      throw err;
    }
  }
}

function seconds(ms: number): number {
  return Math.round(ms / 1000);
}
