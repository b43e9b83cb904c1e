/**
 * Brings up the serial lines for a session: the console line (required)
 * and the MIDI line (optional).
 *
 * Both lines listen before the readiness flag goes up so the emulator can
 * connect to either as soon as it starts. A console failure ends the run;
 * a MIDI failure only drops the tests that need it.
 */

import type { AcceptError, BindError } from '@nullmodem/utils/errors';
import {
  SerialListener,
  type ChannelOptions,
  type NullModemChannel,
  type ReadinessFlag,
} from '@nullmodem/serial';
import type { SessionOutcome } from './outcome.js';

export interface LineEndpoints {
  host: string;
  consolePort: number;
  /** Unset means no MIDI line */
  midiPort?: number;
  connectTimeoutMs: number;
}

export interface SerialLines {
  console: NullModemChannel;
  midi: NullModemChannel | null;
}

export type OpenLinesResult =
  | { ok: true; lines: SerialLines }
  | { ok: false; detail: string; error: BindError | AcceptError };

export interface OpenLinesOptions {
  flag: ReadinessFlag;
  outcome: SessionOutcome;
  consoleChannel?: ChannelOptions;
  midiChannel?: ChannelOptions;
}

export async function openSerialLines(endpoints: LineEndpoints, options: OpenLinesOptions): Promise<OpenLinesResult> {
  const { host, consolePort, midiPort, connectTimeoutMs } = endpoints;
  const { flag, outcome } = options;

  outcome.note(
    `Setting up TCP server(s): console=${host}:${consolePort}` +
      (midiPort !== undefined ? `  midi=${host}:${midiPort}` : '')
  );

  const consoleListener = new SerialListener(host, consolePort, {
    channel: { label: 'console', ...options.consoleChannel },
  });
  const bound = await consoleListener.listen();
  if (!bound.ok) {
    return { ok: false, detail: `could not bind console port ${host}:${consolePort}`, error: bound.error };
  }

  let midiListener: SerialListener | null = null;
  if (midiPort !== undefined) {
    midiListener = new SerialListener(host, midiPort, {
      channel: { label: 'midi', ...options.midiChannel },
    });
    const midiBound = await midiListener.listen();
    if (!midiBound.ok) {
      outcome.warn(`could not bind MIDI port ${host}:${midiPort}; BIOS MIDI tests will be skipped`);
      midiListener = null;
    }
  }

  return flag.during(async (): Promise<OpenLinesResult> => {
    outcome.note(`Waiting for the emulator to connect to console port ${consoleListener.port} ...`);
    const accepted = await consoleListener.accept(connectTimeoutMs);
    if (!accepted.ok) {
      midiListener?.close();
      return { ok: false, detail: `could not connect to ${host}:${consolePort}`, error: accepted.error };
    }

    let midi: NullModemChannel | null = null;
    if (midiListener) {
      outcome.note(`Waiting for the emulator to connect to MIDI port ${midiListener.port} ...`);
      const midiAccepted = await midiListener.accept(connectTimeoutMs);
      if (midiAccepted.ok) {
        midi = midiAccepted.channel;
      } else {
        outcome.warn('emulator did not connect to MIDI port; BIOS MIDI tests will be skipped');
      }
    }

    return { ok: true, lines: { console: accepted.channel, midi } };
  });
}
