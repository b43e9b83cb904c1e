/**
 * HarnessSession - one end-to-end run against the emulated synthesizer.
 *
 * Opens the result transcript, brings up the serial lines, runs the
 * script and always ends the same way: channels closed, done flag written,
 * result file finalized once.
 */

import type { Writable } from 'node:stream';
import { getResultPaths, type HarnessConfig, type ResultPaths } from '@nullmodem/config';
import { describeError, isHarnessError } from '@nullmodem/utils/errors';
import { pidLiveness } from '@nullmodem/utils/liveness';
import { sessionLog, type Logger } from '@nullmodem/utils/logger';
import {
  ConsoleEcho,
  ReadinessFlag,
  SerialIoLog,
  type ChannelConfig,
  type ChannelObserver,
} from '@nullmodem/serial';
import { openSerialLines, type SerialLines } from './lines.js';
import { SessionOutcome, signalEmulatorExit } from './outcome.js';
import { StepAbortedError, SynthScript, type SessionPauses } from './synth-script.js';

export interface HarnessSessionOptions {
  pauses?: Partial<SessionPauses>;
  /** Where received console text is echoed; null disables the echo */
  echo?: Writable | null;
  /** Channel timing overrides */
  channel?: Partial<ChannelConfig>;
  log?: Logger;
}

interface Verdict {
  passed: boolean;
  detail: string;
}

export class HarnessSession {
  readonly paths: ResultPaths;
  readonly outcome: SessionOutcome;
  private readonly readyFlag: ReadinessFlag;
  private lines: SerialLines | null = null;
  private ioLog: SerialIoLog | null = null;
  private shutDown = false;

  constructor(
    private readonly config: HarnessConfig,
    private readonly options: HarnessSessionOptions = {}
  ) {
    this.paths = getResultPaths(config.resultsDir);
    this.outcome = new SessionOutcome(this.paths.resultFile, options.log ?? sessionLog);
    this.readyFlag = new ReadinessFlag(this.paths.readyFlag);
  }

  /** Run the session. Resolves true only when every check passed. */
  async run(): Promise<boolean> {
    let verdict: Verdict;
    try {
      verdict = await this.execute();
    } catch (err) {
      this.outcome.error(`unexpected exception: ${describeError(err)}`, {
        stack: err instanceof Error ? err.stack : undefined,
      });
      verdict = { passed: false, detail: describeError(err) };
    } finally {
      this.shutdown();
    }

    this.outcome.finalize(verdict.passed, verdict.detail);
    return verdict.passed;
  }

  /**
   * Stop on a termination signal: drop the readiness flag, release the
   * lines, tell the emulator to exit and leave a failing result if none was
   * written yet.
   */
  abort(signal: string): void {
    this.outcome.note(`Received ${signal}, shutting down`);
    this.shutdown();
    this.outcome.finalize(false, `terminated by ${signal}`);
  }

  private async execute(): Promise<Verdict> {
    const { config, outcome, paths } = this;

    this.ioLog = new SerialIoLog(paths.serialLog);
    outcome.note(
      `nullmodem-harness starting  host=${config.host}  port=${config.port}  midi_port=${config.midiPort ?? 0}`
    );
    outcome.note(`emulator PID: ${config.emulatorPid ?? 'unknown'}`);
    outcome.note(
      `timeouts: connect=${seconds(config.connectTimeoutMs)}s  boot=${seconds(config.bootTimeoutMs)}s  ` +
        `cmd=${seconds(config.cmdTimeoutMs)}s  audio=${seconds(config.audioTimeoutMs)}s`
    );

    const liveness = pidLiveness(config.emulatorPid);
    const consoleObservers: ChannelObserver[] = [this.ioLog];
    const echo = this.options.echo === undefined ? process.stdout : this.options.echo;
    if (echo) {
      consoleObservers.push(new ConsoleEcho(echo));
    }

    const opened = await openSerialLines(
      {
        host: config.host,
        consolePort: config.port,
        midiPort: config.midiPort,
        connectTimeoutMs: config.connectTimeoutMs,
      },
      {
        flag: this.readyFlag,
        outcome,
        consoleChannel: { observers: consoleObservers, liveness, config: this.options.channel },
        midiChannel: { observers: [this.ioLog.forLine('MIDI')], liveness, config: this.options.channel },
      }
    );
    if (!opened.ok) {
      outcome.error(opened.error.message);
      return { passed: false, detail: opened.detail };
    }
    this.lines = opened.lines;

    const script = new SynthScript(opened.lines.console, opened.lines.midi, outcome, {
      bootDisk: config.bootDisk,
      bootTimeoutMs: config.bootTimeoutMs,
      cmdTimeoutMs: config.cmdTimeoutMs,
      audioTimeoutMs: config.audioTimeoutMs,
      pauses: this.options.pauses,
    });

    try {
      await script.run();
    } catch (err) {
      if (err instanceof StepAbortedError) {
        return { passed: false, detail: err.detail };
      }
      if (isHarnessError(err, 'connection_lost')) {
        outcome.error(err.message);
        return { passed: false, detail: err.message };
      }
      throw err;
    }

    const failures = outcome.failures;
    return failures === 0
      ? { passed: true, detail: '' }
      : { passed: false, detail: `${failures} assertion(s) failed` };
  }

  private shutdown(): void {
    if (this.shutDown) return;
    this.shutDown = true;

    // Also covers an abort while an accept is still pending
    this.readyFlag.clear();
    this.lines?.midi?.close();
    this.lines?.console.close();
    this.ioLog?.close();
    signalEmulatorExit(this.paths.doneFlag, this.outcome);
  }
}

function seconds(ms: number): number {
  return Math.round(ms / 1000);
}
