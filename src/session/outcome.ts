/**
 * Session outcome: the ordered PASS/FAIL record of one harness run.
 *
 * Created at run start, appended to by the script, and persisted to
 * test_result.txt exactly once by finalize().
 */

import fs from 'node:fs';
import path from 'node:path';
import { describeError } from '@nullmodem/utils/errors';
import { sessionLog, teeLogger, transcriptLine, type Logger } from '@nullmodem/utils/logger';

export class SessionOutcome {
  readonly resultFile: string;
  private readonly lines: string[] = [];
  private failed = 0;
  private written = false;
  /** The plain logger; verdicts and checks go here directly */
  private readonly log: Logger;
  /** Everything logged here also lands in the transcript */
  private readonly recorded: Logger;

  constructor(resultFile: string, log: Logger = sessionLog) {
    this.resultFile = resultFile;
    this.log = log;
    this.recorded = teeLogger(log, (level, msg) => this.lines.push(transcriptLine(level, msg)));
  }

  get failures(): number {
    return this.failed;
  }

  get finalized(): boolean {
    return this.written;
  }

  /** Lines recorded so far, in order. */
  get entries(): readonly string[] {
    return this.lines;
  }

  note(msg: string): void {
    this.recorded.info(msg);
  }

  warn(msg: string): void {
    this.recorded.warn(msg);
  }

  error(msg: string, extra?: Record<string, unknown>): void {
    this.recorded.error(msg, extra);
  }

  /**
   * Record an assertion. Returns the condition. A failed check is logged as
   * a warning but its transcript line keeps the FAIL tag alone.
   */
  check(condition: boolean, description: string): boolean {
    const line = `${condition ? 'PASS' : 'FAIL'}  ${description}`;
    if (condition) {
      this.log.info(line);
    } else {
      this.log.warn(line);
      this.failed++;
    }
    this.lines.push(line);
    return condition;
  }

  /**
   * Write the result file: every recorded line, then the verdict.
   * Only the first call writes; later calls return false.
   */
  finalize(passed: boolean, detail = ''): boolean {
    if (this.written) {
      return false;
    }
    this.written = true;

    const verdict = passed ? 'RESULT: PASS' : `RESULT: FAIL${detail ? ` — ${detail}` : ''}`;
    fs.mkdirSync(path.dirname(this.resultFile), { recursive: true });
    fs.writeFileSync(this.resultFile, [...this.lines, verdict].map((line) => `${line}\n`).join(''));
    this.log.info(verdict);
    return true;
  }
}

/**
 * Touch the done flag so the emulator-side watchdog shuts the machine down.
 * A failure is recorded as a warning, never thrown.
 */
export function signalEmulatorExit(doneFlag: string, outcome: SessionOutcome): boolean {
  try {
    fs.mkdirSync(path.dirname(doneFlag), { recursive: true });
    fs.writeFileSync(doneFlag, '');
    outcome.note(`Done flag written: ${doneFlag}`);
    return true;
  } catch (err) {
    outcome.warn(`could not write done flag: ${describeError(err)}`);
    return false;
  }
}
