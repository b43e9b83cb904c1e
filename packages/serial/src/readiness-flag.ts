/**
 * Out-of-band readiness signal for the emulator launcher.
 *
 * The flag file exists only while listening sockets wait for the emulator
 * to connect. Failures to create or remove it are logged, never thrown.
 */

import fs from 'node:fs';
import path from 'node:path';
import { listenerLog, type Logger } from '@nullmodem/utils/logger';

export class ReadinessFlag {
  readonly filePath: string;
  private readonly log: Logger;

  constructor(filePath: string, log: Logger = listenerLog) {
    this.filePath = filePath;
    this.log = log;
  }

  get raised(): boolean {
    return fs.existsSync(this.filePath);
  }

  /** Create the flag file. Returns false if it could not be written. */
  raise(): boolean {
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, '');
      this.log.debug('Readiness flag raised', { path: this.filePath });
      return true;
    } catch (err) {
      this.log.warn('Could not write readiness flag', { path: this.filePath, error: String(err) });
      return false;
    }
  }

  clear(): void {
    try {
      fs.rmSync(this.filePath, { force: true });
    } catch (err) {
      this.log.warn('Could not remove readiness flag', { path: this.filePath, error: String(err) });
    }
  }

  /** Run `fn` with the flag raised; the flag is removed however `fn` ends. */
  async during<T>(fn: () => Promise<T>): Promise<T> {
    this.raise();
    try {
      return await fn();
    } finally {
      this.clear();
    }
  }
}
