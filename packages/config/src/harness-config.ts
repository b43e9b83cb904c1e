import path from 'node:path';
import { ConfigError } from '@nullmodem/utils/errors';
import { HarnessEnvSchema, HarnessConfigSchema, type HarnessConfig, type HarnessEnv } from './schemas.js';

export const DEFAULT_HARNESS_ENV: HarnessEnv = HarnessEnvSchema.parse({});

/** String overrides keyed like the environment (CLI flags land here). */
export type HarnessEnvOverrides = Partial<Record<keyof HarnessEnv, string>>;

const ENV_KEYS = Object.keys(HarnessEnvSchema.shape);

function pickEnv(source: NodeJS.ProcessEnv | HarnessEnvOverrides): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value: unknown = Reflect.get(source, key);
    // Empty values count as unset
    if (typeof value === 'string' && value.trim() !== '') {
      picked[key] = value.trim();
    }
  }
  return picked;
}

/**
 * Resolve the harness configuration from the environment, with
 * overrides taking precedence. Timeouts are given in seconds and
 * returned in milliseconds.
 */
export function loadHarnessConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: HarnessEnvOverrides = {}
): HarnessConfig {
  const parsed = HarnessEnvSchema.safeParse({ ...pickEnv(env), ...pickEnv(overrides) });
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return HarnessConfigSchema.parse({
    host: e.SERIAL_HOST,
    port: e.SERIAL_PORT,
    midiPort: e.MIDI_PORT > 0 ? e.MIDI_PORT : undefined,
    resultsDir: e.RESULTS_DIR,
    emulatorPid: e.EMULATOR_PID > 0 ? e.EMULATOR_PID : undefined,
    connectTimeoutMs: e.CONNECT_TIMEOUT * 1000,
    bootTimeoutMs: e.BOOT_TIMEOUT * 1000,
    cmdTimeoutMs: e.CMD_TIMEOUT * 1000,
    audioTimeoutMs: e.AUDIO_TIMEOUT * 1000,
    bootDisk: e.BOOT_DISK,
  });
}

export interface ResultPaths {
  resultsDir: string;
  /** Ordered PASS/FAIL lines and the final RESULT line */
  resultFile: string;
  /** Timestamped TX/RX transcript */
  serialLog: string;
  /** Present while listening sockets wait for the emulator */
  readyFlag: string;
  /** Tells the emulator-side watchdog to shut the machine down */
  doneFlag: string;
}

export function getResultPaths(resultsDir: string): ResultPaths {
  return {
    resultsDir,
    resultFile: path.join(resultsDir, 'test_result.txt'),
    serialLog: path.join(resultsDir, 'serial_io.log'),
    readyFlag: path.join(resultsDir, 'server_ready.flag'),
    doneFlag: path.join(resultsDir, 'emulator_done.flag'),
  };
}
