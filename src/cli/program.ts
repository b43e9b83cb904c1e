/**
 * Command definitions for the nullmodem-harness CLI.
 */

import { Command } from 'commander';
import { loadHarnessConfig, type HarnessEnvOverrides } from '@nullmodem/config';
import { describeError } from '@nullmodem/utils/errors';
import { HarnessSession, type HarnessSessionOptions } from '../session/index.js';

interface RunOptions {
  host?: string;
  port?: string;
  midiPort?: string;
  resultsDir?: string;
  emulatorPid?: string;
  connectTimeout?: string;
  bootTimeout?: string;
  cmdTimeout?: string;
  audioTimeout?: string;
  bootDisk?: string;
}

/** Map CLI flags onto the environment keys they override. */
export function overridesFromOptions(options: RunOptions): HarnessEnvOverrides {
  return {
    SERIAL_HOST: options.host,
    SERIAL_PORT: options.port,
    MIDI_PORT: options.midiPort,
    RESULTS_DIR: options.resultsDir,
    EMULATOR_PID: options.emulatorPid,
    CONNECT_TIMEOUT: options.connectTimeout,
    BOOT_TIMEOUT: options.bootTimeout,
    CMD_TIMEOUT: options.cmdTimeout,
    AUDIO_TIMEOUT: options.audioTimeout,
    BOOT_DISK: options.bootDisk,
  };
}

export interface ProgramOptions {
  /** Passed to every session the run command starts */
  session?: HarnessSessionOptions;
  /** Ends the process with the run's exit code */
  exit?: (code: number) => void;
}

export function createProgram(programOptions: ProgramOptions = {}): Command {
  const program = new Command();
  const exit = programOptions.exit ?? ((code: number): void => process.exit(code));

  program
    .name('nullmodem-harness')
    .description('Marker-driven serial console test harness over a null-modem TCP socket')
    .version('0.1.0');

  program
    .command('run')
    .description('Listen for the emulator, run the console session and write the result')
    .option('--host <host>', 'Address to listen on (SERIAL_HOST)')
    .option('-p, --port <port>', 'Console line port (SERIAL_PORT)')
    .option('--midi-port <port>', 'MIDI line port, 0 for none (MIDI_PORT)')
    .option('-r, --results-dir <dir>', 'Directory for results and flags (RESULTS_DIR)')
    .option('--emulator-pid <pid>', 'Emulator process id for liveness checks (EMULATOR_PID)')
    .option('--connect-timeout <seconds>', 'Wait for the emulator to connect (CONNECT_TIMEOUT)')
    .option('--boot-timeout <seconds>', 'Wait for the boot loader and CP/M (BOOT_TIMEOUT)')
    .option('--cmd-timeout <seconds>', 'Wait per command (CMD_TIMEOUT)')
    .option('--audio-timeout <seconds>', 'Audio test window (AUDIO_TIMEOUT)')
    .option('--boot-disk <key>', 'Boot loader selection (BOOT_DISK)')
    .action(async (options: RunOptions) => {
      let session: HarnessSession;
      try {
        session = new HarnessSession(
          loadHarnessConfig(process.env, overridesFromOptions(options)),
          programOptions.session
        );
      } catch (err) {
        console.error(`Failed to start: ${describeError(err)}`);
        exit(1);
        return;
      }

      const onSignal = (signal: NodeJS.Signals): void => {
        session.abort(signal);
        exit(1);
      };
      process.on('SIGTERM', onSignal);
      process.on('SIGINT', onSignal);

      try {
        const passed = await session.run();
        exit(passed ? 0 : 1);
      } catch (err) {
        console.error('Session failed:', err);
        exit(1);
      } finally {
        process.off('SIGTERM', onSignal);
        process.off('SIGINT', onSignal);
      }
    });

  return program;
}
