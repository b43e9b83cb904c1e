import { z } from 'zod';

const seconds = (fallback: number) => z.coerce.number().positive().default(fallback);

const port = (fallback: number) => z.coerce.number().int().min(0).max(65535).default(fallback);

// Environment read by the harness entry point; every field has a default
export const HarnessEnvSchema = z.object({
  SERIAL_HOST: z.string().min(1).default('localhost'),
  SERIAL_PORT: port(12345),
  /** 0 disables the auxiliary MIDI line */
  MIDI_PORT: port(0),
  RESULTS_DIR: z.string().min(1).default('tests/e2e/results'),
  /** 0 or unset means the emulator PID is unknown */
  EMULATOR_PID: z.coerce.number().int().nonnegative().default(0),
  CONNECT_TIMEOUT: seconds(60),
  BOOT_TIMEOUT: seconds(120),
  CMD_TIMEOUT: seconds(30),
  AUDIO_TIMEOUT: seconds(60),
  BOOT_DISK: z.string().min(1).default('c'),
});

export type HarnessEnv = z.infer<typeof HarnessEnvSchema>;

export const HarnessConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  midiPort: z.number().int().min(0).max(65535).optional(),
  resultsDir: z.string().min(1),
  emulatorPid: z.number().int().positive().optional(),
  connectTimeoutMs: z.number().positive(),
  bootTimeoutMs: z.number().positive(),
  cmdTimeoutMs: z.number().positive(),
  audioTimeoutMs: z.number().positive(),
  bootDisk: z.string().min(1),
});

export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;
