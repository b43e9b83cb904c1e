/**
 * Peer process liveness.
 *
 * A probe answers "is the emulator still running". Without a PID there is
 * nothing to check, so the probe reports alive.
 */

import { errorCode } from './errors.js';

export type LivenessProbe = () => boolean;

/**
 * Check if a process is alive by sending signal 0.
 * EPERM means the process exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errorCode(err) === 'EPERM';
  }
}

export function pidLiveness(pid: number | undefined): LivenessProbe {
  if (pid === undefined || pid <= 0) {
    return () => true;
  }
  return () => isProcessAlive(pid);
}

export const alwaysAlive: LivenessProbe = () => true;
