import { describe, it, expect } from 'vitest';
import { isProcessAlive, pidLiveness, alwaysAlive } from './liveness.js';

describe('isProcessAlive', () => {
  it('should return true for current process', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });

  it('should return false for non-existent PID', () => {
    // PID 99999999 should not exist
    expect(isProcessAlive(99999999)).toBe(false);
  });
});

describe('pidLiveness', () => {
  it('assumes alive when no PID is tracked', () => {
    expect(pidLiveness(undefined)()).toBe(true);
    expect(pidLiveness(0)()).toBe(true);
  });

  it('checks the tracked PID', () => {
    expect(pidLiveness(process.pid)()).toBe(true);
    expect(pidLiveness(99999999)()).toBe(false);
  });

  it('alwaysAlive never reports death', () => {
    expect(alwaysAlive()).toBe(true);
  });
});
