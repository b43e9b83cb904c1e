export { SessionOutcome, signalEmulatorExit } from './outcome.js';
export { openSerialLines, type LineEndpoints, type SerialLines, type OpenLinesResult } from './lines.js';
export {
  SynthScript,
  StepAbortedError,
  DEFAULT_SESSION_PAUSES,
  type SessionPauses,
  type SynthScriptOptions,
} from './synth-script.js';
export { HarnessSession, type HarnessSessionOptions } from './session.js';
