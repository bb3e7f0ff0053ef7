// Base error class
export { WatchdogError, isWatchdogError, toError } from './errors.js';

// Startup errors
export { ConfigurationError, ToolMissingError } from './errors.js';

// Process errors
export { SpawnFailedError } from './errors.js';

// Per-file errors
export {
  ProbeFailureError,
  CopyFailureError,
  EncodeFailureError,
  VerificationFailureError,
  ReplaceFailureError,
} from './errors.js';

// Outcome values
export { ok, err } from './result.js';
export type { Result } from './result.js';
