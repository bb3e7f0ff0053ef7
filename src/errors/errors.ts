/**
 * Base error class for all watchdog errors.
 * Carries a stable error code, the underlying cause and structured context.
 */
export class WatchdogError extends Error {
  /**
   * Unique error code identifying the specific error type
   */
  public readonly code: string;

  /**
   * The underlying error that caused this error, if any
   */
  public readonly cause?: Error;

  /**
   * Additional contextual information about the error
   */
  public readonly context: Record<string, unknown>;

  constructor(options: {
    message: string;
    code: string;
    cause?: Error;
    context?: Record<string, unknown>;
  }) {
    super(options.message);
    this.name = 'WatchdogError';
    this.code = options.code;
    this.cause = options.cause;
    this.context = options.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause: this.cause?.message,
    };
  }
}

// ==================== Startup Errors ====================

/**
 * Error thrown when the configuration file or environment is invalid
 */
export class ConfigurationError extends WatchdogError {
  constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
    super({
      message,
      code: 'INVALID_CONFIG',
      cause,
      context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Error raised when one or more required external tools cannot be run.
 * Fatal: the run stops before any file is processed.
 */
export class ToolMissingError extends WatchdogError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super({
      message: `Missing required tools: ${missing.join(', ')}`,
      code: 'TOOL_MISSING',
      context: { missing },
    });
    this.name = 'ToolMissingError';
    this.missing = missing;
  }
}

// ==================== Process Errors ====================

/**
 * Error thrown when an external process fails to spawn
 */
export class SpawnFailedError extends WatchdogError {
  constructor(command: string, reason: string, cause?: Error) {
    super({
      message: `Failed to spawn ${command}: ${reason}`,
      code: 'SPAWN_FAILED',
      cause,
      context: { command, reason },
    });
    this.name = 'SpawnFailedError';
  }
}

// ==================== Per-file Errors ====================

/**
 * The prober exited non-zero or produced output that could not be parsed
 */
export class ProbeFailureError extends WatchdogError {
  constructor(filePath: string, reason: string, cause?: Error) {
    super({
      message: `Failed to read metadata for ${filePath}: ${reason}`,
      code: 'PROBE_FAILURE',
      cause,
      context: { filePath, reason },
    });
    this.name = 'ProbeFailureError';
  }
}

/**
 * A copy to or from durable storage exited non-zero
 */
export class CopyFailureError extends WatchdogError {
  constructor(source: string, destination: string, exitCode: number | null, cause?: Error) {
    super({
      message: `Copy failed (rc=${exitCode ?? 'n/a'}): ${source} -> ${destination}`,
      code: 'COPY_FAILURE',
      cause,
      context: { source, destination, exitCode },
    });
    this.name = 'CopyFailureError';
  }
}

/**
 * The encoder exited non-zero or did not leave an output file behind
 */
export class EncodeFailureError extends WatchdogError {
  constructor(inputPath: string, outputPath: string, reason: string, cause?: Error) {
    super({
      message: `Transcode failed for ${inputPath}: ${reason}`,
      code: 'ENCODE_FAILURE',
      cause,
      context: { inputPath, outputPath, reason },
    });
    this.name = 'EncodeFailureError';
  }
}

/**
 * The candidate did not match the original closely enough to be published
 */
export class VerificationFailureError extends WatchdogError {
  constructor(candidatePath: string, reason: string, context: Record<string, unknown> = {}) {
    super({
      message: `Verification failed for ${candidatePath}: ${reason}`,
      code: 'VERIFICATION_FAILURE',
      context: { candidatePath, reason, ...context },
    });
    this.name = 'VerificationFailureError';
  }
}

/**
 * A step of the replace transaction failed
 */
export class ReplaceFailureError extends WatchdogError {
  /** True when the original path could be neither swapped nor restored */
  public readonly needsAttention: boolean;

  constructor(
    sourcePath: string,
    step: string,
    needsAttention: boolean,
    cause?: Error
  ) {
    super({
      message: `Safe replace failed at ${step} for ${sourcePath}${cause ? `: ${cause.message}` : ''}`,
      code: 'REPLACE_FAILURE',
      cause,
      context: { sourcePath, step, needsAttention },
    });
    this.name = 'ReplaceFailureError';
    this.needsAttention = needsAttention;
  }
}

/**
 * Type guard for watchdog errors
 */
export function isWatchdogError(error: unknown): error is WatchdogError {
  return error instanceof WatchdogError;
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
