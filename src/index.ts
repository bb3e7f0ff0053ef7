/**
 * Transcode Watchdog
 *
 * Walks a media library, re-encodes files that miss the target codec or
 * size policy, verifies each candidate against its original and swaps it in
 * only when it is smaller. Handled files are recorded in an append-only log
 * so later runs skip them.
 *
 * @packageDocumentation
 *
 * @example Basic usage
 * ```typescript
 * import { loadConfig, createContext, ConsoleLogger, runWatchdog } from 'transcode-watchdog';
 *
 * const config = loadConfig({ configPath: './watchdog.config.json' });
 * const ctx = createContext({ logger: new ConsoleLogger() });
 * const { exitCode, summary } = await runWatchdog(config, ctx);
 * ```
 */

// ============================================================================
// Run
// ============================================================================

export { runWatchdog, EXIT_OK, EXIT_TOOL_MISSING, EXIT_INVALID_CONFIG } from './watchdog.js';
export type { WatchdogDependencies, WatchdogRun } from './watchdog.js';

export { main, parseArgs } from './cli.js';
export type { CliArgs, MainOptions } from './cli.js';

// ============================================================================
// Pipeline
// ============================================================================

export { WatchdogPipeline } from './pipeline.js';
export type { PipelineStages } from './pipeline.js';

export { Inspector, sizeLimitBytes } from './inspector.js';
export type { InspectionPolicy } from './inspector.js';

export { Transcoder, planJob } from './transcoder.js';
export type { TranscoderSettings } from './transcoder.js';

export { Verifier, DURATION_TOLERANCE_SECONDS } from './verifier.js';

export { isEfficient } from './efficiency.js';

export { Replacer, replacePaths, resolveStrategy } from './replacer.js';

export { IdempotencyLog, parseEntries } from './idempotency-log.js';

export { scanMediaFiles, existingDirectories, hasVideoExtension } from './scanner.js';

export { nodeFileOperations, candidatePathFor } from './file-ops.js';
export type { FileOperations } from './file-ops.js';

// ============================================================================
// Context
// ============================================================================

export { createContext, forFile, LoggingEventSink, InMemoryEventSink } from './context.js';
export type { ExecutionContext } from './context.js';

// ============================================================================
// Tools
// ============================================================================

export {
  FfprobeProber,
  HandBrakeEncoder,
  RsyncCopier,
  verifyDependencies,
  parseProbeOutput,
} from './tools/index.js';

export type { MetadataProber, Encoder, EncodeRequest, RemoteCopier } from './tools/index.js';

export {
  ProcessRunner,
  MockCommandRunner,
  createProcessRunner,
  createMockRunner,
  formatCommand,
} from './process-executor.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  loadConfig,
  parseConfig,
  configSchema,
  resolvePath,
  DEFAULT_CONFIG_FILE,
  DEFAULT_VIDEO_EXTENSIONS,
} from './config.js';

export type { WatchdogConfig, ToolPaths, ReplaceStrategy, LoadConfigOptions } from './config.js';

// ============================================================================
// Errors
// ============================================================================

export * from './errors/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';

// ============================================================================
// Types
// ============================================================================

export type {
  CommandRunner,
  CommandResult,
  RunOptions,
  CapturedCommand,
  MockResponse,
} from './types/executor.js';

export type {
  MediaInfo,
  StreamInfo,
  StreamType,
  StreamCounts,
} from './types/media-info.js';
export { findVideoCodec, countStreams } from './types/media-info.js';

export type {
  InspectionVerdict,
  TranscodeJob,
  TranscodeFailure,
  VerificationReport,
  VerificationResult,
  ReplaceState,
  ReplacePaths,
  ReplaceResult,
  FileOutcome,
  FileOutcomeKind,
  RunSummary,
} from './types/pipeline.js';

export type { PipelineEvent, PipelineEventType, EventSink } from './types/events.js';
