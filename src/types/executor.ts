/**
 * Command runner types for external tools.
 *
 * Every external binary (prober, encoder, copier) is reached through a
 * CommandRunner so the decision logic can run against a mock.
 */

/**
 * Runs an external command to completion
 */
export interface CommandRunner {
  /**
   * Run a command and wait for it to exit
   * @param command - Binary name or path
   * @param args - Arguments passed verbatim, never through a shell
   */
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * Options for a single command run
 */
export interface RunOptions {
  /** Working directory for the process */
  cwd?: string;

  /** Extra environment variables */
  env?: Record<string, string>;
}

/**
 * Result of a command run
 */
export interface CommandResult {
  /** Exit code; null when the process was terminated by a signal */
  exitCode: number | null;

  /** Captured standard output */
  stdout: string;

  /** Captured standard error */
  stderr: string;

  /** Execution duration in milliseconds */
  duration: number;

  /** Signal that terminated the process */
  signal?: NodeJS.Signals;
}

/**
 * Captured command for testing/mocking
 */
export interface CapturedCommand {
  command: string;
  args: string[];
  options: RunOptions;
}

/**
 * Scripted response of a mock runner; a function may act on the
 * filesystem before answering (e.g. write the encoder's output file)
 */
export type MockResponse =
  | Partial<CommandResult>
  | Error
  | ((captured: CapturedCommand) => Partial<CommandResult> | Promise<Partial<CommandResult>>);

/**
 * Successful exit check
 */
export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0;
}
