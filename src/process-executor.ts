/**
 * Process Executor
 *
 * Spawns external tools, captures their output and waits for exit. There is
 * no timeout: a hung tool blocks the run until the process is terminated.
 *
 * @example
 * ```typescript
 * const runner = createProcessRunner({ logger });
 * const result = await runner.run('ffprobe', ['-v', 'error', '/media/a.mkv']);
 * if (result.exitCode !== 0) { ... }
 * ```
 */

import { spawn, type ChildProcess } from 'child_process';
import type {
  CommandRunner,
  CommandResult,
  RunOptions,
  CapturedCommand,
  MockResponse,
} from './types/executor.js';
import type { Logger } from './observability/index.js';
import { NoopLogger } from './observability/index.js';
import { SpawnFailedError } from './errors/index.js';

/**
 * Tail of captured output included in failure logs
 */
const MAX_LOGGED_OUTPUT = 2000;

export interface ProcessRunnerConfig {
  logger?: Logger;
}

/**
 * Quote an argument for display in logs
 */
export function quoteArg(arg: string): string {
  if (arg === '') return "''";
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'"'"'`)}'`;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map(quoteArg).join(' ');
}

/**
 * CommandRunner backed by child_process.spawn
 */
export class ProcessRunner implements CommandRunner {
  private readonly logger: Logger;

  constructor(config: ProcessRunnerConfig = {}) {
    this.logger = config.logger ?? new NoopLogger();
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const display = formatCommand(command, args);
    const startTime = Date.now();
    this.logger.info(`Running: ${display}`);

    let proc: ChildProcess;
    try {
      proc = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });
    } catch (error) {
      throw new SpawnFailedError(
        command,
        error instanceof Error ? error.message : String(error),
        error instanceof Error ? error : undefined
      );
    }

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    proc.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    const { exitCode, signal } = await this.waitForExit(proc, command);

    const result: CommandResult = {
      exitCode,
      stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
      stderr: Buffer.concat(stderrChunks).toString('utf-8'),
      duration: Date.now() - startTime,
      signal: signal ?? undefined,
    };

    if (exitCode !== 0) {
      this.logger.warn(`Command failed (rc=${exitCode ?? signal ?? 'n/a'}): ${display}`, {
        stdout: result.stdout.slice(-MAX_LOGGED_OUTPUT),
        stderr: result.stderr.slice(-MAX_LOGGED_OUTPUT),
      });
    }

    return result;
  }

  /**
   * Wait for process to exit; 'close' fires after the output streams end
   */
  private waitForExit(
    proc: ChildProcess,
    command: string
  ): Promise<{ exitCode: number | null; signal: NodeJS.Signals | null }> {
    return new Promise((resolve, reject) => {
      proc.on('close', (code, signal) => {
        resolve({ exitCode: code, signal });
      });

      proc.on('error', (err) => {
        reject(new SpawnFailedError(command, err.message, err));
      });
    });
  }
}

/**
 * Mock runner for testing
 */
export class MockCommandRunner implements CommandRunner {
  capturedCommands: CapturedCommand[] = [];
  private responses: Array<{ pattern: RegExp; response: MockResponse }> = [];
  private defaultResult: CommandResult = {
    exitCode: 0,
    stdout: '',
    stderr: '',
    duration: 1,
  };

  /**
   * Script the response for commands whose display string matches the
   * pattern; later registrations win over earlier ones
   */
  on(pattern: string | RegExp, response: MockResponse): this {
    const regex = typeof pattern === 'string' ? new RegExp(escapeRegExp(pattern)) : pattern;
    this.responses.unshift({ pattern: regex, response });
    return this;
  }

  async run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const captured: CapturedCommand = { command, args, options };
    this.capturedCommands.push(captured);

    const display = [command, ...args].join(' ');
    const match = this.responses.find(({ pattern }) => pattern.test(display));
    if (!match) {
      return { ...this.defaultResult };
    }

    const { response } = match;
    if (response instanceof Error) {
      throw response;
    }
    const partial = typeof response === 'function' ? await response(captured) : response;
    return { ...this.defaultResult, ...partial };
  }

  /**
   * Commands run so far whose binary equals the given name
   */
  callsTo(command: string): CapturedCommand[] {
    return this.capturedCommands.filter((captured) => captured.command === command);
  }

  getCommandCount(): number {
    return this.capturedCommands.length;
  }

  reset(): void {
    this.capturedCommands = [];
    this.responses = [];
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Create a new process runner
 */
export function createProcessRunner(config?: ProcessRunnerConfig): ProcessRunner {
  return new ProcessRunner(config);
}

/**
 * Create a mock runner for testing
 */
export function createMockRunner(): MockCommandRunner {
  return new MockCommandRunner();
}
