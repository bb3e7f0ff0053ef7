/**
 * Tests for the command runners.
 */

import { describe, it, expect } from 'vitest';
import {
  InMemoryLogger,
  MockCommandRunner,
  ProcessRunner,
  SpawnFailedError,
  formatCommand,
} from '../index.js';
import { quoteArg } from '../process-executor.js';

describe('formatCommand', () => {
  it('should quote arguments that need it', () => {
    expect(formatCommand('ffprobe', ['-v', 'quiet', '/media/My Show.mkv'])).toBe(
      "ffprobe -v quiet '/media/My Show.mkv'"
    );
  });

  it('should escape single quotes', () => {
    expect(quoteArg("it's")).toBe(`'it'"'"'s'`);
    expect(quoteArg('')).toBe("''");
  });
});

describe('MockCommandRunner', () => {
  it('should return the default result when nothing matches', async () => {
    const runner = new MockCommandRunner();

    const result = await runner.run('rsync', ['a', 'b']);

    expect(result).toEqual({ exitCode: 0, stdout: '', stderr: '', duration: 1 });
    expect(runner.capturedCommands).toEqual([
      { command: 'rsync', args: ['a', 'b'], options: {} },
    ]);
  });

  it('should prefer the latest matching registration', async () => {
    const runner = new MockCommandRunner()
      .on(/rsync/, { exitCode: 1 })
      .on('rsync -avh', { exitCode: 2 });

    expect((await runner.run('rsync', ['-avh', 'a', 'b'])).exitCode).toBe(2);
    expect((await runner.run('rsync', ['--version'])).exitCode).toBe(1);
  });

  it('should treat string patterns literally', async () => {
    const runner = new MockCommandRunner().on('a.mkv', { exitCode: 5 });

    expect((await runner.run('ffprobe', ['abmkv'])).exitCode).toBe(0);
    expect((await runner.run('ffprobe', ['a.mkv'])).exitCode).toBe(5);
  });

  it('should throw scripted errors', async () => {
    const runner = new MockCommandRunner().on('HandBrakeCLI', new Error('spawn ENOENT'));

    await expect(runner.run('HandBrakeCLI', ['--version'])).rejects.toThrow('spawn ENOENT');
  });

  it('should pass the captured command to response functions', async () => {
    const runner = new MockCommandRunner().on('ffprobe', (captured) => ({
      stdout: captured.args.join(','),
    }));

    const result = await runner.run('ffprobe', ['-v', 'error']);

    expect(result.stdout).toBe('-v,error');
    expect(result.exitCode).toBe(0);
  });

  it('should filter calls by binary and reset', async () => {
    const runner = new MockCommandRunner();
    await runner.run('ffprobe', []);
    await runner.run('rsync', []);
    await runner.run('ffprobe', ['x']);

    expect(runner.callsTo('ffprobe')).toHaveLength(2);
    expect(runner.getCommandCount()).toBe(3);

    runner.reset();
    expect(runner.getCommandCount()).toBe(0);
  });
});

describe('ProcessRunner', () => {
  it('should capture output and exit status', async () => {
    const logger = new InMemoryLogger();
    const runner = new ProcessRunner({ logger });

    const result = await runner.run(process.execPath, [
      '-e',
      "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)",
    ]);

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('out');
    expect(result.stderr).toBe('err');
    expect(logger.hasMessage('Command failed (rc=3)')).toBe(true);
  });

  it('should pass extra environment variables', async () => {
    const runner = new ProcessRunner();

    const result = await runner.run(
      process.execPath,
      ['-e', 'process.stdout.write(process.env.WATCHDOG_TEST_VALUE ?? "")'],
      { env: { WATCHDOG_TEST_VALUE: 'placeholder' } }
    );

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe('placeholder');
  });

  it('should reject with SpawnFailedError when the binary is missing', async () => {
    const runner = new ProcessRunner();

    await expect(runner.run('/nonexistent/watchdog-tool', ['--version'])).rejects.toBeInstanceOf(
      SpawnFailedError
    );
  });
});
