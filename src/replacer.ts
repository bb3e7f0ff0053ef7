/**
 * Replacer: publishes a verified candidate at the original's path.
 *
 * The candidate is first copied next to the original as `<name>.tmp`, so
 * every later step is a rename inside one directory.
 *
 * Two-step strategy:
 *   pending      -> copy candidate to `<name>.tmp`
 *   temp_written -> rename original to `<name>.old`
 *   swapped      -> rename `<name>.tmp` to original (publishes)
 *   committed    -> delete `<name>.old` (failure is only a warning)
 * Between the two renames the original path does not exist; a reader of
 * that exact path in the window observes absence.
 *
 * Rename-over strategy: `<name>.tmp` is renamed straight over the original,
 * which replaces the target atomically on POSIX filesystems. No `.old` is
 * created and there is no window.
 */

import * as path from 'path';
import type { ExecutionContext } from './context.js';
import type { RemoteCopier } from './tools/index.js';
import type { ReplaceStrategy } from './config.js';
import type { ReplacePaths, ReplaceResult, ReplaceState } from './types/pipeline.js';
import type { FileOperations } from './file-ops.js';
import { nodeFileOperations, removeIfExists } from './file-ops.js';
import { ReplaceFailureError, toError } from './errors/index.js';
import { succeeded } from './types/executor.js';

export function replacePaths(sourcePath: string): ReplacePaths {
  const dir = path.dirname(sourcePath);
  const name = path.basename(sourcePath);
  return {
    original: sourcePath,
    temp: path.join(dir, `${name}.tmp`),
    backup: path.join(dir, `${name}.old`),
  };
}

/**
 * Resolve `auto` for the platform the watchdog runs on
 */
export function resolveStrategy(
  strategy: ReplaceStrategy,
  platform: NodeJS.Platform = process.platform
): 'rename-over' | 'two-step' {
  if (strategy !== 'auto') return strategy;
  return platform === 'win32' ? 'two-step' : 'rename-over';
}

export class Replacer {
  private readonly strategy: 'rename-over' | 'two-step';

  constructor(
    private readonly copier: RemoteCopier,
    strategy: ReplaceStrategy = 'auto',
    private readonly files: FileOperations = nodeFileOperations
  ) {
    this.strategy = resolveStrategy(strategy);
  }

  async replace(
    sourcePath: string,
    candidatePath: string,
    ctx: ExecutionContext
  ): Promise<ReplaceResult> {
    const paths = replacePaths(sourcePath);
    const transition = (state: ReplaceState): void => {
      ctx.events.emit({ type: 'replace_state', path: sourcePath, state });
    };
    transition('pending');

    const copied = await this.copier.copy(candidatePath, paths.temp);
    if (!succeeded(copied)) {
      ctx.logger.error('rsync to temp failed', { temp: paths.temp, exitCode: copied.exitCode });
      await this.discardTemp(paths, ctx);
      return this.abort(paths, 'copy to temp', false, transition, ctx);
    }
    transition('temp_written');

    if (this.strategy === 'rename-over') {
      return this.renameOver(paths, transition, ctx);
    }
    return this.twoStep(paths, transition, ctx);
  }

  private async renameOver(
    paths: ReplacePaths,
    transition: (state: ReplaceState) => void,
    ctx: ExecutionContext
  ): Promise<ReplaceResult> {
    try {
      await this.files.rename(paths.temp, paths.original);
    } catch (error) {
      await this.discardTemp(paths, ctx);
      return this.abort(paths, 'rename temp over original', false, transition, ctx, toError(error));
    }
    transition('committed');
    return { committed: true, state: 'committed', paths };
  }

  private async twoStep(
    paths: ReplacePaths,
    transition: (state: ReplaceState) => void,
    ctx: ExecutionContext
  ): Promise<ReplaceResult> {
    try {
      await this.files.rename(paths.original, paths.backup);
    } catch (error) {
      // Original is still in place
      await this.discardTemp(paths, ctx);
      return this.abort(paths, 'rename original to backup', false, transition, ctx, toError(error));
    }
    transition('swapped');

    try {
      await this.files.rename(paths.temp, paths.original);
    } catch (error) {
      return this.rollback(paths, transition, ctx, toError(error));
    }
    transition('committed');

    try {
      await this.files.remove(paths.backup);
    } catch (error) {
      ctx.logger.warn(`Could not delete backup ${paths.backup}; original is already published`, {
        error: toError(error).message,
      });
    }
    return { committed: true, state: 'committed', paths };
  }

  /**
   * Publishing failed after the original was moved to `.old`. Restore the
   * backup; failing that, publish the verified `.tmp` so the path is not
   * left empty; failing that, flag the file for operator attention.
   */
  private async rollback(
    paths: ReplacePaths,
    transition: (state: ReplaceState) => void,
    ctx: ExecutionContext,
    cause: Error
  ): Promise<ReplaceResult> {
    ctx.logger.error(`Safe replace failed: ${cause.message}`, { original: paths.original });

    if (await this.files.exists(paths.original)) {
      // Content at the path is unknown; the backup stays for the operator
      ctx.logger.warn(
        `Publishing reported failure but ${paths.original} exists; backup left at ${paths.backup}`
      );
      await this.discardTemp(paths, ctx);
      return this.abort(paths, 'rename temp to original', false, transition, ctx, cause);
    }

    if (await this.files.exists(paths.backup)) {
      try {
        await this.files.rename(paths.backup, paths.original);
        await this.discardTemp(paths, ctx);
        ctx.logger.warn(`Rolled back ${paths.original} to its original content`);
        return this.abort(paths, 'rename temp to original', false, transition, ctx, cause, 'rolled_back');
      } catch (error) {
        ctx.logger.error(`Could not restore backup ${paths.backup}`, {
          error: toError(error).message,
        });
      }
    }

    if (await this.files.exists(paths.temp)) {
      try {
        await this.files.rename(paths.temp, paths.original);
        ctx.logger.warn(`Published candidate for ${paths.original} during rollback`, {
          backup: paths.backup,
        });
        return this.abort(paths, 'rename temp to original', false, transition, ctx, cause);
      } catch (error) {
        ctx.logger.error(`Could not publish ${paths.temp} during rollback`, {
          error: toError(error).message,
        });
      }
    }

    ctx.logger.error(`Original path is missing and could not be restored: ${paths.original}`, {
      backup: paths.backup,
      temp: paths.temp,
      needsAttention: true,
    });
    return this.abort(paths, 'rename temp to original', true, transition, ctx, cause);
  }

  private async discardTemp(paths: ReplacePaths, ctx: ExecutionContext): Promise<void> {
    const failure = await removeIfExists(this.files, paths.temp);
    if (failure) {
      ctx.logger.warn(`Could not remove ${paths.temp}`, { error: failure.message });
    }
  }

  private abort(
    paths: ReplacePaths,
    step: string,
    needsAttention: boolean,
    transition: (state: ReplaceState) => void,
    ctx: ExecutionContext,
    cause?: Error,
    state: 'rolled_back' | 'failed' = 'failed'
  ): ReplaceResult {
    const error = new ReplaceFailureError(paths.original, step, needsAttention, cause);
    ctx.logger.error(error.message, { ...error.context, critical: true });
    transition(state);
    return { committed: false, state, paths, error };
  }
}
