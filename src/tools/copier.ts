/**
 * Copier between durable storage and the local staging directory.
 */

import type { CommandRunner, CommandResult } from '../types/executor.js';

/**
 * Copies a file. A non-zero exit is a failure and the destination's state
 * afterwards must not be trusted.
 */
export interface RemoteCopier {
  copy(source: string, destination: string): Promise<CommandResult>;
}

export class RsyncCopier implements RemoteCopier {
  constructor(
    private readonly runner: CommandRunner,
    private readonly rsyncPath: string = 'rsync'
  ) {}

  copy(source: string, destination: string): Promise<CommandResult> {
    return this.runner.run(this.rsyncPath, ['-avh', '--progress', source, destination]);
  }
}
