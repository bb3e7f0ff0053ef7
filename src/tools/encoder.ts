/**
 * Encoder backed by HandBrakeCLI and an exported preset file.
 */

import type { CommandRunner, CommandResult } from '../types/executor.js';

export interface EncodeRequest {
  presetFile: string;
  presetName: string;
  inputPath: string;
  outputPath: string;
}

/**
 * Runs one encode. Exit status zero plus the output file existing is the
 * only success signal; the caller checks the latter.
 */
export interface Encoder {
  encode(request: EncodeRequest): Promise<CommandResult>;
}

export class HandBrakeEncoder implements Encoder {
  constructor(
    private readonly runner: CommandRunner,
    private readonly handbrakePath: string = 'HandBrakeCLI'
  ) {}

  encode(request: EncodeRequest): Promise<CommandResult> {
    return this.runner.run(this.handbrakePath, [
      '--preset-import-file', request.presetFile,
      '-i', request.inputPath,
      '-o', request.outputPath,
      '--preset', request.presetName,
    ]);
  }
}
