/**
 * Metadata prober backed by ffprobe.
 */

import { z } from 'zod';
import type { CommandRunner } from '../types/executor.js';
import { succeeded } from '../types/executor.js';
import type { MediaInfo, StreamInfo, StreamType } from '../types/media-info.js';
import { ProbeFailureError, err, ok, toError } from '../errors/index.js';
import type { Result } from '../errors/index.js';

/**
 * Reports container size, duration and streams of a media file
 */
export interface MetadataProber {
  /** Full probe; non-zero exit or unparseable output is a ProbeFailure */
  probe(filePath: string): Promise<Result<MediaInfo, ProbeFailureError>>;

  /** Cheap decode health check; false means the file is considered corrupt */
  healthCheck(filePath: string): Promise<boolean>;
}

const numeric = z.union([z.string(), z.number()]).optional();

/**
 * Subset of `ffprobe -print_format json -show_format -show_streams`
 */
export const ffprobeOutputSchema = z.object({
  format: z
    .object({
      size: numeric,
      duration: numeric,
    })
    .passthrough()
    .default({}),
  streams: z
    .array(
      z
        .object({
          index: z.number().int().optional(),
          codec_type: z.string().optional(),
          codec_name: z.string().optional(),
        })
        .passthrough()
    )
    .default([]),
});

export type FfprobeOutput = z.infer<typeof ffprobeOutputSchema>;

function toStreamType(codecType: string | undefined): StreamType {
  switch (codecType) {
    case 'video':
    case 'audio':
    case 'subtitle':
      return codecType;
    default:
      return 'other';
  }
}

/**
 * Parse an integer byte count; missing or malformed values count as 0
 */
function parseSize(value: string | number | undefined): number {
  const parsed = typeof value === 'number' ? Math.trunc(value) : parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Parse a duration in seconds; missing or malformed values count as 0
 */
function parseDuration(value: string | number | undefined): number {
  const parsed = typeof value === 'number' ? value : parseFloat(value ?? '');
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Turn raw ffprobe stdout into MediaInfo
 */
export function parseProbeOutput(
  filePath: string,
  stdout: string
): Result<MediaInfo, ProbeFailureError> {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    return err(new ProbeFailureError(filePath, 'output is not valid JSON', toError(error)));
  }

  const parsed = ffprobeOutputSchema.safeParse(json);
  if (!parsed.success) {
    return err(new ProbeFailureError(filePath, parsed.error.errors[0]?.message ?? 'invalid output'));
  }

  const { format, streams } = parsed.data;
  return ok({
    path: filePath,
    size: parseSize(format.size),
    duration: parseDuration(format.duration),
    streams: streams.map(
      (stream, position): StreamInfo => ({
        index: stream.index ?? position,
        type: toStreamType(stream.codec_type),
        codec: stream.codec_name,
      })
    ),
  });
}

/**
 * ffprobe-backed prober
 */
export class FfprobeProber implements MetadataProber {
  constructor(
    private readonly runner: CommandRunner,
    private readonly ffprobePath: string = 'ffprobe'
  ) {}

  async probe(filePath: string): Promise<Result<MediaInfo, ProbeFailureError>> {
    const args = [
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    let stdout: string;
    try {
      const result = await this.runner.run(this.ffprobePath, args);
      if (result.exitCode !== 0) {
        return err(new ProbeFailureError(filePath, `ffprobe exited with code ${result.exitCode}`));
      }
      stdout = result.stdout;
    } catch (error) {
      return err(new ProbeFailureError(filePath, 'ffprobe could not be run', toError(error)));
    }

    return parseProbeOutput(filePath, stdout);
  }

  async healthCheck(filePath: string): Promise<boolean> {
    try {
      const result = await this.runner.run(this.ffprobePath, ['-v', 'error', '-hide_banner', filePath]);
      return succeeded(result);
    } catch {
      return false;
    }
  }
}
