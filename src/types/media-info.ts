/**
 * Media information types from the metadata prober.
 *
 * Only the attributes the watchdog decides on are kept: container size and
 * duration, and the type and codec of each stream.
 */

/**
 * Stream type
 */
export type StreamType = 'video' | 'audio' | 'subtitle' | 'other';

/**
 * One stream of a media file
 */
export interface StreamInfo {
  /** Stream index in the file */
  index: number;
  /** Type of stream */
  type: StreamType;
  /** Codec name (e.g. 'h264', 'av1'); absent when the prober reports none */
  codec?: string;
}

/**
 * Media file information, recomputed on every probe
 */
export interface MediaInfo {
  /** Absolute path that was probed */
  path: string;
  /** Container size in bytes */
  size: number;
  /** Container duration in seconds */
  duration: number;
  /** Streams in file order */
  streams: StreamInfo[];
}

/**
 * Per-type stream counts
 */
export interface StreamCounts {
  video: number;
  audio: number;
  subtitle: number;
}

/**
 * Codec of the first video stream, if any
 */
export function findVideoCodec(info: MediaInfo): string | undefined {
  return info.streams.find((stream) => stream.type === 'video')?.codec;
}

/**
 * Count streams by type; streams of type 'other' are not counted
 */
export function countStreams(info: MediaInfo): StreamCounts {
  const counts: StreamCounts = { video: 0, audio: 0, subtitle: 0 };
  for (const stream of info.streams) {
    if (stream.type !== 'other') {
      counts[stream.type] += 1;
    }
  }
  return counts;
}
