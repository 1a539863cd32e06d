import type { VideoInfo } from '@curbwatch/shared';

/**
 * One decoded picture: packed 8-bit pixels, row-major, `channels` bytes per pixel.
 * Frames are never mutated once decoded, so they can be shared across workers.
 */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  readonly data: Buffer;
}

export interface VideoDecoder {
  /** Decoder identifier for logging */
  readonly decoderId: string;

  /** Read stream metadata. Rejects when the container or codec cannot be read. */
  probe(videoPath: string): Promise<VideoInfo>;

  /** Decode frame `frameNumber`. Rejects when decoding fails. */
  decodeFrame(videoPath: string, info: VideoInfo, frameNumber: number): Promise<Frame>;

  /**
   * Decode frames 0, stride, 2*stride, ... in order. Iteration throws when
   * the underlying data stops being decodable part-way through. Aborting
   * `signal` ends the sequence and releases the decoder.
   */
  decodeFrames(videoPath: string, info: VideoInfo, stride: number, signal: AbortSignal): AsyncIterable<Frame>;
}

export function frameByteLength(width: number, height: number, channels: number): number {
  return width * height * channels;
}
