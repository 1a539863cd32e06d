import fs from 'node:fs/promises';
import type { VideoInfo } from '@curbwatch/shared';
import {
  OutOfRangeError,
  SourceNotFoundError,
  SourceUnreadableError,
  errorMessage,
} from '../errors.js';
import { frameToPercent, frameToTimestamp } from './timeMapper.js';
import type { Frame, VideoDecoder } from './videoDecoder.js';

export interface SampledFrame {
  frameNumber: number;
  frame: Frame;
}

/**
 * An open video. The read cursor is exclusive to the handle: only one
 * sampled sequence may run at a time and nothing else should decode from
 * the handle while it does.
 */
export class VideoHandle {
  readonly path: string;
  readonly frameCount: number;
  readonly fps: number;
  readonly width: number;
  readonly height: number;

  private decoder: VideoDecoder;
  private info: VideoInfo;
  private cursor = 0;
  private closed = false;
  private iterating = false;
  private truncated = false;
  private abortController = new AbortController();

  constructor(path: string, info: VideoInfo, decoder: VideoDecoder) {
    this.path = path;
    this.info = info;
    this.decoder = decoder;
    this.frameCount = info.frameCount;
    this.fps = info.fps;
    this.width = info.width;
    this.height = info.height;
  }

  get position(): number {
    return this.cursor;
  }

  /** True when the last sampled sequence ended before the final frame because decoding failed. */
  get stoppedEarly(): boolean {
    return this.truncated;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get videoInfo(): VideoInfo {
    return { ...this.info };
  }

  async frameAt(frameNumber: number): Promise<Frame> {
    this.assertOpen();
    this.assertInRange(frameNumber);
    if (this.iterating) {
      throw new Error('Cannot seek while a sampled sequence is being read');
    }

    const frame = await this.decoder.decodeFrame(this.path, this.info, frameNumber);
    this.cursor = frameNumber + 1;
    return frame;
  }

  /**
   * Frames 0, stride, 2*stride, ... below `frameCount`. Single pass: calling
   * this again rewinds to frame 0. Unreadable trailing data ends the sequence
   * and sets `stoppedEarly` instead of throwing; a stream that yields no frame
   * at all is a SourceUnreadableError.
   */
  async *sampledFrames(stride: number): AsyncGenerator<SampledFrame> {
    if (!Number.isInteger(stride) || stride < 1) {
      throw new OutOfRangeError(`Frame interval must be a positive integer, got ${stride}`);
    }
    this.assertOpen();
    if (this.iterating) {
      throw new Error('A sampled sequence is already being read from this video');
    }

    this.iterating = true;
    this.truncated = false;
    this.cursor = 0;
    let frameNumber = 0;

    try {
      try {
        const frames = this.decoder.decodeFrames(this.path, this.info, stride, this.abortController.signal);
        for await (const frame of frames) {
          if (frameNumber >= this.frameCount) break;
          this.cursor = frameNumber + 1;
          yield { frameNumber, frame };
          frameNumber += stride;
        }
      } catch (err) {
        if (this.closed) return;
        if (frameNumber === 0) {
          throw new SourceUnreadableError(this.path, `no frame could be decoded: ${errorMessage(err)}`, err);
        }
        this.truncated = true;
        console.warn(
          `[frame-source] ${this.path}: decoding stopped at frame ${frameNumber} of ${this.frameCount}: ${errorMessage(err)}`,
        );
        return;
      }

      if (this.closed) return;
      if (frameNumber === 0) {
        throw new SourceUnreadableError(this.path, 'decoder produced no frames');
      }
      if (frameNumber < this.frameCount) {
        this.truncated = true;
        console.warn(
          `[frame-source] ${this.path}: stream ended at frame ${frameNumber}, container reports ${this.frameCount} frames`,
        );
        return;
      }
      this.cursor = this.frameCount;
    } finally {
      this.iterating = false;
    }
  }

  timestampOf(frameNumber: number): string {
    this.assertInRange(frameNumber);
    return frameToTimestamp(frameNumber, this.fps);
  }

  progressFraction(frameNumber: number): number {
    this.assertInRange(frameNumber);
    return frameToPercent(frameNumber, this.frameCount);
  }

  /** Timestamp of the last frame. */
  durationTimestamp(): string {
    return this.timestampOf(this.frameCount - 1);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.abortController.abort();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Video handle for ${this.path} is closed`);
    }
  }

  private assertInRange(frameNumber: number): void {
    if (!Number.isInteger(frameNumber) || frameNumber < 0 || frameNumber >= this.frameCount) {
      throw new OutOfRangeError(`Frame number ${frameNumber} is out of bounds (0-${this.frameCount - 1})`);
    }
  }
}

export async function openVideo(
  videoPath: string,
  options: { decoder: VideoDecoder },
): Promise<VideoHandle> {
  const stat = await fs.stat(videoPath).catch(() => null);
  if (!stat || !stat.isFile()) {
    throw new SourceNotFoundError(videoPath);
  }

  let info: VideoInfo;
  try {
    info = await options.decoder.probe(videoPath);
  } catch (err) {
    throw new SourceUnreadableError(videoPath, errorMessage(err), err);
  }

  if (info.frameCount < 1 || info.fps < 1 || info.width < 1 || info.height < 1) {
    throw new SourceUnreadableError(videoPath, 'stream has no decodable frames');
  }

  return new VideoHandle(videoPath, info, options.decoder);
}

/** Open a video, run `fn`, and close the handle however `fn` exits. */
export async function withVideo<T>(
  videoPath: string,
  options: { decoder: VideoDecoder },
  fn: (video: VideoHandle) => Promise<T>,
): Promise<T> {
  const video = await openVideo(videoPath, options);
  try {
    return await fn(video);
  } finally {
    video.close();
  }
}
