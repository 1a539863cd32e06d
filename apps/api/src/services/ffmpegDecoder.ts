import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { VideoInfo } from '@curbwatch/shared';
import { errorMessage } from '../errors.js';
import { frameByteLength, type Frame, type VideoDecoder } from './videoDecoder.js';

const execFileAsync = promisify(execFile);

const RGB_CHANNELS = 3;
const PROBE_TIMEOUT_MS = 120_000;
const SINGLE_FRAME_TIMEOUT_MS = 120_000;

const ProbeStreamSchema = z.object({
  width: z.number().int().nonnegative().optional(),
  height: z.number().int().nonnegative().optional(),
  r_frame_rate: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  nb_frames: z.string().optional(),
  nb_read_packets: z.string().optional(),
});

const ProbeOutputSchema = z.object({
  streams: z.array(ProbeStreamSchema),
});

function parseRate(rate: string | undefined): number {
  if (!rate) return 0;
  const [num, den = '1'] = rate.split('/');
  const value = Number(num) / Number(den);
  return Number.isFinite(value) ? value : 0;
}

function parseCount(count: string | undefined): number | null {
  if (!count) return null;
  const value = Number(count);
  return Number.isInteger(value) && value > 0 ? value : null;
}

/**
 * Turn `ffprobe -of json` output into stream metadata. The frame rate is
 * truncated to a whole number. Throws when the stream has no usable size,
 * rate or frame count.
 */
export function parseProbeOutput(stdout: string): VideoInfo {
  const parsed = ProbeOutputSchema.parse(JSON.parse(stdout));
  const stream = parsed.streams[0];
  if (!stream) {
    throw new Error('no video stream found');
  }

  const width = stream.width ?? 0;
  const height = stream.height ?? 0;
  if (width === 0 || height === 0) {
    throw new Error('video stream has no dimensions');
  }

  const rate = parseRate(stream.avg_frame_rate) || parseRate(stream.r_frame_rate);
  const fps = Math.trunc(rate);
  if (fps < 1) {
    throw new Error(`unsupported frame rate ${rate}`);
  }

  const frameCount = parseCount(stream.nb_frames) ?? parseCount(stream.nb_read_packets);
  if (frameCount === null) {
    throw new Error('video stream reports no frames');
  }

  return { frameCount, fps, width, height };
}

export function buildStrideFilter(stride: number): string {
  return stride === 1 ? 'null' : `select=not(mod(n\\,${stride}))`;
}

export function buildSingleFrameFilter(frameNumber: number): string {
  return `select=eq(n\\,${frameNumber})`;
}

interface ExitStatus {
  code: number | null;
  error: Error | null;
}

export class FfmpegDecoder implements VideoDecoder {
  readonly decoderId = 'ffmpeg';
  private ffmpegPath: string;
  private ffprobePath: string;

  constructor(options: { ffmpegPath?: string; ffprobePath?: string } = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
  }

  async probe(videoPath: string): Promise<VideoInfo> {
    const baseArgs = [
      '-v', 'error',
      '-select_streams', 'v:0',
      '-show_entries', 'stream=width,height,r_frame_rate,avg_frame_rate,nb_frames,nb_read_packets',
      '-of', 'json',
    ];

    const { stdout } = await execFileAsync(this.ffprobePath, [...baseArgs, videoPath], {
      timeout: PROBE_TIMEOUT_MS,
    });

    try {
      return parseProbeOutput(stdout);
    } catch (err) {
      // Containers such as mkv/webm carry no frame count; count packets instead
      const { stdout: counted } = await execFileAsync(
        this.ffprobePath,
        [...baseArgs.slice(0, 4), '-count_packets', ...baseArgs.slice(4), videoPath],
        { timeout: PROBE_TIMEOUT_MS },
      );
      const info = parseProbeOutput(counted);
      console.log(`[ffmpeg] ${videoPath}: frame count taken from packet count (${errorMessage(err)})`);
      return info;
    }
  }

  async decodeFrame(videoPath: string, info: VideoInfo, frameNumber: number): Promise<Frame> {
    const size = frameByteLength(info.width, info.height, RGB_CHANNELS);
    const { stdout } = await execFileAsync(
      this.ffmpegPath,
      [
        '-v', 'error',
        '-i', videoPath,
        '-map', '0:v:0',
        '-vf', buildSingleFrameFilter(frameNumber),
        '-vsync', '0',
        '-frames:v', '1',
        '-f', 'rawvideo',
        '-pix_fmt', 'rgb24',
        'pipe:1',
      ],
      { encoding: 'buffer', maxBuffer: size + 1024 * 1024, timeout: SINGLE_FRAME_TIMEOUT_MS },
    );

    if (stdout.length < size) {
      throw new Error(`ffmpeg returned ${stdout.length} of ${size} bytes for frame ${frameNumber}`);
    }

    return { width: info.width, height: info.height, channels: RGB_CHANNELS, data: stdout.subarray(0, size) };
  }

  async *decodeFrames(
    videoPath: string,
    info: VideoInfo,
    stride: number,
    signal: AbortSignal,
  ): AsyncGenerator<Frame> {
    const size = frameByteLength(info.width, info.height, RGB_CHANNELS);
    const child = spawn(
      this.ffmpegPath,
      [
        '-v', 'error',
        '-i', videoPath,
        '-map', '0:v:0',
        '-vf', buildStrideFilter(stride),
        '-vsync', '0',
        '-f', 'rawvideo',
        '-pix_fmt', 'rgb24',
        'pipe:1',
      ],
      { stdio: ['ignore', 'pipe', 'pipe'] },
    );

    const stderr: Buffer[] = [];
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const exited = new Promise<ExitStatus>((resolve) => {
      child.once('error', (error) => resolve({ code: null, error }));
      child.once('close', (code) => resolve({ code, error: null }));
    });

    const onAbort = () => child.kill('SIGKILL');
    signal.addEventListener('abort', onAbort, { once: true });

    let chunks: Buffer[] = [];
    let buffered = 0;

    try {
      for await (const chunk of child.stdout) {
        const piece: Buffer = chunk;
        chunks.push(piece);
        buffered += piece.length;
        if (buffered < size) continue;

        const joined = Buffer.concat(chunks, buffered);
        let offset = 0;
        const ready: Frame[] = [];
        while (buffered - offset >= size) {
          ready.push({
            width: info.width,
            height: info.height,
            channels: RGB_CHANNELS,
            data: joined.subarray(offset, offset + size),
          });
          offset += size;
        }
        const rest = Buffer.from(joined.subarray(offset));
        chunks = rest.length > 0 ? [rest] : [];
        buffered = rest.length;

        for (const frame of ready) {
          yield frame;
        }
      }

      const status = await exited;
      if (signal.aborted) return;
      if (status.error) {
        throw status.error;
      }
      if (status.code !== 0) {
        const detail = Buffer.concat(stderr).toString('utf-8').trim().split('\n').slice(-3).join(' | ');
        throw new Error(`ffmpeg exited with code ${status.code}${detail ? `: ${detail}` : ''}`);
      }
      if (buffered > 0) {
        throw new Error(`ffmpeg left a partial frame of ${buffered} bytes`);
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGKILL');
      }
    }
  }
}
