import sharp from 'sharp';
import type { Frame } from './videoDecoder.js';
import { timestampToFilenamePart } from './timeMapper.js';

export type FrameWriter = (frame: Frame, outputPath: string) => Promise<void>;

type SharpChannels = 1 | 2 | 3 | 4;

function toSharpChannels(channels: number): SharpChannels {
  if (channels === 1 || channels === 2 || channels === 3 || channels === 4) {
    return channels;
  }
  throw new Error(`Unsupported channel count: ${channels}`);
}

function rawImage(frame: Frame): sharp.Sharp {
  return sharp(frame.data, {
    raw: { width: frame.width, height: frame.height, channels: toSharpChannels(frame.channels) },
  });
}

export async function encodeJpeg(frame: Frame, quality = 85): Promise<Buffer> {
  return rawImage(frame).jpeg({ quality }).toBuffer();
}

export const saveFrameJpeg: FrameWriter = async (frame, outputPath) => {
  await rawImage(frame).jpeg({ quality: 90 }).toFile(outputPath);
};

/** `frame_000030_00_00_03.jpg`: unique per frame number. */
export function snapshotFileName(frameNumber: number, timestamp: string): string {
  return `frame_${String(frameNumber).padStart(6, '0')}_${timestampToFilenamePart(timestamp)}.jpg`;
}
