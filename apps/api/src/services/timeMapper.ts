import { OutOfRangeError } from '../errors.js';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function frameToTimestamp(frameNumber: number, fps: number): string {
  if (!Number.isInteger(frameNumber) || frameNumber < 0) {
    throw new OutOfRangeError(`Frame number ${frameNumber} is out of bounds`);
  }
  if (!(fps > 0)) {
    throw new OutOfRangeError(`Frame rate must be positive, got ${fps}`);
  }

  // Truncate, never round: frame 29 at 10fps is still 00:00:02
  const totalSeconds = Math.floor(frameNumber / fps);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

export function frameToPercent(frameNumber: number, totalFrames: number): number {
  if (!(totalFrames > 0)) {
    throw new OutOfRangeError(`Total frame count must be positive, got ${totalFrames}`);
  }
  if (frameNumber < 0 || frameNumber > totalFrames) {
    throw new OutOfRangeError(`Frame number ${frameNumber} is out of bounds`);
  }
  return (100 * frameNumber) / totalFrames;
}

/** `00:01:05` -> `00_01_05`; colons are not valid in every filesystem. */
export function timestampToFilenamePart(timestamp: string): string {
  return timestamp.replaceAll(':', '_');
}

export function sampledFrameCount(frameCount: number, stride: number): number {
  if (!Number.isInteger(stride) || stride < 1) {
    throw new OutOfRangeError(`Frame interval must be a positive integer, got ${stride}`);
  }
  return Math.ceil(Math.max(0, frameCount) / stride);
}
