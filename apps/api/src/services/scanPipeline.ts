import fs from 'node:fs/promises';
import path from 'node:path';
import type { SafetyReport, ScanProgress, VideoInfo } from '@curbwatch/shared';
import { OutOfRangeError, errorMessage } from '../errors.js';
import type { FrameAnalyzer } from './analyzer.js';
import { DEFAULT_WORKER_COUNT, dispatchFrames, type TimedFrame } from './dispatcher.js';
import { withVideo, type VideoHandle } from './frameSource.js';
import { saveFrameJpeg, snapshotFileName, type FrameWriter } from './frameWriter.js';
import { ReportAggregator, writeReport } from './reportAggregator.js';
import { sampledFrameCount } from './timeMapper.js';
import type { VideoDecoder } from './videoDecoder.js';

export const SCAN_DEFAULTS = {
  outputPath: 'safety_report.json',
  frameInterval: 30,
  framesDir: 'detected_frames',
  allFramesDir: 'all_frames',
  workers: DEFAULT_WORKER_COUNT,
} as const;

export interface ScanOptions {
  videoPath: string;
  outputPath?: string;
  frameInterval?: number;
  workers?: number;
  /** Per-frame analysis deadline in milliseconds */
  timeoutMs?: number;
  saveFrames?: boolean;
  framesDir?: string;
  saveAllFrames?: boolean;
  allFramesDir?: string;
  signal?: AbortSignal;
  onVideoInfo?: (info: VideoOverview) => void;
  onProgress?: (progress: ScanProgress) => void;
}

export interface ScanDeps {
  decoder: VideoDecoder;
  analyzer: FrameAnalyzer;
  writeFrame?: FrameWriter;
  now?: () => Date;
}

export interface VideoOverview extends VideoInfo {
  /** Timestamp of the last frame */
  duration: string;
  framesToAnalyze: number;
}

export interface ScanResult {
  reportPath: string;
  report: SafetyReport;
  video: VideoInfo;
  framesProcessed: number;
  issuesDetected: number;
  analysisErrors: number;
  /** Sampling ended before the last frame because the video could not be decoded further */
  stoppedEarly: boolean;
  cancelled: boolean;
}

async function prepareDir(dir: string, purpose: string): Promise<string | null> {
  try {
    await fs.mkdir(dir, { recursive: true });
    return dir;
  } catch (err) {
    console.warn(`[scan] cannot create ${purpose} directory ${dir}, frames will not be saved: ${errorMessage(err)}`);
    return null;
  }
}

async function* timedFrames(video: VideoHandle, frameInterval: number): AsyncGenerator<TimedFrame> {
  for await (const { frameNumber, frame } of video.sampledFrames(frameInterval)) {
    yield { frameNumber, timestamp: video.timestampOf(frameNumber), frame };
  }
}

/**
 * Sample `videoPath`, analyze each sampled frame, and write the safety report.
 * Per-frame failures are counted, never fatal; a missing or unreadable video
 * and an unwritable report are. A cancelled scan still writes what it has.
 */
export async function runSafetyScan(options: ScanOptions, deps: ScanDeps): Promise<ScanResult> {
  const frameInterval = options.frameInterval ?? SCAN_DEFAULTS.frameInterval;
  if (!Number.isInteger(frameInterval) || frameInterval < 1) {
    throw new OutOfRangeError(`Frame interval must be a positive integer, got ${frameInterval}`);
  }
  const outputPath = options.outputPath ?? SCAN_DEFAULTS.outputPath;
  const writeFrame = deps.writeFrame ?? saveFrameJpeg;

  return withVideo(options.videoPath, { decoder: deps.decoder }, async (video) => {
    const total = sampledFrameCount(video.frameCount, frameInterval);
    const overview: VideoOverview = { ...video.videoInfo, duration: video.durationTimestamp(), framesToAnalyze: total };
    console.log(
      `[scan] ${options.videoPath}: ${video.frameCount} frames, ${video.fps} fps, ${video.width}x${video.height}, ` +
      `duration ${overview.duration}, analyzing ${total} frames every ${frameInterval}`,
    );
    options.onVideoInfo?.(overview);

    const issueFramesDir = options.saveFrames
      ? await prepareDir(options.framesDir ?? SCAN_DEFAULTS.framesDir, 'issue frame')
      : null;
    const allFramesDir = options.saveAllFrames
      ? await prepareDir(options.allFramesDir ?? SCAN_DEFAULTS.allFramesDir, 'all-frames')
      : null;

    const aggregator = new ReportAggregator(options.videoPath, frameInterval, {
      issueFramesDir: issueFramesDir ?? undefined,
      writeFrame,
      now: deps.now,
    });

    let completed = 0;
    const dispatch = await dispatchFrames(timedFrames(video, frameInterval), {
      analyzer: deps.analyzer,
      workerCount: options.workers ?? SCAN_DEFAULTS.workers,
      timeoutMs: options.timeoutMs,
      signal: options.signal,
      saveAllFrame: allFramesDir
        ? (frame, frameNumber, timestamp) =>
            writeFrame(frame, path.join(allFramesDir, snapshotFileName(frameNumber, timestamp)))
        : undefined,
      onResult: async (frameNumber, timestamp, result, frame) => {
        aggregator.record(frameNumber, timestamp, result);
        await aggregator.maybeSaveIssueFrame(frame, frameNumber, timestamp, result);
        completed++;
        options.onProgress?.({
          frameNumber,
          timestamp,
          percent: video.progressFraction(frameNumber),
          completed,
          total,
        });
      },
    });

    const report = aggregator.finalize();
    await writeReport(report, outputPath);

    const stats = aggregator.stats();
    console.log(
      `[scan] ${options.videoPath}: ${stats.framesProcessed} frames processed, ${stats.issuesDetected} issues, ` +
      `${stats.analysisErrors} analysis errors${dispatch.cancelled ? ' (cancelled)' : ''}`,
    );

    return {
      reportPath: outputPath,
      report,
      video: video.videoInfo,
      framesProcessed: stats.framesProcessed,
      issuesDetected: stats.issuesDetected,
      analysisErrors: stats.analysisErrors,
      stoppedEarly: video.stoppedEarly,
      cancelled: dispatch.cancelled,
    };
  });
}
