import fs from 'node:fs/promises';
import path from 'node:path';
import type { AnalysisResult, ReportEntry, ReportStats, SafetyReport } from '@curbwatch/shared';
import { IOFailureError, errorMessage } from '../errors.js';
import { saveFrameJpeg, snapshotFileName, type FrameWriter } from './frameWriter.js';
import type { Frame } from './videoDecoder.js';

export interface AggregatorOptions {
  /** Where frames with detected issues are written. Nothing is written when unset. */
  issueFramesDir?: string;
  writeFrame?: FrameWriter;
  now?: () => Date;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS`. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ` +
    `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`
  );
}

/**
 * Accumulates analysis results into a SafetyReport. Only the orchestrating
 * task calls into it; workers never touch it directly.
 */
export class ReportAggregator {
  private videoFile: string;
  private frameInterval: number;
  private issueFramesDir: string | null;
  private writeFrame: FrameWriter;
  private now: () => Date;
  private entries: ReportEntry[] = [];
  private counts: ReportStats = { framesProcessed: 0, framesWithIssues: 0, issuesDetected: 0, analysisErrors: 0 };

  constructor(videoFile: string, frameInterval: number, options: AggregatorOptions = {}) {
    this.videoFile = videoFile;
    this.frameInterval = frameInterval;
    this.issueFramesDir = options.issueFramesDir ?? null;
    this.writeFrame = options.writeFrame ?? saveFrameJpeg;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Add one entry per issue. An error result adds nothing but is counted.
   * Issues that arrive alongside an error are still recorded.
   */
  record(frameNumber: number, timestamp: string, result: AnalysisResult): void {
    this.counts.framesProcessed++;
    if (result.error !== null) {
      this.counts.analysisErrors++;
    }
    if (result.safety_issues.length === 0) return;

    this.counts.framesWithIssues++;
    for (const issue of result.safety_issues) {
      this.entries.push({
        frame_number: frameNumber,
        timestamp,
        issue_details: {
          issue_type: issue.issue_type,
          location: issue.location,
          description: issue.description,
        },
      });
      this.counts.issuesDetected++;
    }
  }

  /**
   * Write the frame to the issue-frame directory when one is configured and
   * the result carries issues. Returns the written path, or null. Write
   * failures are logged and do not propagate.
   */
  async maybeSaveIssueFrame(
    frame: Frame,
    frameNumber: number,
    timestamp: string,
    result: AnalysisResult,
  ): Promise<string | null> {
    if (!this.issueFramesDir || result.safety_issues.length === 0) return null;

    const outputPath = path.join(this.issueFramesDir, snapshotFileName(frameNumber, timestamp));
    try {
      await this.writeFrame(frame, outputPath);
      return outputPath;
    } catch (err) {
      console.warn(`[report] could not save frame ${frameNumber} to ${outputPath}: ${errorMessage(err)}`);
      return null;
    }
  }

  stats(): ReportStats {
    return { ...this.counts };
  }

  /** Snapshot of the report with issues in ascending frame order. */
  finalize(): SafetyReport {
    // Array.prototype.sort is stable, so a frame's issues keep the model's order
    const detected = [...this.entries].sort((a, b) => a.frame_number - b.frame_number);
    return {
      video_file: this.videoFile,
      analysis_timestamp: formatLocalTimestamp(this.now()),
      frame_interval: this.frameInterval,
      detected_issues: detected,
    };
  }
}

/**
 * Write the report as indented JSON. The file is written beside the target
 * and renamed into place, so readers never observe a partial report.
 */
export async function writeReport(report: SafetyReport, outputPath: string): Promise<void> {
  const tmpPath = path.join(
    path.dirname(outputPath),
    `.${path.basename(outputPath)}.${process.pid}.${Date.now()}.tmp`,
  );

  try {
    await fs.writeFile(tmpPath, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
    await fs.rename(tmpPath, outputPath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
      console.warn(`[report] could not remove ${tmpPath}: ${errorMessage(cleanupErr)}`);
    });
    throw new IOFailureError(outputPath, err);
  }
}
