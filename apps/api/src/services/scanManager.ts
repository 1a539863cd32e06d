import { randomUUID } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import type {
  ScanDetail,
  ScanRequest,
  ScanStartResponse,
  ScanStatus,
  ScanSummary,
  VideoInfo,
  WsScanMessage,
} from '@curbwatch/shared';
import { errorMessage } from '../errors.js';
import { SCAN_DEFAULTS, type ScanOptions, type ScanResult } from './scanPipeline.js';

type BroadcastFn = (message: WsScanMessage) => void;
export type ScanRunner = (options: ScanOptions) => Promise<ScanResult>;

/** What a cancel request did: a queued scan is dropped at once, a running one is asked to stop. */
export type CancelOutcome = 'cancelled' | 'cancelling';

const DEFAULT_MAX_RETAINED = 100;
const FINISHED: ReadonlySet<ScanStatus> = new Set<ScanStatus>(['complete', 'cancelled', 'error']);

interface ScanRecord {
  id: string;
  request: Required<ScanRequest>;
  status: ScanStatus;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  video: VideoInfo | null;
  framesProcessed: number;
  issuesDetected: number;
  analysisErrors: number;
  reportPath: string | null;
  stoppedEarly: boolean;
  errorMessage: string | null;
  report: ScanResult['report'] | null;
}

export class ScanManager {
  private queue: string[] = [];
  private scans = new Map<string, ScanRecord>();
  private active = new Map<string, { controller: AbortController; done: Promise<void> }>();
  private maxConcurrent: number;
  private maxRetained: number;
  private outputDir: string;
  private broadcast: BroadcastFn;
  private runScan: ScanRunner;
  private generateId: () => string;

  constructor(config: {
    maxConcurrent: number;
    /** Finished scans kept for `list`/`get`; the oldest are forgotten first */
    maxRetained?: number;
    outputDir: string;
    broadcast: BroadcastFn;
    runScan: ScanRunner;
    generateId?: () => string;
  }) {
    this.maxConcurrent = config.maxConcurrent;
    this.maxRetained = config.maxRetained ?? DEFAULT_MAX_RETAINED;
    this.outputDir = config.outputDir;
    this.broadcast = config.broadcast;
    this.runScan = config.runScan;
    this.generateId = config.generateId ?? randomUUID;
  }

  enqueue(request: ScanRequest): ScanStartResponse {
    const id = this.generateId();
    this.scans.set(id, {
      id,
      request: {
        videoPath: request.videoPath,
        frameInterval: request.frameInterval ?? SCAN_DEFAULTS.frameInterval,
        workers: request.workers ?? SCAN_DEFAULTS.workers,
        saveFrames: request.saveFrames ?? false,
        saveAllFrames: request.saveAllFrames ?? false,
      },
      status: 'queued',
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
      video: null,
      framesProcessed: 0,
      issuesDetected: 0,
      analysisErrors: 0,
      reportPath: null,
      stoppedEarly: false,
      errorMessage: null,
      report: null,
    });

    this.queue.push(id);
    this.processNext();

    const record = this.scans.get(id);
    if (record?.status === 'running') {
      return { scanId: id, status: 'running' };
    }
    return { scanId: id, status: 'queued', position: this.queue.indexOf(id) + 1 };
  }

  list(): ScanSummary[] {
    return Array.from(this.scans.values())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((record) => this.toSummary(record));
  }

  get(scanId: string): ScanDetail | null {
    const record = this.scans.get(scanId);
    if (!record) return null;
    return {
      ...this.toSummary(record),
      video: record.video,
      reportPath: record.reportPath,
      stoppedEarly: record.stoppedEarly,
      errorMessage: record.errorMessage,
      report: record.report,
    };
  }

  cancel(scanId: string): CancelOutcome {
    // Remove from queue if still pending
    const queueIdx = this.queue.indexOf(scanId);
    if (queueIdx !== -1) {
      this.queue.splice(queueIdx, 1);
      this.update(scanId, { status: 'cancelled', completedAt: new Date(), errorMessage: 'Cancelled by user' });
      this.broadcast({ type: 'scan:error', scanId, data: { error: 'Cancelled by user' } });
      this.prune();
      return 'cancelled';
    }

    // A running scan stops pulling frames and writes a partial report
    const job = this.active.get(scanId);
    if (job) {
      job.controller.abort();
      return 'cancelling';
    }

    throw new Error('Scan is not currently queued or running');
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  getActiveCount(): number {
    return this.active.size;
  }

  /** Resolves once nothing is queued or running. */
  async drain(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all(Array.from(this.active.values(), (job) => job.done));
    }
  }

  /** Cancel everything and wait for running scans to write their reports. */
  async shutdown(): Promise<void> {
    for (const scanId of [...this.queue]) {
      this.cancel(scanId);
    }
    for (const job of this.active.values()) {
      job.controller.abort();
    }
    await this.drain();
  }

  private processNext(): void {
    while (this.active.size < this.maxConcurrent && this.queue.length > 0) {
      const scanId = this.queue.shift();
      if (!scanId) break;
      const job = { controller: new AbortController(), done: Promise.resolve() };
      this.active.set(scanId, job);
      this.update(scanId, { status: 'running', startedAt: new Date() });
      job.done = this.processScan(scanId, job.controller.signal).catch((err: unknown) => {
        console.error(`[scan-manager] unexpected error processing ${scanId}:`, err);
      });
    }
  }

  private async processScan(scanId: string, signal: AbortSignal): Promise<void> {
    const scanDir = path.join(this.outputDir, scanId);

    try {
      const record = this.scans.get(scanId);
      if (!record) {
        throw new Error(`Unknown scan ${scanId}`);
      }
      const { request } = record;
      await fs.mkdir(scanDir, { recursive: true });

      const result = await this.runScan({
        videoPath: request.videoPath,
        outputPath: path.join(scanDir, SCAN_DEFAULTS.outputPath),
        frameInterval: request.frameInterval,
        workers: request.workers,
        saveFrames: request.saveFrames,
        framesDir: path.join(scanDir, SCAN_DEFAULTS.framesDir),
        saveAllFrames: request.saveAllFrames,
        allFramesDir: path.join(scanDir, SCAN_DEFAULTS.allFramesDir),
        signal,
        onVideoInfo: (info) => {
          const video: VideoInfo = { frameCount: info.frameCount, fps: info.fps, width: info.width, height: info.height };
          this.update(scanId, { video });
          this.broadcast({ type: 'scan:started', scanId, data: { video, total: info.framesToAnalyze } });
        },
        onProgress: (progress) => {
          this.update(scanId, { framesProcessed: progress.completed });
          this.broadcast({ type: 'scan:progress', scanId, data: progress });
        },
      });

      this.update(scanId, {
        status: result.cancelled ? 'cancelled' : 'complete',
        completedAt: new Date(),
        framesProcessed: result.framesProcessed,
        issuesDetected: result.issuesDetected,
        analysisErrors: result.analysisErrors,
        reportPath: result.reportPath,
        stoppedEarly: result.stoppedEarly,
        report: result.report,
      });
      console.log(
        `[scan-manager] ${scanId}: ${result.cancelled ? 'cancelled' : 'complete'}, ` +
        `${result.issuesDetected} issues in ${result.framesProcessed} frames`,
      );

      this.broadcast({
        type: 'scan:complete',
        scanId,
        data: {
          reportPath: result.reportPath,
          framesProcessed: result.framesProcessed,
          issuesDetected: result.issuesDetected,
          analysisErrors: result.analysisErrors,
          cancelled: result.cancelled,
        },
      });
    } catch (err) {
      const message = errorMessage(err);
      console.error(`[scan-manager] scan ${scanId} failed:`, message);
      this.update(scanId, { status: 'error', completedAt: new Date(), errorMessage: message });
      this.broadcast({ type: 'scan:error', scanId, data: { error: message } });
    } finally {
      this.active.delete(scanId);
      this.prune();
      this.processNext();
    }
  }

  /** Forget the oldest finished scans beyond the retention limit. Reports stay on disk. */
  private prune(): void {
    const finished = Array.from(this.scans.values()).filter((record) => FINISHED.has(record.status));
    const excess = finished.length - this.maxRetained;
    if (excess <= 0) return;

    finished
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, excess)
      .forEach((record) => this.scans.delete(record.id));
  }

  private update(scanId: string, patch: Partial<Omit<ScanRecord, 'id' | 'request'>>): void {
    const record = this.scans.get(scanId);
    if (record) {
      Object.assign(record, patch);
    }
  }

  private toSummary(record: ScanRecord): ScanSummary {
    return {
      id: record.id,
      videoPath: record.request.videoPath,
      status: record.status,
      frameInterval: record.request.frameInterval,
      createdAt: record.createdAt.toISOString(),
      startedAt: record.startedAt?.toISOString() ?? null,
      completedAt: record.completedAt?.toISOString() ?? null,
      framesProcessed: record.framesProcessed,
      issuesDetected: record.issuesDetected,
      analysisErrors: record.analysisErrors,
    };
  }
}
