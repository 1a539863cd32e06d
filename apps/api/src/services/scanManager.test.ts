import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { WsScanMessage } from '@curbwatch/shared';
import { delay, makeTempVideo } from '../testing/fakes.js';
import type { ScanOptions, ScanResult } from './scanPipeline.js';
import { ScanManager } from './scanManager.js';

interface PendingRun {
  options: ScanOptions;
  resolve: (result: ScanResult) => void;
  reject: (err: Error) => void;
}

function resultFor(options: ScanOptions, overrides: Partial<ScanResult> = {}): ScanResult {
  return {
    reportPath: options.outputPath ?? 'safety_report.json',
    report: {
      video_file: options.videoPath,
      analysis_timestamp: '2024-06-01 14:30:00',
      frame_interval: options.frameInterval ?? 30,
      detected_issues: [],
    },
    video: { frameCount: 100, fps: 10, width: 4, height: 2 },
    framesProcessed: 4,
    issuesDetected: 0,
    analysisErrors: 0,
    stoppedEarly: false,
    cancelled: false,
    ...overrides,
  };
}

async function until(condition: () => boolean): Promise<void> {
  for (let i = 0; i < 200 && !condition(); i++) {
    await delay(5);
  }
  expect(condition()).toBe(true);
}

let outputDir: string;
let cleanup: () => Promise<void>;
let runs: PendingRun[];
let messages: WsScanMessage[];
let manager: ScanManager;

function createManager(maxConcurrent: number, maxRetained?: number): ScanManager {
  let nextId = 0;
  return new ScanManager({
    maxConcurrent,
    maxRetained,
    outputDir,
    broadcast: (message) => messages.push(message),
    runScan: (options) =>
      new Promise<ScanResult>((resolve, reject) => {
        runs.push({ options, resolve, reject });
      }),
    generateId: () => `scan-${++nextId}`,
  });
}

beforeEach(async () => {
  ({ dir: outputDir, cleanup } = await makeTempVideo());
  runs = [];
  messages = [];
  manager = createManager(1);
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await cleanup();
});

describe('ScanManager', () => {
  it('starts scans up to the concurrency limit and queues the rest', async () => {
    expect(manager.enqueue({ videoPath: 'a.mp4' })).toEqual({ scanId: 'scan-1', status: 'running' });
    expect(manager.enqueue({ videoPath: 'b.mp4' })).toEqual({ scanId: 'scan-2', status: 'queued', position: 1 });
    expect(manager.enqueue({ videoPath: 'c.mp4' })).toEqual({ scanId: 'scan-3', status: 'queued', position: 2 });
    expect(manager.getActiveCount()).toBe(1);
    expect(manager.getQueueLength()).toBe(2);

    await until(() => runs.length === 1);
    runs[0]?.resolve(resultFor(runs[0].options));
    await until(() => runs.length === 2);

    expect(manager.get('scan-1')?.status).toBe('complete');
    expect(manager.get('scan-2')?.status).toBe('running');
    expect(manager.getQueueLength()).toBe(1);
  });

  it('runs each scan inside its own output directory with defaults applied', async () => {
    manager.enqueue({ videoPath: 'route.mp4', saveFrames: true });
    await until(() => runs.length === 1);

    const scanDir = path.join(outputDir, 'scan-1');
    expect(runs[0]?.options).toMatchObject({
      videoPath: 'route.mp4',
      outputPath: path.join(scanDir, 'safety_report.json'),
      frameInterval: 30,
      workers: 4,
      saveFrames: true,
      framesDir: path.join(scanDir, 'detected_frames'),
      saveAllFrames: false,
      allFramesDir: path.join(scanDir, 'all_frames'),
    });
  });

  it('broadcasts progress and records the finished scan', async () => {
    manager.enqueue({ videoPath: 'route.mp4', frameInterval: 30 });
    await until(() => runs.length === 1);
    const run = runs[0];
    if (!run) throw new Error('scan did not start');

    run.options.onVideoInfo?.({
      frameCount: 100, fps: 10, width: 4, height: 2, duration: '00:00:09', framesToAnalyze: 4,
    });
    run.options.onProgress?.({ frameNumber: 30, timestamp: '00:00:03', percent: 30, completed: 1, total: 4 });
    run.resolve(resultFor(run.options, { issuesDetected: 2, analysisErrors: 1 }));
    await manager.drain();

    expect(messages).toEqual([
      { type: 'scan:started', scanId: 'scan-1', data: { video: { frameCount: 100, fps: 10, width: 4, height: 2 }, total: 4 } },
      {
        type: 'scan:progress',
        scanId: 'scan-1',
        data: { frameNumber: 30, timestamp: '00:00:03', percent: 30, completed: 1, total: 4 },
      },
      {
        type: 'scan:complete',
        scanId: 'scan-1',
        data: {
          reportPath: path.join(outputDir, 'scan-1', 'safety_report.json'),
          framesProcessed: 4,
          issuesDetected: 2,
          analysisErrors: 1,
          cancelled: false,
        },
      },
    ]);

    const detail = manager.get('scan-1');
    expect(detail).toMatchObject({
      id: 'scan-1',
      videoPath: 'route.mp4',
      status: 'complete',
      frameInterval: 30,
      framesProcessed: 4,
      issuesDetected: 2,
      analysisErrors: 1,
      video: { frameCount: 100, fps: 10, width: 4, height: 2 },
      stoppedEarly: false,
      errorMessage: null,
    });
    expect(detail?.completedAt).not.toBeNull();
    expect(detail?.report?.video_file).toBe('route.mp4');
  });

  it('records a failed scan', async () => {
    manager.enqueue({ videoPath: 'missing.mp4' });
    await until(() => runs.length === 1);
    runs[0]?.reject(new Error('Video file not found: missing.mp4'));
    await manager.drain();

    expect(manager.get('scan-1')).toMatchObject({ status: 'error', errorMessage: 'Video file not found: missing.mp4' });
    expect(messages).toEqual([{ type: 'scan:error', scanId: 'scan-1', data: { error: 'Video file not found: missing.mp4' } }]);
  });

  it('removes a queued scan on cancel', () => {
    manager.enqueue({ videoPath: 'a.mp4' });
    manager.enqueue({ videoPath: 'b.mp4' });

    expect(manager.cancel('scan-2')).toBe('cancelled');

    expect(manager.getQueueLength()).toBe(0);
    expect(manager.get('scan-2')).toMatchObject({ status: 'cancelled', errorMessage: 'Cancelled by user' });
    expect(messages).toEqual([{ type: 'scan:error', scanId: 'scan-2', data: { error: 'Cancelled by user' } }]);
  });

  it('aborts a running scan on cancel', async () => {
    manager.enqueue({ videoPath: 'a.mp4' });
    await until(() => runs.length === 1);
    const run = runs[0];
    if (!run) throw new Error('scan did not start');
    run.options.signal?.addEventListener('abort', () => run.resolve(resultFor(run.options, { cancelled: true })));

    expect(manager.cancel('scan-1')).toBe('cancelling');
    await manager.drain();

    expect(run.options.signal?.aborted).toBe(true);
    expect(manager.get('scan-1')?.status).toBe('cancelled');
    expect(messages.at(-1)).toMatchObject({ type: 'scan:complete', data: { cancelled: true } });
  });

  it('refuses to cancel unknown or finished scans', async () => {
    expect(() => manager.cancel('nope')).toThrow('Scan is not currently queued or running');

    manager.enqueue({ videoPath: 'a.mp4' });
    await until(() => runs.length === 1);
    runs[0]?.resolve(resultFor(runs[0].options));
    await manager.drain();

    expect(() => manager.cancel('scan-1')).toThrow('Scan is not currently queued or running');
  });

  it('lists scans newest first', async () => {
    manager.enqueue({ videoPath: 'a.mp4' });
    await delay(5);
    manager.enqueue({ videoPath: 'b.mp4' });

    expect(manager.list().map((s) => s.videoPath)).toEqual(['b.mp4', 'a.mp4']);
    expect(manager.get('nope')).toBeNull();
  });

  it('forgets the oldest finished scans beyond the retention limit', async () => {
    manager = createManager(1, 2);
    for (const videoPath of ['a.mp4', 'b.mp4', 'c.mp4']) {
      manager.enqueue({ videoPath });
      await until(() => runs.length === 1);
      const run = runs.pop();
      if (!run) throw new Error('scan did not start');
      run.resolve(resultFor(run.options));
      await manager.drain();
    }

    expect(manager.get('scan-1')).toBeNull();
    expect(manager.list().map((s) => s.id).sort()).toEqual(['scan-2', 'scan-3']);
  });

  it('never forgets queued or running scans', async () => {
    manager = createManager(1, 1);
    manager.enqueue({ videoPath: 'a.mp4' });
    manager.enqueue({ videoPath: 'b.mp4' });
    manager.enqueue({ videoPath: 'c.mp4' });
    manager.cancel('scan-2');
    manager.cancel('scan-3');

    expect(manager.get('scan-2')).toBeNull();
    expect(manager.get('scan-3')?.status).toBe('cancelled');
    expect(manager.get('scan-1')?.status).toBe('running');
  });

  it('cancels everything on shutdown', async () => {
    manager = createManager(2);
    manager.enqueue({ videoPath: 'a.mp4' });
    manager.enqueue({ videoPath: 'b.mp4' });
    manager.enqueue({ videoPath: 'c.mp4' });
    await until(() => runs.length === 2);
    for (const run of runs) {
      run.options.signal?.addEventListener('abort', () => run.resolve(resultFor(run.options, { cancelled: true })));
    }

    await manager.shutdown();

    expect(manager.list().map((s) => s.status).sort()).toEqual(['cancelled', 'cancelled', 'cancelled']);
    expect(manager.getActiveCount()).toBe(0);
    expect(manager.getQueueLength()).toBe(0);
  });
});
