import type { AnalysisResult } from '@curbwatch/shared';
import { AnalysisTimeoutError, OutOfRangeError, ScanCancelledError, errorMessage } from '../errors.js';
import { failedResult, normalizeResult, type FrameAnalyzer } from './analyzer.js';
import type { Frame } from './videoDecoder.js';

export const DEFAULT_WORKER_COUNT = 4;

/** A sampled frame with the metadata captured when it was pulled from the source. */
export interface TimedFrame {
  frameNumber: number;
  timestamp: string;
  frame: Frame;
}

export type ResultHandler = (
  frameNumber: number,
  timestamp: string,
  result: AnalysisResult,
  frame: Frame,
) => void | Promise<void>;

export interface DispatchOptions {
  analyzer: FrameAnalyzer;
  onResult: ResultHandler;
  workerCount?: number;
  /** Per-frame analysis deadline. No deadline when omitted. */
  timeoutMs?: number;
  /** Stops new frames from being pulled; in-flight analyses are aborted. */
  signal?: AbortSignal;
  /** Runs for every frame before it is analyzed. Failures are logged and ignored. */
  saveAllFrame?: (frame: Frame, frameNumber: number, timestamp: string) => Promise<unknown>;
}

export interface DispatchSummary {
  submitted: number;
  completed: number;
  failed: number;
  cancelled: boolean;
}

/**
 * Serializes pulls so the underlying source (and the video cursor behind it)
 * is only ever touched by one worker at a time.
 */
class FrameFeed {
  private iterator: AsyncIterator<TimedFrame> | Iterator<TimedFrame>;
  private exhausted = false;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(frames: AsyncIterable<TimedFrame> | Iterable<TimedFrame>) {
    this.iterator = Symbol.asyncIterator in frames
      ? frames[Symbol.asyncIterator]()
      : frames[Symbol.iterator]();
  }

  next(): Promise<TimedFrame | null> {
    const pulled = this.tail.then(() => this.read());
    this.tail = pulled.then(
      () => undefined,
      () => undefined,
    );
    return pulled;
  }

  async close(): Promise<void> {
    await this.tail;
    if (this.exhausted) return;
    this.exhausted = true;
    await this.iterator.return?.();
  }

  private async read(): Promise<TimedFrame | null> {
    if (this.exhausted) return null;
    const item = await this.iterator.next();
    if (item.done) {
      this.exhausted = true;
      return null;
    }
    return item.value;
  }
}

interface DeadlineRun<T> {
  /** Settles with the task's outcome, or rejects when the deadline passes or the parent aborts. */
  result: Promise<T>;
  /** Resolves once the task itself has finished, however `result` ended. */
  settled: Promise<void>;
}

interface AnalyzedFrame {
  result: AnalysisResult;
  settled: Promise<void>;
}

function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  parent: AbortSignal | undefined,
): DeadlineRun<T> {
  if (parent?.aborted) {
    return { result: Promise.reject(new ScanCancelledError()), settled: Promise.resolve() };
  }

  const controller = new AbortController();
  const started = Promise.resolve().then(() => task(controller.signal));
  const settled = started.then(
    () => undefined,
    () => undefined,
  );

  const result = new Promise<T>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const fail = (err: Error) => {
      controller.abort(err);
      cleanup();
      reject(err);
    };
    const onParentAbort = () => fail(new ScanCancelledError());
    const cleanup = () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    };

    parent?.addEventListener('abort', onParentAbort, { once: true });
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => fail(new AnalysisTimeoutError(timeoutMs)), timeoutMs);
    }

    started.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });

  return { result, settled };
}

/**
 * Analyze every frame of `frames` with at most `workerCount` analyses in
 * flight. Frames are pulled lazily as workers free up. `onResult` fires once
 * per pulled frame, in completion order. A failing or hanging analysis only
 * affects its own frame: it is reported as a result with `error` set and is
 * not retried. An analysis that outlives its deadline still holds its
 * worker until it returns.
 */
export async function dispatchFrames(
  frames: AsyncIterable<TimedFrame> | Iterable<TimedFrame>,
  options: DispatchOptions,
): Promise<DispatchSummary> {
  const { analyzer, onResult, timeoutMs, signal, saveAllFrame } = options;
  const workerCount = options.workerCount ?? DEFAULT_WORKER_COUNT;
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new OutOfRangeError(`Worker count must be a positive integer, got ${workerCount}`);
  }
  if (timeoutMs !== undefined && !(timeoutMs > 0)) {
    throw new OutOfRangeError(`Analysis timeout must be positive, got ${timeoutMs}`);
  }

  const feed = new FrameFeed(frames);
  const summary: DispatchSummary = { submitted: 0, completed: 0, failed: 0, cancelled: false };
  let fatal: unknown = null;

  const analyzeOne = async ({ frameNumber, timestamp, frame }: TimedFrame): Promise<AnalyzedFrame> => {
    if (saveAllFrame) {
      try {
        await saveAllFrame(frame, frameNumber, timestamp);
      } catch (err) {
        console.warn(`[dispatch] could not save frame ${frameNumber}: ${errorMessage(err)}`);
      }
    }

    const run = runWithDeadline((abort) => analyzer.analyze(frame, abort), timeoutMs, signal);
    try {
      return { result: normalizeResult(await run.result), settled: run.settled };
    } catch (err) {
      return { result: failedResult(errorMessage(err)), settled: run.settled };
    }
  };

  const worker = async (): Promise<void> => {
    while (!signal?.aborted && fatal === null) {
      let item: TimedFrame | null;
      try {
        item = await feed.next();
      } catch (err) {
        fatal ??= err;
        return;
      }
      if (!item) return;

      summary.submitted++;
      const { result, settled } = await analyzeOne(item);
      if (result.error !== null) {
        summary.failed++;
        console.warn(`[dispatch] frame ${item.frameNumber} (${item.timestamp}) failed: ${result.error}`);
      }

      try {
        await onResult(item.frameNumber, item.timestamp, result, item.frame);
      } catch (err) {
        fatal ??= err;
        return;
      } finally {
        summary.completed++;
        // A timed-out analysis keeps its slot until it actually stops
        await settled;
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  await feed.close();

  if (fatal !== null) {
    throw fatal;
  }

  summary.cancelled = signal?.aborted ?? false;
  return summary;
}
