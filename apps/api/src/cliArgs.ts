import { parseArgs } from 'node:util';
import { errorMessage } from './errors.js';
import { SCAN_DEFAULTS } from './services/scanPipeline.js';

export const USAGE = `Usage: curbwatch <video> [options]

Analyze garbage truck footage for safety issues.

Options:
  -o, --output <path>          Report path (default: ${SCAN_DEFAULTS.outputPath})
  -n, --frame-interval <n>     Analyze every n-th frame (default: ${SCAN_DEFAULTS.frameInterval})
      --save-frames            Save frames with detected safety issues
      --frames-dir <dir>       Directory for frames with issues (default: ${SCAN_DEFAULTS.framesDir})
      --save-all-frames        Save every analyzed frame
      --all-frames-dir <dir>   Directory for all analyzed frames (default: ${SCAN_DEFAULTS.allFramesDir})
  -w, --workers <n>            Concurrent analyses (default: ${SCAN_DEFAULTS.workers})
      --timeout <ms>           Per-frame analysis timeout (default: ANALYSIS_TIMEOUT_MS or 120000)
  -h, --help                   Show this help`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  videoPath: string;
  outputPath: string;
  frameInterval: number;
  saveFrames: boolean;
  framesDir: string;
  saveAllFrames: boolean;
  allFramesDir: string;
  workers: number;
  timeoutMs: number | null;
}

export type CliCommand = { kind: 'help' } | { kind: 'scan'; options: CliOptions };

function positiveInt(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

const ARG_OPTIONS = {
  output: { type: 'string', short: 'o' },
  'frame-interval': { type: 'string', short: 'n' },
  'save-frames': { type: 'boolean' },
  'frames-dir': { type: 'string' },
  'save-all-frames': { type: 'boolean' },
  'all-frames-dir': { type: 'string' },
  workers: { type: 'string', short: 'w' },
  timeout: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, strict: true, options: ARG_OPTIONS });
  } catch (err) {
    throw new UsageError(errorMessage(err));
  }
}

export function describeSampling(frameInterval: number, workers: number): string {
  const frames = frameInterval === 1 ? 'every frame' : `every n-th frame (n=${frameInterval})`;
  return `Analyzing ${frames} with ${workers} worker${workers === 1 ? '' : 's'}...`;
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) {
    return { kind: 'help' };
  }

  const [videoPath, ...extra] = positionals;
  if (!videoPath) {
    throw new UsageError('Missing video path');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected arguments: ${extra.join(' ')}`);
  }

  return {
    kind: 'scan',
    options: {
      videoPath,
      outputPath: values.output ?? SCAN_DEFAULTS.outputPath,
      frameInterval: positiveInt('--frame-interval', values['frame-interval'], SCAN_DEFAULTS.frameInterval),
      saveFrames: values['save-frames'] ?? false,
      framesDir: values['frames-dir'] ?? SCAN_DEFAULTS.framesDir,
      saveAllFrames: values['save-all-frames'] ?? false,
      allFramesDir: values['all-frames-dir'] ?? SCAN_DEFAULTS.allFramesDir,
      workers: positiveInt('--workers', values.workers, SCAN_DEFAULTS.workers),
      timeoutMs: values.timeout === undefined ? null : positiveInt('--timeout', values.timeout, 0),
    },
  };
}
