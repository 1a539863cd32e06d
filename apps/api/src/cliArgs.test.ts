import { describe, it, expect } from 'vitest';
import { UsageError, describeSampling, parseCliArgs } from './cliArgs.js';

describe('parseCliArgs', () => {
  it('applies defaults for a bare video path', () => {
    expect(parseCliArgs(['route.mp4'])).toEqual({
      kind: 'scan',
      options: {
        videoPath: 'route.mp4',
        outputPath: 'safety_report.json',
        frameInterval: 30,
        saveFrames: false,
        framesDir: 'detected_frames',
        saveAllFrames: false,
        allFramesDir: 'all_frames',
        workers: 4,
        timeoutMs: null,
      },
    });
  });

  it('reads every option', () => {
    const command = parseCliArgs([
      'route.mp4',
      '-o', 'out/report.json',
      '-n', '15',
      '--save-frames',
      '--frames-dir', 'issues',
      '--save-all-frames',
      '--all-frames-dir', 'everything',
      '-w', '8',
      '--timeout', '60000',
    ]);
    expect(command).toEqual({
      kind: 'scan',
      options: {
        videoPath: 'route.mp4',
        outputPath: 'out/report.json',
        frameInterval: 15,
        saveFrames: true,
        framesDir: 'issues',
        saveAllFrames: true,
        allFramesDir: 'everything',
        workers: 8,
        timeoutMs: 60000,
      },
    });
  });

  it('accepts long flags with an equals sign', () => {
    const command = parseCliArgs(['--frame-interval=5', 'route.mp4']);
    expect(command.kind === 'scan' && command.options.frameInterval).toBe(5);
  });

  it('returns help without requiring a video', () => {
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-h', 'route.mp4'])).toEqual({ kind: 'help' });
  });

  it('requires a video path', () => {
    expect(() => parseCliArgs([])).toThrow(new UsageError('Missing video path'));
  });

  it('rejects extra positionals', () => {
    expect(() => parseCliArgs(['a.mp4', 'b.mp4'])).toThrow('Unexpected arguments: b.mp4');
  });

  it('rejects non-positive or fractional numbers', () => {
    expect(() => parseCliArgs(['route.mp4', '-n', '0'])).toThrow('--frame-interval must be a positive integer, got "0"');
    expect(() => parseCliArgs(['route.mp4', '-w', '2.5'])).toThrow('--workers must be a positive integer, got "2.5"');
    expect(() => parseCliArgs(['route.mp4', '--timeout', 'soon'])).toThrow(
      '--timeout must be a positive integer, got "soon"',
    );
  });

  it('wraps unknown flags in a UsageError', () => {
    expect(() => parseCliArgs(['route.mp4', '--batch-size', '5'])).toThrow(UsageError);
  });
});

describe('describeSampling', () => {
  it('names the interval without an ordinal suffix', () => {
    expect(describeSampling(30, 4)).toBe('Analyzing every n-th frame (n=30) with 4 workers...');
    expect(describeSampling(2, 1)).toBe('Analyzing every n-th frame (n=2) with 1 worker...');
  });

  it('reads naturally for an interval of one', () => {
    expect(describeSampling(1, 8)).toBe('Analyzing every frame with 8 workers...');
  });
});
