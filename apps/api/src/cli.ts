import 'dotenv/config';
import { USAGE, UsageError, describeSampling, parseCliArgs, type CliCommand, type CliOptions } from './cliArgs.js';
import { loadAnalyzerConfig } from './config.js';
import { ScanError, errorMessage } from './errors.js';
import { FfmpegDecoder } from './services/ffmpegDecoder.js';
import { runSafetyScan } from './services/scanPipeline.js';
import { VisionAnalyzer } from './services/visionAnalyzer.js';

async function scan(options: CliOptions): Promise<number> {
  const analyzerConfig = loadAnalyzerConfig();
  const analyzer = new VisionAnalyzer(analyzerConfig);
  const decoder = new FfmpegDecoder();

  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    process.stdout.write('\nCancelling, waiting for in-flight frames (Ctrl+C again to quit now)...\n');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  console.log(describeSampling(options.frameInterval, options.workers));
  if (options.saveFrames) {
    console.log(`Frames with detected issues will be saved to: ${options.framesDir}`);
  }
  if (options.saveAllFrames) {
    console.log(`All analyzed frames will be saved to: ${options.allFramesDir}`);
  }

  try {
    const result = await runSafetyScan(
      {
        videoPath: options.videoPath,
        outputPath: options.outputPath,
        frameInterval: options.frameInterval,
        workers: options.workers,
        timeoutMs: options.timeoutMs ?? analyzerConfig.timeoutMs,
        saveFrames: options.saveFrames,
        framesDir: options.framesDir,
        saveAllFrames: options.saveAllFrames,
        allFramesDir: options.allFramesDir,
        signal: controller.signal,
        onVideoInfo: (info) => {
          console.log('\nVideo Information:');
          console.log(`Duration: ${info.duration}`);
          console.log(`Frame count: ${info.frameCount}`);
          console.log(`FPS: ${info.fps}`);
          console.log(`Resolution: ${info.width}x${info.height}`);
          console.log(`Analyzing ${info.framesToAnalyze} frames...\n`);
        },
        onProgress: (progress) => {
          process.stdout.write(
            `\rProcessing: ${progress.percent.toFixed(1)}% (Frame ${progress.frameNumber}, Time: ${progress.timestamp}) ` +
            `[${progress.completed}/${progress.total}]`,
          );
        },
      },
      { decoder, analyzer },
    );

    process.stdout.write('\n\n');
    console.log(result.cancelled ? 'Analysis cancelled, partial report written.' : 'Analysis complete!');
    console.log(`Processed ${result.framesProcessed} frames`);
    console.log(`Detected ${result.issuesDetected} safety issues`);
    console.log(`Analysis errors: ${result.analysisErrors}`);
    if (result.stoppedEarly) {
      console.log('Warning: the video could not be decoded to the end; later frames were not analyzed.');
    }
    console.log(`Safety report saved to: ${result.reportPath}`);
    return result.cancelled ? 130 : 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

function readCommand(): CliCommand | null {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
      return null;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const command = readCommand();
  if (!command) {
    return 2;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  return scan(command.options);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    process.stdout.write('\n');
    if (err instanceof ScanError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error('Error:', errorMessage(err));
    }
    process.exitCode = 1;
  });
