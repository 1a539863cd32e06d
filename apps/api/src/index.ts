import 'dotenv/config';
import { createServer } from 'node:http';
import express from 'express';
import cors from 'cors';
import { APP_VERSION } from '@curbwatch/shared';
import type { HealthResponse } from '@curbwatch/shared';
import { loadAnalyzerConfig, loadServiceConfig } from './config.js';
import { createScansRouter } from './routes/scans.js';
import { FfmpegDecoder } from './services/ffmpegDecoder.js';
import { runSafetyScan } from './services/scanPipeline.js';
import { ScanManager } from './services/scanManager.js';
import { VisionAnalyzer } from './services/visionAnalyzer.js';
import { createScanWSS } from './ws/scanStream.js';

async function start() {
  const serviceConfig = loadServiceConfig();
  const analyzerConfig = loadAnalyzerConfig();

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    const response: HealthResponse = {
      status: 'ok',
      service: 'curbwatch-api',
      timestamp: new Date().toISOString(),
      version: APP_VERSION,
    };
    res.json(response);
  });

  // Create HTTP server for Express + WebSocket
  const server = createServer(app);
  const { broadcast, close: closeWss } = createScanWSS(server);

  const decoder = new FfmpegDecoder();
  const analyzer = new VisionAnalyzer(analyzerConfig);
  const scanManager = new ScanManager({
    maxConcurrent: serviceConfig.maxConcurrentScans,
    maxRetained: serviceConfig.maxRetainedScans,
    outputDir: serviceConfig.outputDir,
    broadcast,
    runScan: (options) =>
      runSafetyScan({ ...options, timeoutMs: options.timeoutMs ?? analyzerConfig.timeoutMs }, { decoder, analyzer }),
  });

  app.use(createScansRouter(scanManager, { adminPassword: serviceConfig.adminPassword }));
  if (!serviceConfig.adminPassword) {
    console.warn('[curbwatch-api] ADMIN_PASSWORD is not set; starting and cancelling scans is disabled');
  }

  server.listen(serviceConfig.port, () => {
    console.log(`[curbwatch-api] listening on port ${serviceConfig.port} (model ${analyzer.model})`);
  });

  // Graceful shutdown
  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.once(sig, () => {
      console.log(`[curbwatch-api] ${sig} received, shutting down...`);
      scanManager
        .shutdown()
        .then(() => {
          closeWss();
          server.close();
          process.exit(0);
        })
        .catch((err: unknown) => {
          console.error('[curbwatch-api] shutdown failed:', err);
          process.exit(1);
        });
    });
  }
}

start().catch((err) => {
  console.error('[curbwatch-api] Failed to start:', err);
  process.exit(1);
});
