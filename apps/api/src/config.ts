import type { AnalyzerConfig } from './services/visionAnalyzer.js';

type Env = Record<string, string | undefined>;

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_VISION_MODEL = 'gpt-4o-2024-08-06';

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadAnalyzerConfig(env: Env = process.env): AnalyzerConfig {
  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY environment variable is not set. Create a .env file with your API key.');
  }

  return {
    apiKey,
    baseUrl: env.OPENAI_BASE_URL || DEFAULT_BASE_URL,
    model: env.VISION_MODEL || DEFAULT_VISION_MODEL,
    timeoutMs: positiveInt(env, 'ANALYSIS_TIMEOUT_MS', 120_000),
    maxTokens: positiveInt(env, 'ANALYSIS_MAX_TOKENS', 1000),
  };
}

export interface ServiceConfig {
  port: number;
  maxConcurrentScans: number;
  outputDir: string;
  /** Finished scans kept in memory; older ones are forgotten */
  maxRetainedScans: number;
  /** Bearer token for starting and cancelling scans; scan control is disabled without it */
  adminPassword: string | null;
}

export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  return {
    port: positiveInt(env, 'PORT', 4000),
    maxConcurrentScans: positiveInt(env, 'MAX_CONCURRENT_SCANS', 2),
    outputDir: env.SCAN_OUTPUT_DIR || 'scans',
    maxRetainedScans: positiveInt(env, 'MAX_RETAINED_SCANS', 100),
    adminPassword: env.ADMIN_PASSWORD || null,
  };
}
