import type { AnalysisResult } from '@curbwatch/shared';
import { errorMessage } from '../errors.js';
import { SAFETY_ANALYSIS_RESPONSE_FORMAT, buildSafetyAnalysisPrompt } from '../prompts/safetyAnalysis.js';
import { failedResult, normalizeResult, type FrameAnalyzer } from './analyzer.js';
import { callChatCompletions } from './chatCompletions.js';
import type { RetryOptions } from './fetchWithRetry.js';
import { encodeJpeg } from './frameWriter.js';
import type { Frame } from './videoDecoder.js';

export interface AnalyzerConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
}

/**
 * Parse a model reply into an AnalysisResult. Replies that are not the
 * expected JSON object become an error result.
 */
export function parseSafetyAnalysis(content: string): AnalysisResult {
  // Some models wrap JSON in markdown fences
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return failedResult('Model reply contained no JSON object');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonMatch[0]);
  } catch (err) {
    return failedResult(`Model reply was not valid JSON: ${errorMessage(err)}`);
  }

  return normalizeResult(raw);
}

export class VisionAnalyzer implements FrameAnalyzer {
  private config: AnalyzerConfig;
  private encode: (frame: Frame) => Promise<Buffer>;
  private retry?: RetryOptions;

  constructor(
    config: AnalyzerConfig,
    deps: { encode?: (frame: Frame) => Promise<Buffer>; retry?: RetryOptions } = {},
  ) {
    this.config = config;
    this.encode = deps.encode ?? ((frame) => encodeJpeg(frame));
    this.retry = deps.retry;
  }

  get model(): string {
    return this.config.model;
  }

  async analyze(frame: Frame, signal?: AbortSignal): Promise<AnalysisResult> {
    try {
      const jpeg = await this.encode(frame);

      const { content, refusal } = await callChatCompletions(
        { apiKey: this.config.apiKey, baseUrl: this.config.baseUrl },
        this.config.model,
        [
          {
            role: 'user',
            content: [
              { type: 'text', text: buildSafetyAnalysisPrompt() },
              { type: 'image_url', image_url: { url: `data:image/jpeg;base64,${jpeg.toString('base64')}` } },
            ],
          },
        ],
        {
          temperature: 0.2,
          maxTokens: this.config.maxTokens,
          timeoutMs: this.config.timeoutMs,
          responseFormat: SAFETY_ANALYSIS_RESPONSE_FORMAT,
          signal,
          retry: this.retry,
        },
      );

      if (refusal) {
        return failedResult(`Model refused: ${refusal}`);
      }

      return parseSafetyAnalysis(content);
    } catch (err) {
      console.error(`[vision] ${this.config.model} failed:`, errorMessage(err));
      return failedResult(errorMessage(err));
    }
  }
}
