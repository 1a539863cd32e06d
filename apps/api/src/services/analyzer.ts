import { z } from 'zod';
import type { AnalysisResult } from '@curbwatch/shared';
import type { Frame } from './videoDecoder.js';

/**
 * Inspects one frame for safety hazards. Implementations may be slow and may
 * fail; callers isolate each call.
 */
export interface FrameAnalyzer {
  analyze(frame: Frame, signal?: AbortSignal): Promise<AnalysisResult>;
}

const SafetyIssueSchema = z.object({
  issue_type: z.string(),
  location: z.string(),
  description: z.string(),
});

export const AnalysisResultSchema = z.object({
  safety_issues: z.array(SafetyIssueSchema).default([]),
  error: z.string().nullable().optional(),
});

export function failedResult(message: string): AnalysisResult {
  return { safety_issues: [], error: message };
}

/** Validate whatever an analyzer handed back; anything off-contract becomes an error result. */
export function normalizeResult(value: unknown): AnalysisResult {
  const parsed = AnalysisResultSchema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return failedResult(
      `Malformed analysis result${issue ? `: ${issue.path.join('.') || 'result'} ${issue.message}` : ''}`,
    );
  }
  return { safety_issues: parsed.data.safety_issues, error: parsed.data.error ?? null };
}
