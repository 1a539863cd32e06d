export interface SafetyIssue {
  issue_type: string;
  location: string;
  description: string;
}

/**
 * What the analyzer returns for one frame. The trusted contract is that an
 * error never carries issues, but consumers must not rely on it.
 */
export interface AnalysisResult {
  safety_issues: SafetyIssue[];
  error: string | null;
}

export interface ReportEntry {
  frame_number: number;
  /** `HH:MM:SS`, sub-second part truncated */
  timestamp: string;
  issue_details: SafetyIssue;
}

export interface SafetyReport {
  video_file: string;
  /** Local time the report was assembled, `YYYY-MM-DD HH:MM:SS` */
  analysis_timestamp: string;
  frame_interval: number;
  detected_issues: ReportEntry[];
}

export interface ReportStats {
  framesProcessed: number;
  framesWithIssues: number;
  issuesDetected: number;
  analysisErrors: number;
}
