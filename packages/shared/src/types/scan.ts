import type { SafetyReport } from './report.js';

export type ScanStatus = 'queued' | 'running' | 'complete' | 'cancelled' | 'error';

export interface VideoInfo {
  frameCount: number;
  fps: number;
  width: number;
  height: number;
}

export interface ScanProgress {
  frameNumber: number;
  timestamp: string;
  /** Position of the frame in the video, 0-100 */
  percent: number;
  completed: number;
  total: number;
}

export interface ScanRequest {
  videoPath: string;
  frameInterval?: number;
  workers?: number;
  saveFrames?: boolean;
  saveAllFrames?: boolean;
}

export interface ScanStartResponse {
  scanId: string;
  status: ScanStatus;
  position?: number;
}

export interface ScanSummary {
  id: string;
  videoPath: string;
  status: ScanStatus;
  frameInterval: number;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  framesProcessed: number;
  issuesDetected: number;
  analysisErrors: number;
}

export interface ScanDetail extends ScanSummary {
  video: VideoInfo | null;
  reportPath: string | null;
  stoppedEarly: boolean;
  errorMessage: string | null;
  report: SafetyReport | null;
}

export type WsScanMessage =
  | { type: 'scan:started'; scanId: string; data: { video: VideoInfo; total: number } }
  | { type: 'scan:progress'; scanId: string; data: ScanProgress }
  | {
      type: 'scan:complete';
      scanId: string;
      data: { reportPath: string; framesProcessed: number; issuesDetected: number; analysisErrors: number; cancelled: boolean };
    }
  | { type: 'scan:error'; scanId: string; data: { error: string } };
