export type ScanErrorCode =
  | 'SOURCE_NOT_FOUND'
  | 'SOURCE_UNREADABLE'
  | 'OUT_OF_RANGE'
  | 'ANALYSIS_TIMEOUT'
  | 'IO_FAILURE'
  | 'SCAN_CANCELLED';

export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class SourceNotFoundError extends ScanError {
  constructor(videoPath: string) {
    super('SOURCE_NOT_FOUND', `Video file not found: ${videoPath}`);
  }
}

export class SourceUnreadableError extends ScanError {
  constructor(videoPath: string, reason: string, cause?: unknown) {
    super('SOURCE_UNREADABLE', `Could not open video file ${videoPath}: ${reason}`, { cause });
  }
}

export class OutOfRangeError extends ScanError {
  constructor(message: string) {
    super('OUT_OF_RANGE', message);
  }
}

export class AnalysisTimeoutError extends ScanError {
  constructor(timeoutMs: number) {
    super('ANALYSIS_TIMEOUT', `Analysis timed out after ${timeoutMs}ms`);
  }
}

export class IOFailureError extends ScanError {
  constructor(target: string, cause: unknown) {
    super('IO_FAILURE', `Failed to write ${target}: ${errorMessage(cause)}`, { cause });
  }
}

export class ScanCancelledError extends ScanError {
  constructor() {
    super('SCAN_CANCELLED', 'Cancelled by user');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
