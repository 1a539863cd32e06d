export interface HealthResponse {
  status: 'ok';
  service: string;
  timestamp: string;
  version: string;
}

export const APP_VERSION = '0.1.0';

export * from './types/report.js';
export * from './types/scan.js';
