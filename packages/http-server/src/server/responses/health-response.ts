/**
 * Health check response builder
 */

export interface HealthResponseOptions {
  activeSessions: number;
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  node_version: string;
  performance: {
    uptime_seconds: number;
  };
  sessions: {
    active: number;
  };
}

export function buildHealthResponse(options: HealthResponseOptions): HealthResponse {
  return {
    status: 'ok',
    timestamp: new Date().toISOString(),
    node_version: process.version,
    performance: {
      uptime_seconds: Math.round(process.uptime()),
    },
    sessions: {
      active: options.activeSessions,
    },
  };
}
