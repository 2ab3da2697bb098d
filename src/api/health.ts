export const SERVER_VERSION = '1.0.0';
export const API_VERSION = 'v1';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  version: string;
  api_version: string;
}

/** The mock has no dependencies to probe, so it is healthy whenever it answers. */
export function healthResponse(now: Date = new Date()): HealthResponse {
  return {
    status: 'healthy',
    timestamp: now.toISOString(),
    version: SERVER_VERSION,
    api_version: API_VERSION,
  };
}
