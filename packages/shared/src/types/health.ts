export type HealthStatus = 'healthy' | 'unhealthy';

export interface HealthResponse {
  message: string;
  version: string;
  status: HealthStatus;
  database: 'connected' | 'unreachable';
}
