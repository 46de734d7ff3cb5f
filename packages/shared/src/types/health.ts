export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentHealth {
  status: HealthStatus;
  message?: string;
  response_time_ms?: number;
}

export interface HealthResponse {
  status: HealthStatus;
  version: string;
  uptime_seconds: number;
  checks: Record<string, ComponentHealth>;
}

export interface LivenessResponse {
  status: 'alive';
}

export interface ReadinessResponse {
  status: 'ready' | 'not_ready';
  ready: boolean;
}
