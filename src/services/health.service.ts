import { HealthCheckResponse } from '../types';
import { env } from '../config';

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;
  private draining = false;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Stop reporting ready so load balancers drain traffic before the
   * server closes
   */
  markShuttingDown(): void {
    this.draining = true;
  }

  /**
   * Check if the service is ready
   * The engine is in-process; the only external state is shutdown
   */
  checkReadiness(): { ready: boolean; checks: Record<string, boolean> } {
    const checks: Record<string, boolean> = {
      server: true,
      acceptingRequests: !this.draining,
    };

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
