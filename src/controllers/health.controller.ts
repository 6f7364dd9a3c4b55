import { Request, Response } from 'express';
import { healthService } from '../services';
import { asyncHandler, sendSuccess, sendError } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   * Basic health check endpoint
   */
  getHealth = asyncHandler((_req: Request, res: Response): void => {
    const health = healthService.getHealthStatus();
    sendSuccess(res, health, 'Service is healthy');
  });

  /**
   * GET /health/ready
   * Not ready once a graceful shutdown has started
   */
  getReadiness = asyncHandler((_req: Request, res: Response): void => {
    const { ready, checks } = healthService.checkReadiness();

    if (ready) {
      sendSuccess(res, { ready, checks }, 'Service is ready');
    } else {
      sendError(res, 'Service is not ready', 503);
    }
  });

  /**
   * GET /health/live
   * Liveness check endpoint
   */
  getLiveness = asyncHandler((_req: Request, res: Response): void => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export const healthController = new HealthController();

export default healthController;
