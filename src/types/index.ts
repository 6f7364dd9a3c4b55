import { Request, Response, NextFunction } from 'express';

// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  // Default matching configuration
  MATCH_THRESHOLD: number;
  MIN_SUBSTRING_LENGTH: number;
  // Report store / uploads
  MAX_STORED_REPORTS: number;
  MAX_UPLOAD_BYTES: number;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Route handlers may be sync or async; asyncHandler forwards both kinds of failure
export type RouteHandler = (req: Request, res: Response, next: NextFunction) => void | Promise<void>;

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}
