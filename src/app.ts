import express, { Application } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Non-browser clients (CI jobs, curl) send no origin
    if (!origin || env.CORS_ORIGIN.includes('*') || env.CORS_ORIGIN.includes(origin)) {
      callback(null, true);
      return;
    }
    callback(null, false);
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
};

/**
 * Create and configure Express application
 */
export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(hpp());
  app.use(cors(corsOptions));

  app.use(
    rateLimit({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      limit: env.RATE_LIMIT_MAX_REQUESTS,
      standardHeaders: true,
      legacyHeaders: false,
      message: {
        success: false,
        error: 'Too many requests, please try again later',
      },
    })
  );

  // Credits files and inventories can be large; uploads are capped by multer
  app.use(express.json({ limit: env.MAX_UPLOAD_BYTES }));
  app.use(express.urlencoded({ extended: true, limit: env.MAX_UPLOAD_BYTES }));
  app.use(compression());

  app.use(requestLogger);

  app.use(env.API_PREFIX, routes);

  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Software Credits Reconciliation API',
      version: '1.0.0',
      reconciliation: `${env.API_PREFIX}/reconciliation`,
      health: `${env.API_PREFIX}/health`,
      timestamp: new Date().toISOString(),
    });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
