export { default as logger, Logging } from './logger';
export { sendSuccess, sendError, sendText } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError, ReconciliationConfigError } from './AppError';
