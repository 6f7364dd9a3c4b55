export { errorHandler } from './errorHandler';
export { notFound } from './notFound';
export { requestLogger } from './requestLogger';
export { validateRequest } from './validateRequest';
export { uploadCreditsFiles } from './upload';
