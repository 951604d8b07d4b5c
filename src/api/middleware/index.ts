export { errorHandler, createError, ApiError } from './errorHandler';
export { requireApiKey } from './auth';
