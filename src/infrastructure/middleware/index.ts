export { loggingMiddleware } from './logging';
export { validationMiddleware } from './validation';
export type { ValidationOptions } from './validation';
export { metricsMiddleware } from './metrics';
export { cachingMiddleware, cacheKeyFor } from './caching';
export type { CachingOptions } from './caching';
export { errorHandlingMiddleware, isPanic } from './errorHandling';
