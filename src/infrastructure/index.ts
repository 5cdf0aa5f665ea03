/**
 * @module @eventframe/core/infrastructure
 * @description Adapters for the domain and application ports
 */

// Cache
export { CacheManager } from './cache/CacheManager';
export type { CacheProvider, CacheStats, CacheManagerOptions } from './cache/CacheManager';

// Metrics
export { InMemoryMetricsCollector } from './metrics/InMemoryMetricsCollector';
export type {
  MetricsCollector,
  RequestMetrics,
  SummaryStats,
} from './metrics/InMemoryMetricsCollector';

// Middleware
export * from './middleware';

// Event store, dispatcher, unit of work
export { InMemoryEventStore } from './eventstore/InMemoryEventStore';
export { InMemoryEventDispatcher, matchingPatterns } from './events/InMemoryEventDispatcher';
export { UnitOfWork } from './uow/UnitOfWork';

// Logging & configuration
export { PinoLogger, createPinoLogger, toFields } from './logging/PinoLogger';
export type { LoggerConfig } from './logging/PinoLogger';
export { ConfigSchema, loadConfig } from './config/config';
export type { AppConfig } from './config/config';
