export { consoleLogger, noopLogger } from './ILogger';
export type { ILogger, LogLevel } from './ILogger';
