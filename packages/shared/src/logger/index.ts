export { ConsoleLogger, ScopedLogger, SilentLogger } from './consoleLogger';
export type { ConsoleLoggerOptions } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
export { formatBindings } from './types';
export type { Logger, MaybePromise } from './types';
