export type { Logger, LogLevel, MaybePromise } from './types';
export { isLevelEnabled } from './types';
export { ConsoleLogger, ScopedLogger } from './consoleLogger';
export { JsonlLogger } from './jsonlLogger';
