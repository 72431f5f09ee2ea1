export { ConsoleLogger, silentLogger } from './consoleLogger';
export { LOG_LEVELS } from './types';
export type { Logger, LogLevel } from './types';
