export { createLogger, createSilentLogger } from './logger.js';
export type { Logger, LoggerConfig } from './logger.js';
export { ForkLogger, formatSessionTimestamp, RESULT_PREVIEW_LENGTH } from './fork-logger.js';
export type { ForkLoggerOptions } from './fork-logger.js';
export { ProgressTracker } from './progress.js';
export type { ProgressListener, ProgressStatus } from './progress.js';
