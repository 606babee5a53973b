/**
 * Utils barrel export
 * Provides clean import path for all utilities
 */

export { logger, LogLevel, parseLogLevel } from './logger.js';
export { FileManager } from './fileManager.js';
