/**
 * Services barrel export
 * Provides clean import path for all services
 */

export { FieldNormalizer } from './fieldNormalizer.js';
export { AbandonDetector, isAbandon, isQuickDrop } from './abandonDetector.js';
export { RecoveryMatcher, transitionStatus } from './recoveryMatcher.js';
export { MetricsAggregator, abandonmentRate } from './metricsAggregator.js';
export { ConsistencyValidator } from './consistencyValidator.js';
export { CallLogLoader } from './callLogLoader.js';
export { ReportWriter } from './reportWriter.js';
