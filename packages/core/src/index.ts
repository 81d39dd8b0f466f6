/**
 * @jobgraph/core
 *
 * Shared building blocks: structured logging and Quartz cron parsing.
 *
 * @module @jobgraph/core
 */

export * from './telemetry/logger.js';
export * from './scheduler/quartz.js';
