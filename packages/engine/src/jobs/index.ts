/**
 * Jobs Module
 *
 * Scheduled job definitions loaded from YAML, with defaults merging,
 * dependency validation and payload rendering.
 *
 * This module provides:
 * - Job and task schemas (schema.ts)
 * - Defaults merging (merge.ts)
 * - YAML parsing (parser.ts)
 * - Field and DAG validation (validation.ts)
 * - Graph operations (graph.ts)
 * - The ConfigLoader entry point (loader.ts)
 * - Job settings rendering (payload.ts)
 * - Deployment state and sync planning (state.ts)
 *
 * @module @jobgraph/engine/jobs
 */

// Schema exports - Zod schemas and types for jobs and tasks
export * from './schema.js';

// Merge exports - `<<` expansion with key-wise nested merging
export * from './merge.js';

// Parser exports - YAML parsing and structural checks
export * from './parser.js';

// Validation exports - field, reference and cycle validation
export * from './validation.js';

// Graph exports - DAG operations for execution planning
export * from './graph.js';

// Loader exports - loadJob / loadJobs / ConfigLoader
export * from './loader.js';

// Payload exports - job settings rendering
export * from './payload.js';

// State exports - versioned state documents and sync plans
export * from './state.js';
