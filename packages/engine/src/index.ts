/**
 * jobgraph - Job Configuration Engine
 *
 * Loads scheduled job definitions from YAML, validates their task
 * dependency graphs, and renders them for deployment. It includes:
 *
 * - ConfigLoader and the loadJob / loadJobs entry points
 * - Defaults merging through YAML merge keys
 * - Dependency validation and execution ordering
 * - Job settings rendering and sync planning
 *
 * @module @jobgraph/engine
 */

// Re-export jobs module
export * from './jobs/index.js';
