// -----------------------------------------------------------------------------
// Visualization database schema
// -----------------------------------------------------------------------------

export * from './enums.js';
export * from './visualization-jobs.js';
