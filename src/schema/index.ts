/**
 * Schema module — single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './experiment.js';
export * from './args.js';
export * from './job.js';
export * from './config.js';
