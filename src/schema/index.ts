/**
 * Schema module — data shapes shared across the CLI.
 * Zod schemas for everything read from disk, plain types for the
 * resolved model.
 */

export * from './config.js';
