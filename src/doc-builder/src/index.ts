/**
 * doc-builder
 *
 * Thin wrapper around doxygen: reads a base Doxyfile, appends overrides
 * for output format, layout, exclusions and version, and pipes the result
 * into `doxygen -`.
 */

// Core types
export * from './types';
export * from './errors';

// Doxyfile grammar and stream assembly
export * from './doxyfile';

// Running doxygen
export * from './runner';

// Project config and source scanning
export * from './project';

export { DocBuilder, BuildChoices, PreparedBuild } from './builder';
export { createProgram } from './cli/program';
