/**
 * Dossier - Barrel
 *
 * Public API of the report pipeline.
 */

export * from './types.js';
export * from './config.js';
export * from './completion.js';
export * from './document-selector.js';
export * from './limiter.js';
export * from './status.js';
export * from './chunk-buffer.js';
export * from './prompts.js';
export * from './references.js';
export * from './briefing.js';
export * from './editor.js';
export * from './report-structure.js';
export * from './state.js';
export * from './pipeline.js';
