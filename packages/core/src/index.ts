// Public API - used by the CLI
export * from './config/index.js';
export * from './errors.js';

// Catalogs
export * from './catalog/types.js';
export * from './catalog/catalog-reader.js';
export * from './catalog/catalog-updater.js';
export { writeFileAtomic } from './catalog/atomic-write.js';

// Markdown tables
export * from './table/table-codec.js';

// Candidate extraction
export * from './extract/revision-source.js';
export * from './extract/git-revision-source.js';
export * from './extract/call-patterns.js';
export * from './extract/context-resolver.js';
export * from './extract/candidate-extractor.js';
