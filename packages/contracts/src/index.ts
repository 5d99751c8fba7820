/**
 * @nfe-ledger/contracts
 *
 * TypeScript interfaces and types shared by the NF-e extraction and classification packages.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/fiscal-document.js';
export * from './core/diagnostic.js';

// Extraction steps
export * from './pipeline/step.js';

// Classification
export * from './classification/classification.js';

// Storage
export * from './storage/mapping-store.js';

// Utils
export * from './utils/json-schema.js';
