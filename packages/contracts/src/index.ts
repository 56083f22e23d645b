/**
 * @efaktur/contracts
 *
 * TypeScript interfaces and types for the e-Faktur validation pipeline.
 * This package has zero runtime dependencies.
 *
 * @packageDocumentation
 */

// Core types
export * from './core/fields.js';
export * from './core/document.js';
export * from './core/authority.js';
export * from './core/outcome.js';

// Capability providers
export * from './providers/capabilities.js';

// HTTP
export * from './http/http-client.js';
