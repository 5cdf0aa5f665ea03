/**
 * @module @eventframe/core/application
 * @description Application layer exports
 */

// ============================================================================
// CQRS Pattern
// ============================================================================

export * from './cqrs';

// ============================================================================
// Middleware Pipeline
// ============================================================================

export * from './pipeline';

// ============================================================================
// Logging Port
// ============================================================================

export * from './logging';
