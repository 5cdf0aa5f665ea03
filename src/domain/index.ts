/**
 * @module @eventframe/core/domain
 * @description Domain layer exports
 */

// ============================================================================
// Context Management
// ============================================================================

export * from './context';

// ============================================================================
// Domain Events & Aggregates
// ============================================================================

export * from './events';

// ============================================================================
// Errors
// ============================================================================

export * from './exceptions';

// ============================================================================
// Repository Ports
// ============================================================================

export * from './repository';
