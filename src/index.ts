/**
 * @fileoverview @eventframe/core - Event Sourcing & CQRS Core
 * @description
 * Event-sourced aggregates, command and query buses with composable
 * middleware, and in-memory adapters for the event store, dispatcher and
 * unit of work.
 *
 * ## Architecture Layers
 *
 * - **domain**: context, events, aggregates, errors, outbound ports
 * - **application**: commands, queries, handlers, middleware pipeline, buses
 * - **infrastructure**: standard middleware, cache, metrics, adapters
 *
 * @packageDocumentation
 * @module @eventframe/core
 */

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';
