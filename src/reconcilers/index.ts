/**
 * Reconcilers module - Converge directory state on a desired state
 *
 * @module reconcilers
 */

export * as relationships from './relationships/index.js';
