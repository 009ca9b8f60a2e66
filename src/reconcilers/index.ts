/**
 * Reconcilers module - State management for GitLab resources
 *
 * @module reconcilers
 */

export * as variables from './variables/index.js';
