/**
 * node-htsp: HTSP client session engine.
 * @module node-htsp
 */
export * from './htsmsg';
export * from './htsp';
export * from './core/logger';
