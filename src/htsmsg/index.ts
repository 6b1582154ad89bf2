/**
 * HTSMSG exports.
 * @module htsmsg
 */
export * from './constants';
export * from './codec';
