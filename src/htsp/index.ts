/**
 * HTSP session engine exports.
 * @module htsp
 */
export * from './constants';
export * from './errors';
export * from './notifications';
export * from './cache';
export * from './entities';
export * from './auth';
export * from './dispatcher';
export * from './correlator';
export * from './transport';
export * from './session';
