/**
 * Core types
 */

export * from './platform';
export * from './config';
export * from './warnings';
export * from './result';
export * from './schemas';
export * from './credentials';
