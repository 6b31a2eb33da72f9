/**
 * Utilities barrel export
 */

export * from './escape';
export * from './format';
