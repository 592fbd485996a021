/**
 * Geometry module - re-exports all geometry utilities
 */

export * from './point';
export * from './line';
export * from './polygon';
