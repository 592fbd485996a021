/**
 * Floor Elements
 *
 * Main entry point for the library
 */

// Export all geometry types
export * from './types/geometry';

// Export geometry utilities
export * from './geometry';

// Export the placement engine, policies, floor and building
export * from './algorithm';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'Floor Elements';
