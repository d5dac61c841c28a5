// Types
export * from './types';

// Constants
export * from './constants';

// Instance IDs
export * from './lib/id';

// Input validation (Zod schemas + fallback rules)
export * from './lib/validation';
