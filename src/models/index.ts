// Export all models
export { createItem, lineTotal } from './Item';
export type { ItemFields } from './Item';
export { createComparisonResult } from './ComparisonResult';

// Re-export types for convenience
export type {
  Item,
  ComparisonResult,
  Summary,
} from '../types';
