import { ComparisonResult } from '../types';

export const createComparisonResult = (result: ComparisonResult): ComparisonResult => {
  return Object.freeze({ ...result });
};
