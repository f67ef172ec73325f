import { ExactDecimal } from '../utils/decimal';
import { ComparisonResult, ComparisonStatus, Summary } from '../types';

type StatusCounter = keyof Pick<Summary, 'matches' | 'quantityMismatches' | 'priceMismatches' | 'missingItems' | 'extraItems'>;

const STATUS_COUNTERS: Record<ComparisonStatus, StatusCounter> = {
  [ComparisonStatus.MATCH]: 'matches',
  [ComparisonStatus.QUANTITY_MISMATCH]: 'quantityMismatches',
  [ComparisonStatus.PRICE_MISMATCH]: 'priceMismatches',
  [ComparisonStatus.MISSING]: 'missingItems',
  [ComparisonStatus.EXTRA_ITEM]: 'extraItems'
};

export const emptySummary = (): Summary => ({
  totalItems: 0,
  matches: 0,
  quantityMismatches: 0,
  priceMismatches: 0,
  missingItems: 0,
  extraItems: 0,
  totalQuantityDifference: new ExactDecimal(0),
  totalPriceDifference: new ExactDecimal(0)
});

/**
 * Count results per status and total the absolute quantity and price
 * differences across all of them, whatever their status.
 */
export const summarize = (results: ReadonlyArray<ComparisonResult>): Summary => {
  const summary = emptySummary();

  for (const result of results) {
    summary[STATUS_COUNTERS[result.status]] += 1;
    summary.totalQuantityDifference = summary.totalQuantityDifference.plus(result.quantityDifference.abs());
    summary.totalPriceDifference = summary.totalPriceDifference.plus(result.priceDifference.abs());
  }

  summary.totalItems = results.length;
  return summary;
};

