// Wire format for reconciliation output. Decimals are written with
// Decimal#toString so storage and messaging layers never round-trip them
// through binary floating point.

import Decimal from 'decimal.js';
import { ExactDecimal } from '../utils/decimal';
import { lineTotal } from '../models';
import {
  ComparisonResult,
  Item,
  ReconciliationReport,
  SerializedComparisonResult,
  SerializedItem,
  SerializedSummary,
  Summary
} from '../types';

export const serializeItem = (item: Item): SerializedItem => ({
  itemCode: item.itemCode,
  description: item.description,
  quantity: item.quantity.toString(),
  unitPrice: item.unitPrice.toString(),
  totalPrice: item.totalPrice.toString(),
  lineTotal: lineTotal(item).toString()
});

export const serializeResult = (result: ComparisonResult): SerializedComparisonResult => ({
  itemCode: result.itemCode,
  description: result.description,
  offerQuantity: result.offerQuantity.toString(),
  deliveredQuantity: result.deliveredQuantity.toString(),
  offerPrice: result.offerPrice.toString(),
  invoicedPrice: result.invoicedPrice.toString(),
  quantityDifference: result.quantityDifference.toString(),
  priceDifference: result.priceDifference.toString(),
  status: result.status
});

export const serializeSummary = (summary: Summary): SerializedSummary => ({
  totalItems: summary.totalItems,
  matches: summary.matches,
  quantityMismatches: summary.quantityMismatches,
  priceMismatches: summary.priceMismatches,
  missingItems: summary.missingItems,
  extraItems: summary.extraItems,
  totalQuantityDifference: summary.totalQuantityDifference.toString(),
  totalPriceDifference: summary.totalPriceDifference.toString()
});

export interface ReportInput {
  offerName: string;
  /** Invoice names or paths, in the order they were reconciled */
  invoiceNames: string[];
  results: ComparisonResult[];
  summary: Summary;
  tolerance: number | Decimal;
  generatedAt?: Date;
}

export const buildReport = (input: ReportInput): ReconciliationReport => ({
  offer: input.offerName,
  invoices: [...input.invoiceNames],
  priceTolerance: new ExactDecimal(input.tolerance).toString(),
  summary: serializeSummary(input.summary),
  results: input.results.map(serializeResult),
  generatedAt: (input.generatedAt ?? new Date()).toISOString()
});
