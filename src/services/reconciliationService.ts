import Decimal from 'decimal.js';
import { ExactDecimal } from '../utils/decimal';
import { logger } from '../utils/logger';
import { createComparisonResult, createItem } from '../models';
import {
  ComparisonResult,
  ComparisonStatus,
  Item,
  ReconciliationOptions
} from '../types';

export const DEFAULT_PRICE_TOLERANCE = new ExactDecimal('0.02');

const ZERO = new ExactDecimal(0);

/**
 * Reconciles offer items against the items of one or more invoices.
 *
 * Every method is a pure function of its arguments: no I/O, no shared state,
 * so a single instance serves concurrent callers.
 */
export class ReconciliationService {
  private static instance: ReconciliationService;

  private constructor() {}

  public static getInstance(): ReconciliationService {
    if (!ReconciliationService.instance) {
      ReconciliationService.instance = new ReconciliationService();
    }
    return ReconciliationService.instance;
  }

  /**
   * Fold items sharing a code (partial deliveries spread over several
   * invoices). Quantities and totals are summed; unit price and description
   * come from the first occurrence. Map order is first appearance.
   */
  aggregateItems(itemLists: ReadonlyArray<ReadonlyArray<Item>>): Map<string, Item> {
    const aggregate = new Map<string, Item>();

    for (const items of itemLists) {
      for (const item of items) {
        const existing = aggregate.get(item.itemCode);
        if (!existing) {
          aggregate.set(item.itemCode, item);
          continue;
        }

        aggregate.set(item.itemCode, createItem({
          itemCode: existing.itemCode,
          description: existing.description,
          quantity: new ExactDecimal(existing.quantity).plus(item.quantity),
          unitPrice: existing.unitPrice,
          totalPrice: new ExactDecimal(existing.totalPrice).plus(item.totalPrice)
        }));
      }
    }

    return aggregate;
  }

  /**
   * Compare the offer with the aggregated invoices. Results follow offer
   * order, then invoice-only codes in aggregate order; one result per code.
   */
  reconcile(
    offerItems: ReadonlyArray<Item>,
    invoiceItemLists: ReadonlyArray<ReadonlyArray<Item>>,
    options: ReconciliationOptions = {}
  ): ComparisonResult[] {
    const tolerance = new ExactDecimal(options.tolerance ?? DEFAULT_PRICE_TOLERANCE);
    const delivered = this.aggregateItems(invoiceItemLists);
    const offered = this.aggregateItems([offerItems]);

    if (offered.size < offerItems.length) {
      logger.debug('Offer lists some item codes more than once, folding them', {
        offerLines: offerItems.length,
        distinctCodes: offered.size
      });
    }

    const results: ComparisonResult[] = [];

    for (const offerItem of offered.values()) {
      const invoiceItem = delivered.get(offerItem.itemCode);
      results.push(invoiceItem
        ? this.compareItem(offerItem, invoiceItem, tolerance)
        : this.missingResult(offerItem));
    }

    for (const invoiceItem of delivered.values()) {
      if (!offered.has(invoiceItem.itemCode)) {
        results.push(this.extraResult(invoiceItem));
      }
    }

    logger.debug('Reconciliation completed', {
      offerItems: offered.size,
      invoiceItems: delivered.size,
      results: results.length,
      tolerance: tolerance.toString()
    });

    return results;
  }

  /**
   * Quantity is checked first; the price only when quantities agree and the
   * offer price is non-zero. The relative price check is done without
   * division: `|priceDifference| > tolerance × |offerPrice|`, so a difference
   * exactly at the tolerance still matches.
   */
  classify(quantityDifference: Decimal, priceDifference: Decimal, offerPrice: Decimal, tolerance: Decimal): ComparisonStatus {
    if (!quantityDifference.isZero()) {
      return ComparisonStatus.QUANTITY_MISMATCH;
    }

    const allowed = new ExactDecimal(tolerance).times(offerPrice.abs());
    if (!offerPrice.isZero() && priceDifference.abs().greaterThan(allowed)) {
      return ComparisonStatus.PRICE_MISMATCH;
    }

    return ComparisonStatus.MATCH;
  }

  private compareItem(offerItem: Item, invoiceItem: Item, tolerance: Decimal): ComparisonResult {
    const quantityDifference = new ExactDecimal(offerItem.quantity).minus(invoiceItem.quantity);
    const priceDifference = new ExactDecimal(offerItem.unitPrice).minus(invoiceItem.unitPrice);

    return createComparisonResult({
      itemCode: offerItem.itemCode,
      description: offerItem.description,
      offerQuantity: offerItem.quantity,
      deliveredQuantity: invoiceItem.quantity,
      offerPrice: offerItem.unitPrice,
      invoicedPrice: invoiceItem.unitPrice,
      quantityDifference,
      priceDifference,
      status: this.classify(quantityDifference, priceDifference, offerItem.unitPrice, tolerance)
    });
  }

  private missingResult(offerItem: Item): ComparisonResult {
    return createComparisonResult({
      itemCode: offerItem.itemCode,
      description: offerItem.description,
      offerQuantity: offerItem.quantity,
      deliveredQuantity: ZERO,
      offerPrice: offerItem.unitPrice,
      invoicedPrice: ZERO,
      quantityDifference: offerItem.quantity,
      priceDifference: ZERO,
      status: ComparisonStatus.MISSING
    });
  }

  private extraResult(invoiceItem: Item): ComparisonResult {
    return createComparisonResult({
      itemCode: invoiceItem.itemCode,
      description: invoiceItem.description,
      offerQuantity: ZERO,
      deliveredQuantity: invoiceItem.quantity,
      offerPrice: ZERO,
      invoicedPrice: invoiceItem.unitPrice,
      quantityDifference: new ExactDecimal(invoiceItem.quantity).negated(),
      priceDifference: new ExactDecimal(invoiceItem.unitPrice).negated(),
      status: ComparisonStatus.EXTRA_ITEM
    });
  }
}

// Export singleton instance
export const reconciliationService = ReconciliationService.getInstance();
