import Decimal from 'decimal.js';
import { ExactDecimal } from '../utils/decimal';
import { Item } from '../types';

export interface ItemFields {
  itemCode: string;
  description?: string;
  quantity: Decimal.Value;
  unitPrice: Decimal.Value;
  totalPrice?: Decimal.Value;
}

/**
 * Build a frozen Item. A missing total is derived as quantity × unit price.
 */
export const createItem = (fields: ItemFields): Item => {
  const quantity = new ExactDecimal(fields.quantity);
  const unitPrice = new ExactDecimal(fields.unitPrice);
  const totalPrice = fields.totalPrice === undefined
    ? quantity.times(unitPrice)
    : new ExactDecimal(fields.totalPrice);

  return Object.freeze({
    itemCode: fields.itemCode,
    description: fields.description ?? '',
    quantity,
    unitPrice,
    totalPrice
  });
};

/** quantity × unit price, regardless of the stored total. */
export const lineTotal = (item: Item): Decimal => new ExactDecimal(item.quantity).times(item.unitPrice);
