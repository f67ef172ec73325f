import Decimal from 'decimal.js';

/**
 * Decimal constructor for every engine amount. Operations on its instances
 * keep all significant digits (up to decimal.js' 1e9 cap) and toString never
 * switches to exponential notation.
 */
export const ExactDecimal = Decimal.clone({
  precision: 1e9,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9e15,
  toExpPos: 9e15
});
