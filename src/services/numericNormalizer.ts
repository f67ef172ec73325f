import Decimal from 'decimal.js';
import { ExactDecimal } from '../utils/decimal';
import { NormalizedNumber } from '../types';

const NON_NUMERIC = /[^\d.,-]/g;
const DECIMAL_LITERAL = /^-?(\d+\.?\d*|\.\d+)$/;

const ZERO = new ExactDecimal(0);

/**
 * Normalize free-form numeric text (currency symbols, thousands and decimal
 * separators) into an exact decimal.
 *
 * When both `.` and `,` occur, whichever comes last is the decimal point and
 * the other is dropped as a thousands separator, so `1,234.56`, `1.234,56` and
 * `€1,234.56` all give `1234.56`. A lone `,` is a decimal comma.
 *
 * Never throws: empty or unparsable text yields zero with `lossy` set.
 */
export const normalize = (text: string | null | undefined): NormalizedNumber => {
  if (text === null || text === undefined) {
    return { value: ZERO, lossy: true };
  }

  let clean = String(text).replace(NON_NUMERIC, '');
  const lastDot = clean.lastIndexOf('.');
  const lastComma = clean.lastIndexOf(',');

  if (lastDot >= 0 && lastComma >= 0) {
    const thousands = lastComma > lastDot ? '.' : ',';
    clean = clean.split(thousands).join('');
    if (thousands === '.') {
      clean = clean.replace(',', '.');
    }
  } else if (lastComma >= 0) {
    clean = clean.replace(/,/g, '.');
  }

  if (!DECIMAL_LITERAL.test(clean)) {
    return { value: ZERO, lossy: true };
  }

  return { value: new ExactDecimal(clean), lossy: false };
};

/**
 * Parse numeric text, defaulting to zero. Use {@link normalize} to tell a
 * genuine zero from a defaulted one.
 */
export const parseDecimal = (text: string | null | undefined): Decimal => normalize(text).value;
