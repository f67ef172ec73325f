export type ColumnRole = 'itemCode' | 'description' | 'quantity' | 'unitPrice' | 'totalPrice';

export type ColumnMap = Record<ColumnRole, number>;

/**
 * Header keywords per column role. Order matters: the first role whose
 * keywords occur in a header cell claims that column.
 */
export const COLUMN_VOCABULARY: ReadonlyArray<{ role: ColumnRole; keywords: readonly string[] }> = [
  { role: 'itemCode', keywords: ['item', 'code', 'article'] },
  { role: 'description', keywords: ['desc', 'description', 'product'] },
  { role: 'quantity', keywords: ['qty', 'quantity', 'amount'] },
  { role: 'unitPrice', keywords: ['price', 'unit'] },
  { role: 'totalPrice', keywords: ['total', 'sum'] }
];

/** Column used for a role the header does not name. */
export const POSITIONAL_DEFAULTS: Readonly<ColumnMap> = {
  itemCode: 0,
  description: 1,
  quantity: 2,
  unitPrice: 3,
  totalPrice: 4
};

/** Role named by a header cell (case-insensitive substring match), if any. */
export const matchColumnRole = (headerCell: string | null): ColumnRole | undefined => {
  const header = String(headerCell ?? '').toLowerCase();
  return COLUMN_VOCABULARY.find(({ keywords }) => keywords.some(keyword => header.includes(keyword)))?.role;
};
