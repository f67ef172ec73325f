import { ExtractionMethod } from './index';

export const isExtractionMethod = (value: unknown): value is ExtractionMethod => {
  return Object.values<unknown>(ExtractionMethod).includes(value);
};

/**
 * Parse an extraction method from loose input (env var, request field).
 * Accepts the legacy spellings `table_only`/`text_only` and falls back to `both`.
 */
export const parseExtractionMethod = (value: unknown): ExtractionMethod => {
  if (typeof value !== 'string') {
    return ExtractionMethod.BOTH;
  }

  const normalized = value.trim().toLowerCase().replace(/[-\s]/g, '_').replace(/_only$/, '');
  return isExtractionMethod(normalized) ? normalized : ExtractionMethod.BOTH;
};
