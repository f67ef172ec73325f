// Type definitions for the offer/invoice reconciliation service

import type Decimal from 'decimal.js';

// Enums for better type safety
export enum ComparisonStatus {
  MATCH = 'match',
  QUANTITY_MISMATCH = 'quantity_mismatch',
  PRICE_MISMATCH = 'price_mismatch',
  MISSING = 'missing',
  EXTRA_ITEM = 'extra_item'
}

export enum ExtractionMethod {
  TABLE = 'table',
  TEXT = 'text',
  BOTH = 'both'
}

export enum ErrorCode {
  INVALID_FORMAT = 'INVALID_FORMAT',
  FILE_TOO_LARGE = 'FILE_TOO_LARGE',
  INVALID_REQUEST = 'INVALID_REQUEST',
  PROCESSING_ERROR = 'PROCESSING_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  NOT_FOUND = 'NOT_FOUND'
}

// Core data interfaces

/**
 * A line entry of an offer or an invoice. Items are frozen on creation;
 * aggregation builds new items instead of touching the sources.
 */
export interface Item {
  readonly itemCode: string;
  readonly description: string;
  readonly quantity: Decimal;
  readonly unitPrice: Decimal;
  readonly totalPrice: Decimal;
}

export interface ComparisonResult {
  readonly itemCode: string;
  readonly description: string;
  readonly offerQuantity: Decimal;
  readonly deliveredQuantity: Decimal;
  readonly offerPrice: Decimal;
  readonly invoicedPrice: Decimal;
  /** offer - delivered */
  readonly quantityDifference: Decimal;
  /** offer - invoiced */
  readonly priceDifference: Decimal;
  readonly status: ComparisonStatus;
}

export interface Summary {
  totalItems: number;
  matches: number;
  quantityMismatches: number;
  priceMismatches: number;
  missingItems: number;
  extraItems: number;
  totalQuantityDifference: Decimal;
  totalPriceDifference: Decimal;
}

/**
 * Result of normalizing a numeric cell. `lossy` marks text that was empty or
 * unparsable and was defaulted to zero, as opposed to a genuine zero.
 */
export interface NormalizedNumber {
  value: Decimal;
  lossy: boolean;
}

// Document input, one entry per page
export type TableCell = string | null;
export type TableRow = TableCell[];
export type Table = TableRow[];

export interface DocumentPage {
  tables: Table[];
  text: string;
}

export interface SourceDocument {
  name?: string;
  pages: DocumentPage[];
}

export interface ExtractionOptions {
  method?: ExtractionMethod;
}

export interface ReconciliationOptions {
  tolerance?: number | Decimal;
}

// Serialized (wire) shapes: decimals travel as strings
export interface SerializedItem {
  itemCode: string;
  description: string;
  quantity: string;
  unitPrice: string;
  totalPrice: string;
  lineTotal: string;
}

export interface SerializedComparisonResult {
  itemCode: string;
  description: string;
  offerQuantity: string;
  deliveredQuantity: string;
  offerPrice: string;
  invoicedPrice: string;
  quantityDifference: string;
  priceDifference: string;
  status: ComparisonStatus;
}

export interface SerializedSummary {
  totalItems: number;
  matches: number;
  quantityMismatches: number;
  priceMismatches: number;
  missingItems: number;
  extraItems: number;
  totalQuantityDifference: string;
  totalPriceDifference: string;
}

export interface ReconciliationReport {
  offer: string;
  invoices: string[];
  priceTolerance: string;
  summary: SerializedSummary;
  results: SerializedComparisonResult[];
  generatedAt: string;
}

// Error handling interfaces
export interface ApiError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  timestamp: Date;
  requestId?: string;
}

export interface ApiResponse<T> {
  success: boolean;
  requestId?: string;
  data?: T;
  error?: ApiError;
  processingTime: number;
  timestamp: Date;
}

export * from './errors';
export { isExtractionMethod, parseExtractionMethod } from './guards';
