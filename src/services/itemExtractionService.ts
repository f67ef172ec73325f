// Line item extraction from offer and invoice documents.
// Two strategies run over every page: header-mapped tables and a fixed
// single-line text pattern. Their outputs are concatenated as-is; duplicates
// are expected and are folded later by the reconciler's aggregation.

import { logger } from '../utils/logger';
import { createItem } from '../models';
import { normalize } from './numericNormalizer';
import {
  COLUMN_VOCABULARY,
  POSITIONAL_DEFAULTS,
  ColumnMap,
  ColumnRole,
  matchColumnRole
} from './columnVocabulary';
import { pdfDocumentService } from './pdfDocumentService';
import {
  DocumentPage,
  ExtractionMethod,
  ExtractionOptions,
  Item,
  Table,
  TableRow
} from '../types';

/**
 * `<CODE> <DESCRIPTION> <QUANTITY> <UNIT_PRICE>` on one line. Tuned to a single
 * plain layout: descriptions containing digits will be split wrongly.
 */
export const TEXT_LINE_PATTERN = /(?<![A-Za-z0-9-])([A-Z0-9-]+)[ \t]+([^0-9\n]+?)[ \t]+(\d+(?:\.\d+)?)[ \t]+(\d+(?:\.\d+)?)/g;

export class ItemExtractionService {
  private static instance: ItemExtractionService;

  private constructor() {}

  public static getInstance(): ItemExtractionService {
    if (!ItemExtractionService.instance) {
      ItemExtractionService.instance = new ItemExtractionService();
    }
    return ItemExtractionService.instance;
  }

  /**
   * Extract line items from every page, in page order. Never throws: a page
   * that fails is logged and contributes no items.
   */
  extract(pages: DocumentPage[], options: ExtractionOptions = {}): Item[] {
    const method = options.method ?? ExtractionMethod.BOTH;
    const useTables = method !== ExtractionMethod.TEXT;
    const useText = method !== ExtractionMethod.TABLE;
    const items: Item[] = [];

    pages.forEach((page, pageIndex) => {
      try {
        if (useTables) {
          for (const table of page.tables) {
            items.push(...this.extractFromTable(table));
          }
        }
        if (useText) {
          items.push(...this.extractFromText(page.text));
        }
      } catch (error) {
        logger.warn('Skipping page that could not be processed', {
          page: pageIndex + 1,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    });

    logger.debug('Item extraction completed', {
      pageCount: pages.length,
      itemCount: items.length,
      method
    });

    return items;
  }

  /**
   * Load a PDF and extract its items. A document that cannot be opened
   * yields no items.
   */
  async extractFromPdf(buffer: Buffer, options: ExtractionOptions = {}): Promise<Item[]> {
    const pages = await pdfDocumentService.loadPages(buffer);
    return this.extract(pages, options);
  }

  /**
   * First row is the header; every following row becomes an item unless it
   * lacks a code or a readable quantity or unit price.
   */
  extractFromTable(table: Table): Item[] {
    if (table.length === 0) {
      return [];
    }

    const [header, ...rows] = table;
    const columns = this.identifyColumns(header);
    const items: Item[] = [];

    for (const row of rows) {
      const item = this.parseRow(row, columns);
      if (item) {
        items.push(item);
      }
    }

    return items;
  }

  identifyColumns(header: TableRow): ColumnMap {
    const columns: ColumnMap = { ...POSITIONAL_DEFAULTS };
    const assigned = new Set<ColumnRole>();

    header.forEach((cell, index) => {
      const role = matchColumnRole(cell);
      if (role) {
        // a later column naming the same role takes over
        columns[role] = index;
        assigned.add(role);
      }
    });

    if (assigned.size < COLUMN_VOCABULARY.length) {
      logger.debug('Header did not name every column, using positional defaults', {
        header,
        assigned: Array.from(assigned)
      });
    }

    return columns;
  }

  parseRow(row: TableRow, columns: ColumnMap): Item | null {
    const cell = (role: ColumnRole): string | null => row[columns[role]] ?? null;

    const itemCode = String(cell('itemCode') ?? '').trim();
    if (!itemCode) {
      return null;
    }

    const quantity = normalize(cell('quantity'));
    const unitPrice = normalize(cell('unitPrice'));
    if (quantity.lossy || unitPrice.lossy) {
      logger.debug('Skipping row without a readable quantity or unit price', { itemCode });
      return null;
    }

    const total = normalize(cell('totalPrice'));

    return createItem({
      itemCode,
      description: String(cell('description') ?? '').trim(),
      quantity: quantity.value,
      unitPrice: unitPrice.value,
      totalPrice: total.lossy ? undefined : total.value
    });
  }

  extractFromText(text: string): Item[] {
    const items: Item[] = [];

    for (const match of text.matchAll(TEXT_LINE_PATTERN)) {
      const [, itemCode, description, quantity, unitPrice] = match;
      items.push(createItem({
        itemCode,
        description: description.trim(),
        quantity,
        unitPrice
      }));
    }

    return items;
  }
}

// Export singleton instance
export const itemExtractionService = ItemExtractionService.getInstance();
