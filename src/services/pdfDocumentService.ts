import PDFParser from 'pdf2json';
import { config } from '../config/config';
import { logger } from '../utils/logger';
import { DocumentPage, Table } from '../types';
import { matchColumnRole } from './columnVocabulary';

/** A positioned run of text as laid out on a page. */
export interface TextRun {
  x: number;
  y: number;
  text: string;
}

// Runs whose y differs by less than this are on the same line (pdf2json page units)
const LINE_TOLERANCE = 0.5;

// Minimum cells for a line to count as a table row
const MIN_TABLE_CELLS = 3;

const isHeaderCell = (cell: string): boolean => matchColumnRole(cell) !== undefined;

export class PdfDocumentService {
  private static instance: PdfDocumentService;

  private constructor() {}

  public static getInstance(): PdfDocumentService {
    if (!PdfDocumentService.instance) {
      PdfDocumentService.instance = new PdfDocumentService();
    }
    return PdfDocumentService.instance;
  }

  /**
   * Open a PDF and rebuild each page's text and table rows. A document that
   * cannot be parsed yields no pages.
   */
  async loadPages(buffer: Buffer): Promise<DocumentPage[]> {
    try {
      const runsByPage = await this.parseRuns(buffer);
      const pages = runsByPage.map(runs => this.buildPage(runs));

      logger.debug('PDF document loaded', { pageCount: pages.length });
      return pages;
    } catch (error) {
      logger.warn('PDF document could not be opened, treating it as empty', {
        error: error instanceof Error ? error.message : String(error),
        size: buffer.length
      });
      return [];
    }
  }

  /**
   * Group runs into lines by y, order each line by x, and derive the page
   * text plus a table made of the multi-cell lines from the first header
   * line onwards.
   */
  buildPage(runs: TextRun[]): DocumentPage {
    const lineGroups = new Map<number, TextRun[]>();

    for (const run of runs) {
      const text = run.text.trim();
      if (!text) {
        continue;
      }
      const lineKey = Math.round(run.y / LINE_TOLERANCE) * LINE_TOLERANCE;
      const group = lineGroups.get(lineKey) ?? [];
      group.push({ ...run, text });
      lineGroups.set(lineKey, group);
    }

    const lines = Array.from(lineGroups.entries())
      .sort(([a], [b]) => a - b)
      .map(([, group]) => group.sort((a, b) => a.x - b.x).map(run => run.text));

    const text = lines.map(cells => cells.join(' ')).join('\n');

    const tables: Table[] = [];
    const headerIndex = lines.findIndex(cells => cells.length >= MIN_TABLE_CELLS && cells.some(isHeaderCell));
    if (headerIndex >= 0) {
      tables.push(lines.slice(headerIndex).filter(cells => cells.length >= MIN_TABLE_CELLS));
    }

    return { tables, text };
  }

  private parseRuns(buffer: Buffer): Promise<TextRun[][]> {
    return new Promise((resolve, reject) => {
      const pdfParser = new PDFParser();

      const timer = setTimeout(() => {
        pdfParser.removeAllListeners();
        reject(new Error(`PDF parsing timed out after ${config.pdf.parseTimeoutMs}ms`));
      }, config.pdf.parseTimeoutMs);
      timer.unref();

      pdfParser.on('pdfParser_dataError', (errData) => {
        clearTimeout(timer);
        reject(errData instanceof Error ? errData : errData.parserError);
      });

      pdfParser.on('pdfParser_dataReady', (pdfData) => {
        clearTimeout(timer);
        resolve(pdfData.Pages.map(page =>
          (page.Texts || []).flatMap(textBlock =>
            (textBlock.R || []).map(run => ({
              x: textBlock.x,
              y: textBlock.y,
              text: safeDecode(run.T)
            }))
          )
        ));
      });

      try {
        pdfParser.parseBuffer(buffer);
      } catch (error) {
        clearTimeout(timer);
        reject(error);
      }
    });
  }
}

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

// Export singleton instance
export const pdfDocumentService = PdfDocumentService.getInstance();
