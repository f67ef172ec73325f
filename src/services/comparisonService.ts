import { ExactDecimal } from '../utils/decimal';
import { logger } from '../utils/logger';
import { itemExtractionService } from './itemExtractionService';
import { reconciliationService } from './reconciliationService';
import { summarize } from './summaryService';
import { buildReport } from './reportService';
import {
  ExtractionMethod,
  Item,
  ReconciliationReport,
  SourceDocument
} from '../types';

export interface ComparisonSettings {
  tolerance: number;
  extractionMethod: ExtractionMethod;
}

export interface PdfSource {
  name: string;
  buffer: Buffer;
}

interface ExtractedSource {
  name: string;
  items: Item[];
}

/**
 * Runs one offer against its invoices end to end: extraction, reconciliation,
 * summary and report. Settings are supplied by the caller on every run.
 */
export class ComparisonService {
  private static instance: ComparisonService;

  private constructor() {}

  public static getInstance(): ComparisonService {
    if (!ComparisonService.instance) {
      ComparisonService.instance = new ComparisonService();
    }
    return ComparisonService.instance;
  }

  compareDocuments(
    offer: SourceDocument,
    invoices: SourceDocument[],
    settings: ComparisonSettings
  ): ReconciliationReport {
    const extract = (document: SourceDocument, fallbackName: string): ExtractedSource => ({
      name: document.name || fallbackName,
      items: itemExtractionService.extract(document.pages, { method: settings.extractionMethod })
    });

    return this.compareExtracted(
      extract(offer, 'offer'),
      invoices.map((invoice, index) => extract(invoice, `invoice-${index + 1}`)),
      settings
    );
  }

  async comparePdfs(
    offer: PdfSource,
    invoices: PdfSource[],
    settings: ComparisonSettings
  ): Promise<ReconciliationReport> {
    const extract = async (source: PdfSource): Promise<ExtractedSource> => ({
      name: source.name,
      items: await itemExtractionService.extractFromPdf(source.buffer, { method: settings.extractionMethod })
    });

    const [offerSource, ...invoiceSources] = await Promise.all([offer, ...invoices].map(extract));
    return this.compareExtracted(offerSource, invoiceSources, settings);
  }

  private compareExtracted(
    offer: ExtractedSource,
    invoices: ExtractedSource[],
    settings: ComparisonSettings
  ): ReconciliationReport {
    const tolerance = new ExactDecimal(settings.tolerance);

    if (offer.items.length === 0) {
      logger.warn('No items extracted from offer', { offer: offer.name });
    }
    invoices
      .filter(invoice => invoice.items.length === 0)
      .forEach(invoice => logger.warn('No items extracted from invoice', { invoice: invoice.name }));

    const results = reconciliationService.reconcile(
      offer.items,
      invoices.map(invoice => invoice.items),
      { tolerance }
    );
    const summary = summarize(results);

    logger.info('Comparison completed', {
      offer: offer.name,
      invoiceCount: invoices.length,
      totalItems: summary.totalItems,
      matches: summary.matches,
      quantityMismatches: summary.quantityMismatches,
      priceMismatches: summary.priceMismatches,
      missingItems: summary.missingItems,
      extraItems: summary.extraItems
    });

    return buildReport({
      offerName: offer.name,
      invoiceNames: invoices.map(invoice => invoice.name),
      results,
      summary,
      tolerance
    });
  }
}

// Export singleton instance
export const comparisonService = ComparisonService.getInstance();
