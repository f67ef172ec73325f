// Export all services
export { normalize, parseDecimal } from './numericNormalizer';
export { itemExtractionService } from './itemExtractionService';
export { pdfDocumentService } from './pdfDocumentService';
export { reconciliationService } from './reconciliationService';
export { summarize } from './summaryService';
export { buildReport, serializeItem, serializeResult, serializeSummary } from './reportService';
export { comparisonService } from './comparisonService';
export type { ComparisonSettings, PdfSource } from './comparisonService';
