import request from 'supertest';
import app from '../app';
import { pdfDocumentService } from '../services/pdfDocumentService';
import { ComparisonStatus, ErrorCode, ExtractionMethod, SourceDocument } from '../types';

const offer: SourceDocument = {
  name: 'offer-2026-014',
  pages: [{
    tables: [[
      ['Item Number', 'Product Description', 'Quantity', 'Price/Unit', 'Line Total'],
      ['A123', 'Steel bolts', '10', '5.00', '50.00'],
      ['B456', 'Washers', '5', '25.00', '125.00'],
      ['C789', 'Hinges', '3', '100,00', '300,00']
    ]],
    text: ''
  }]
};

const invoices: SourceDocument[] = [
  {
    name: 'invoice-1',
    pages: [{ tables: [], text: 'A123 Steel bolts 6 5.00\nB456 Washers 5 26.00' }]
  },
  {
    name: 'invoice-2',
    pages: [{ tables: [], text: 'A123 Steel bolts 2 5.00\nD000 Spacers 2 7.50' }]
  }
];

describe('API', () => {
  describe('GET /health', () => {
    it('should report the service and engine defaults', async () => {
      const response = await request(app)
        .get('/health')
        .expect(200);

      expect(response.body).toMatchObject({
        status: 'OK',
        service: 'Offer Invoice Reconciler',
        engine: {
          priceTolerance: 0.02,
          extractionMethod: ExtractionMethod.BOTH
        }
      });
    });
  });

  describe('GET /', () => {
    it('should list the endpoints', async () => {
      const response = await request(app)
        .get('/')
        .expect(200);

      expect(response.body.endpoints.reconcile).toBe('POST /api/v1/reconciliations');
    });
  });

  describe('POST /api/v1/extractions', () => {
    it('should return the extracted items with decimals as strings', async () => {
      const response = await request(app)
        .post('/api/v1/extractions')
        .send({ document: offer })
        .expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.data.name).toBe('offer-2026-014');
      expect(response.body.data.itemCount).toBe(3);
      expect(response.body.data.items[2]).toEqual({
        itemCode: 'C789',
        description: 'Hinges',
        quantity: '3',
        unitPrice: '100',
        totalPrice: '300',
        lineTotal: '300'
      });
    });

    it('should honour the requested extraction method', async () => {
      const response = await request(app)
        .post('/api/v1/extractions')
        .send({ document: invoices[0], options: { extractionMethod: 'table' } })
        .expect(200);

      expect(response.body.data.itemCount).toBe(0);
    });

    it('should accept the hyphenated method spelling', async () => {
      const response = await request(app)
        .post('/api/v1/extractions')
        .send({ document: invoices[0], options: { extractionMethod: 'table-only' } })
        .expect(200);

      expect(response.body.data.itemCount).toBe(0);
    });

    it('should reject an unknown extraction method', async () => {
      const response = await request(app)
        .post('/api/v1/extractions')
        .send({ document: offer, options: { extractionMethod: 'ocr' } })
        .expect(400);

      expect(response.body.error.code).toBe(ErrorCode.INVALID_REQUEST);
      expect(response.body.error.details.validationErrors[0].field).toBe('body.options.extractionMethod');
    });
  });

  describe('POST /api/v1/reconciliations', () => {
    it('should reconcile the offer against all invoices', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations')
        .set('X-Request-Id', 'test-reconcile-1')
        .send({ offer, invoices })
        .expect(200);

      expect(response.body.success).toBe(true);
      expect(response.body.requestId).toBe('test-reconcile-1');

      const report = response.body.data;
      expect(report.offer).toBe('offer-2026-014');
      expect(report.invoices).toEqual(['invoice-1', 'invoice-2']);
      expect(report.priceTolerance).toBe('0.02');
      expect(report.results.map((result: { itemCode: string; status: string }) => [result.itemCode, result.status])).toEqual([
        ['A123', ComparisonStatus.QUANTITY_MISMATCH],
        ['B456', ComparisonStatus.PRICE_MISMATCH],
        ['C789', ComparisonStatus.MISSING],
        ['D000', ComparisonStatus.EXTRA_ITEM]
      ]);
      expect(report.results[0].deliveredQuantity).toBe('8');
      expect(report.results[0].quantityDifference).toBe('2');
      expect(report.summary).toEqual({
        totalItems: 4,
        matches: 0,
        quantityMismatches: 1,
        priceMismatches: 1,
        missingItems: 1,
        extraItems: 1,
        totalQuantityDifference: '7',
        totalPriceDifference: '8.5'
      });
    });

    it('should apply a tolerance given in the request', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations')
        .send({ offer, invoices, options: { priceTolerance: 0.05 } })
        .expect(200);

      expect(response.body.data.priceTolerance).toBe('0.05');
      expect(response.body.data.results[1].status).toBe(ComparisonStatus.MATCH);
    });

    it('should treat every offer item as missing without invoices', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations')
        .send({ offer })
        .expect(200);

      expect(response.body.data.summary.missingItems).toBe(3);
      expect(response.body.data.invoices).toEqual([]);
    });

    it('should name unnamed documents by their position', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations')
        .send({ offer: { pages: offer.pages }, invoices: [{ pages: [] }] })
        .expect(200);

      expect(response.body.data.offer).toBe('offer');
      expect(response.body.data.invoices).toEqual(['invoice-1']);
    });

    it('should reject a request without an offer', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations')
        .send({ invoices })
        .expect(400);

      expect(response.body.error.details.validationErrors).toEqual([
        { field: 'body.offer', constraint: 'offer document is required' }
      ]);
    });

    it('should reject a negative tolerance', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations')
        .send({ offer, invoices, options: { priceTolerance: -0.1 } })
        .expect(400);

      expect(response.body.error.details.validationErrors[0].constraint).toBe('priceTolerance cannot be negative');
    });

    it('should reject more invoices than allowed', async () => {
      const tooMany = Array.from({ length: 6 }, () => invoices[0]);

      await request(app)
        .post('/api/v1/reconciliations')
        .send({ offer, invoices: tooMany })
        .expect(400);
    });
  });

  describe('POST /api/v1/reconciliations/pdf', () => {
    beforeEach(() => {
      // Pages are keyed by the uploaded bytes
      jest.spyOn(pdfDocumentService, 'loadPages').mockImplementation(async buffer => {
        const key = buffer.toString();
        if (key === 'offer-pdf') {
          return offer.pages;
        }
        if (key === 'invoice-pdf') {
          return [{ tables: [], text: 'A123 Steel bolts 10 5.00\nB456 Washers 5 26.00\nC789 Hinges 3 100.00' }];
        }
        return [];
      });
    });

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('should reconcile uploaded PDF documents', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations/pdf')
        .field('priceTolerance', '0.05')
        .attach('offer', Buffer.from('offer-pdf'), { filename: 'offer.pdf', contentType: 'application/pdf' })
        .attach('invoices', Buffer.from('invoice-pdf'), { filename: 'invoice-1.pdf', contentType: 'application/pdf' })
        .expect(200);

      const report = response.body.data;
      expect(report.offer).toBe('offer.pdf');
      expect(report.invoices).toEqual(['invoice-1.pdf']);
      expect(report.priceTolerance).toBe('0.05');
      expect(report.summary.matches).toBe(3);
      expect(report.summary.totalItems).toBe(3);
    });

    it('should use the configured tolerance when none is sent', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations/pdf')
        .attach('offer', Buffer.from('offer-pdf'), { filename: 'offer.pdf', contentType: 'application/pdf' })
        .attach('invoices', Buffer.from('invoice-pdf'), { filename: 'invoice-1.pdf', contentType: 'application/pdf' })
        .expect(200);

      expect(response.body.data.priceTolerance).toBe('0.02');
      expect(response.body.data.results[1].status).toBe(ComparisonStatus.PRICE_MISMATCH);
    });

    it('should map the text-only form field to the text strategy', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations/pdf')
        .field('extractionMethod', 'text-only')
        .attach('offer', Buffer.from('offer-pdf'), { filename: 'offer.pdf', contentType: 'application/pdf' })
        .attach('invoices', Buffer.from('invoice-pdf'), { filename: 'invoice-1.pdf', contentType: 'application/pdf' })
        .expect(200);

      const statuses = response.body.data.results.map((result: { status: string }) => result.status);
      expect(statuses).toEqual([
        ComparisonStatus.EXTRA_ITEM,
        ComparisonStatus.EXTRA_ITEM,
        ComparisonStatus.EXTRA_ITEM
      ]);
    });

    it('should treat an unreadable invoice as empty', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations/pdf')
        .attach('offer', Buffer.from('offer-pdf'), { filename: 'offer.pdf', contentType: 'application/pdf' })
        .attach('invoices', Buffer.from('broken'), { filename: 'broken.pdf', contentType: 'application/pdf' })
        .expect(200);

      expect(response.body.data.summary.missingItems).toBe(3);
    });

    it('should reject documents that are not PDFs', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations/pdf')
        .attach('offer', Buffer.from('offer-pdf'), { filename: 'offer.png', contentType: 'image/png' })
        .expect(400);

      expect(response.body.error.code).toBe(ErrorCode.INVALID_FORMAT);
    });

    it('should require the offer document', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations/pdf')
        .attach('invoices', Buffer.from('invoice-pdf'), { filename: 'invoice-1.pdf', contentType: 'application/pdf' })
        .expect(400);

      expect(response.body.error.message).toBe('Missing document: offer');
    });

    it('should reject an invalid tolerance field', async () => {
      const response = await request(app)
        .post('/api/v1/reconciliations/pdf')
        .field('priceTolerance', 'lots')
        .attach('offer', Buffer.from('offer-pdf'), { filename: 'offer.pdf', contentType: 'application/pdf' })
        .expect(400);

      expect(response.body.error.details.validationErrors[0].constraint).toBe('priceTolerance must be a number');
    });
  });

  describe('unknown routes', () => {
    it('should return 404', async () => {
      const response = await request(app)
        .get('/api/v1/unknown')
        .expect(404);

      expect(response.body.error.code).toBe(ErrorCode.NOT_FOUND);
    });
  });
});
