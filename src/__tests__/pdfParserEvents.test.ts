import { EventEmitter } from 'events';
import { config } from '../config/config';
import { pdfDocumentService } from '../services/pdfDocumentService';

const mockParsers: EventEmitter[] = [];

// Stand-in parser: the buffer content picks the event it emits
jest.mock('pdf2json', () => {
  const { EventEmitter: Emitter } = jest.requireActual<typeof import('events')>('events');

  class MockPdfParser extends Emitter {
    constructor() {
      super();
      mockParsers.push(this);
    }

    parseBuffer(buffer: Buffer): void {
      const mode = buffer.toString();
      if (mode === 'ready') {
        this.emit('pdfParser_dataReady', {
          Pages: [{
            Texts: [
              { x: 1, y: 1, R: [{ T: 'A123' }] },
              { x: 5, y: 1, R: [{ T: 'Steel%20bolts' }] },
              { x: 12, y: 1, R: [{ T: '10' }] },
              { x: 15, y: 1, R: [{ T: '2.50' }] }
            ]
          }]
        });
      } else if (mode === 'error') {
        this.emit('pdfParser_dataError', new Error('Invalid PDF structure'));
      } else if (mode === 'wrapped-error') {
        this.emit('pdfParser_dataError', { parserError: new Error('Invalid XRef stream') });
      }
      // any other content never finishes
    }
  }

  return { __esModule: true, default: MockPdfParser };
});

describe('PDF parser events', () => {
  const defaultTimeout = config.pdf.parseTimeoutMs;

  afterEach(() => {
    config.pdf.parseTimeoutMs = defaultTimeout;
  });

  it('should build pages from the parsed text runs', async () => {
    const pages = await pdfDocumentService.loadPages(Buffer.from('ready'));

    expect(pages).toEqual([{ tables: [], text: 'A123 Steel bolts 10 2.50' }]);
  });

  it('should resolve no pages when the parser reports an error', async () => {
    await expect(pdfDocumentService.loadPages(Buffer.from('error'))).resolves.toEqual([]);
  });

  it('should resolve no pages when the parser wraps its error', async () => {
    await expect(pdfDocumentService.loadPages(Buffer.from('wrapped-error'))).resolves.toEqual([]);
  });

  it('should give up after the parse timeout and detach from the parser', async () => {
    config.pdf.parseTimeoutMs = 20;

    const pages = await pdfDocumentService.loadPages(Buffer.from('hang'));
    const parser = mockParsers[mockParsers.length - 1];

    expect(pages).toEqual([]);
    expect(parser.listenerCount('pdfParser_dataReady')).toBe(0);
    expect(parser.listenerCount('pdfParser_dataError')).toBe(0);
  });
});
