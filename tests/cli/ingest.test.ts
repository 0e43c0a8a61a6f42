import { formatReport, main } from '../../cli/ingest';

describe('ingest CLI', () => {
  describe('formatReport', () => {
    it('summarises a published run', () => {
      expect(formatReport({
        status: 'published',
        source: 'data/products.json',
        loaded: 16,
        succeeded: Array.from({ length: 16 }, (_, i) => i + 1),
        failed: [],
        index: { records: 16, clusters: 16, builtAt: 0 },
        durationMs: 42
      })).toBe([
        'Source: data/products.json',
        'Status: published',
        'Loaded: 16',
        'Succeeded: 16',
        'Failed: 0',
        'Index: 16 records in 16 clusters',
        'Duration: 42ms'
      ].join('\n'));
    });

    it('lists each failure with its stage', () => {
      expect(formatReport({
        status: 'failed',
        source: 'static',
        loaded: 2,
        succeeded: [1],
        failed: [
          { productId: 2, stage: 'embedding', error: 'Embedding API error: 503' },
          { productId: null, stage: 'index', error: 'disk full' }
        ],
        durationMs: 7
      })).toBe([
        'Source: static',
        'Status: failed',
        'Loaded: 2',
        'Succeeded: 1',
        'Failed: 2',
        '  - [embedding] 2: Embedding API error: 503',
        '  - [index] -: disk full',
        'Duration: 7ms'
      ].join('\n'));
    });
  });

  describe('main', () => {
    const originalEnv = { ...process.env };

    afterEach(() => {
      process.env = { ...originalEnv };
    });

    it('exits with 1 when DATABASE_URL is missing', async () => {
      delete process.env.DATABASE_URL;
      const errorSpy = jest.spyOn(console, 'error').mockImplementation();

      await expect(main([])).resolves.toBe(1);
      expect(errorSpy).toHaveBeenCalledWith(
        '[ERROR] DATABASE_URL is required. Without it the server loads CATALOG_FILE into memory at startup.'
      );

      errorSpy.mockRestore();
    });
  });
});
