import { ConfigError, loadConfig } from '../../config/app-config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 8002,
      host: '0.0.0.0',
      logLevel: 'info',
      databaseUrl: undefined,
      catalogFile: 'data/products.json',
      embedding: { provider: 'local', modelPath: 'models/catalog-hash-v1.json', dimension: 384, timeoutMs: 5000 },
      storeTimeoutMs: 5000,
      index: { nlist: 128, nprobe: 10 },
      ingestBatchSize: 64,
      searchServerUrl: 'http://127.0.0.1:8002'
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({ PORT: '9100', INDEX_NPROBE: '4', STORE_TIMEOUT_MS: '250' });

    expect(config.port).toBe(9100);
    expect(config.index.nprobe).toBe(4);
    expect(config.storeTimeoutMs).toBe(250);
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ PORT: '', DATABASE_URL: '  ', LOG_LEVEL: '' });

    expect(config.port).toBe(8002);
    expect(config.databaseUrl).toBeUndefined();
    expect(config.logLevel).toBe('info');
  });

  it('names the variable that failed validation', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('Invalid configuration: PORT: Expected number, received nan');
    expect(() => loadConfig({ PORT: '70000' })).toThrow(
      'Invalid configuration: PORT: Number must be less than or equal to 65535'
    );
    expect(() => loadConfig({ INDEX_NLIST: '0' })).toThrow(ConfigError);
  });

  it('requires endpoint settings for the http embedding provider', () => {
    expect(() => loadConfig({ EMBEDDING_PROVIDER: 'http', EMBEDDING_API_KEY: 'test-secret', EMBEDDING_MODEL: 'embed-test' }))
      .toThrow('Invalid configuration: EMBEDDING_API_URL: required when EMBEDDING_PROVIDER=http');
  });

  it('builds an http embedding config', () => {
    const config = loadConfig({
      EMBEDDING_PROVIDER: 'http',
      EMBEDDING_API_URL: 'https://embeddings.example.test/v1',
      EMBEDDING_API_KEY: 'test-secret',
      EMBEDDING_MODEL: 'embed-test',
      EMBEDDING_DIM: '768'
    });

    expect(config.embedding).toEqual({
      provider: 'http',
      apiUrl: 'https://embeddings.example.test/v1',
      apiKey: 'test-secret',
      model: 'embed-test',
      dimension: 768,
      timeoutMs: 5000
    });
  });
});
