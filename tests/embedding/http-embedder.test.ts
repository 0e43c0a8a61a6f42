import { HttpEmbedder } from '../../embedding/http-embedder';
import { ModelUnavailableError, SchemaMismatchError } from '../../core/errors';

const fetchMock = jest.fn();

beforeEach(() => {
  fetchMock.mockReset();
  (global as any).fetch = fetchMock;
});

const options = {
  baseUrl: 'https://embeddings.example.test/v1/',
  apiKey: 'test-secret',
  model: 'test-embedding-model',
  dimension: 3
};

function okResponse(body: unknown) {
  return { ok: true, status: 200, json: async () => body };
}

describe('HttpEmbedder', () => {
  it('posts the text to the embeddings endpoint', async () => {
    fetchMock.mockResolvedValue(okResponse({ data: [{ embedding: [0.1, 0.2, 0.3] }] }));
    const embedder = new HttpEmbedder(options);

    const vector = await embedder.embed('trail shoes');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://embeddings.example.test/v1/embeddings');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
    expect(JSON.parse(init.body)).toEqual({ model: 'test-embedding-model', input: 'trail shoes' });
  });

  it('marks server errors as retryable', async () => {
    fetchMock.mockResolvedValue({ ok: false, status: 503, json: async () => ({}) });
    const embedder = new HttpEmbedder(options);

    const attempt = embedder.embed('trail shoes');

    await expect(attempt).rejects.toThrow('Embedding API error: 503');
    await expect(attempt).rejects.toMatchObject({ retryable: true });
  });

  it('does not retry client errors', async () => {
    fetchMock.mockResolvedValue({ ok: false, status: 401, json: async () => ({}) });
    const embedder = new HttpEmbedder(options);

    await expect(embedder.embed('trail shoes')).rejects.toMatchObject({ code: 'MODEL_UNAVAILABLE', retryable: false });
  });

  it('wraps transport failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const embedder = new HttpEmbedder(options);

    const attempt = embedder.embed('trail shoes');

    await expect(attempt).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(attempt).rejects.toThrow('Embedding request request failed');
  });

  it('rejects responses without a vector', async () => {
    fetchMock.mockResolvedValue(okResponse({ data: [] }));
    const embedder = new HttpEmbedder(options);

    await expect(embedder.embed('trail shoes')).rejects.toThrow('Embedding response missing vector');
  });

  it('treats a body that is not JSON as a retryable outage', async () => {
    fetchMock.mockResolvedValue({
      ok: true,
      status: 200,
      json: async () => {
        throw new SyntaxError('Unexpected token < in JSON at position 0');
      }
    });
    const embedder = new HttpEmbedder(options);

    const attempt = embedder.embed('trail shoes');

    await expect(attempt).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(attempt).rejects.toThrow('Embedding response is not valid JSON');
    await expect(attempt).rejects.toMatchObject({ code: 'MODEL_UNAVAILABLE', retryable: true });
  });

  it('rejects vectors of the wrong dimension', async () => {
    fetchMock.mockResolvedValue(okResponse({ data: [{ embedding: [0.1, 0.2] }] }));
    const embedder = new HttpEmbedder(options);

    await expect(embedder.embed('trail shoes')).rejects.toBeInstanceOf(SchemaMismatchError);
  });

  it('probes the endpoint on create', async () => {
    fetchMock.mockResolvedValue(okResponse({ data: [{ embedding: [1, 0, 0] }] }));

    const embedder = await HttpEmbedder.create(options);

    expect(embedder.dimension).toBe(3);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('fails create with a non-retryable error when the endpoint is down', async () => {
    fetchMock.mockResolvedValue({ ok: false, status: 502, json: async () => ({}) });

    const attempt = HttpEmbedder.create(options);

    await expect(attempt).rejects.toThrow('Embedding model test-embedding-model unavailable at startup: Embedding API error: 502');
    await expect(attempt).rejects.toMatchObject({ retryable: false });
  });

  it('validates its options', () => {
    expect(() => new HttpEmbedder({ ...options, apiKey: '' })).toThrow('Embedding API key required');
    expect(() => new HttpEmbedder({ ...options, baseUrl: 'ftp://example.test' })).toThrow('Invalid embedding API URL: ftp://example.test');
  });
});
