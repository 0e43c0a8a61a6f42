import { createEmbedder } from '../../embedding/create-embedder';
import { HashingEmbedder } from '../../embedding/hashing-embedder';
import { HttpEmbedder } from '../../embedding/http-embedder';
import { MODEL_FILE } from '../helpers/fixtures';

const fetchMock = jest.fn();

beforeEach(() => {
  fetchMock.mockReset();
  (global as any).fetch = fetchMock;
});

describe('createEmbedder', () => {
  it('loads the local hashing model', async () => {
    const embedder = await createEmbedder({ provider: 'local', modelPath: MODEL_FILE, dimension: 384, timeoutMs: 5000 });

    expect(embedder).toBeInstanceOf(HashingEmbedder);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('creates and probes an http embedder', async () => {
    fetchMock.mockResolvedValue({ ok: true, status: 200, json: async () => ({ data: [{ embedding: [0.5, 0.5] }] }) });

    const embedder = await createEmbedder({
      provider: 'http',
      apiUrl: 'https://embeddings.example.test/v1',
      apiKey: 'test-secret',
      model: 'embed-test',
      dimension: 2,
      timeoutMs: 1000
    });

    expect(embedder).toBeInstanceOf(HttpEmbedder);
    expect(embedder.modelName).toBe('embed-test');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
