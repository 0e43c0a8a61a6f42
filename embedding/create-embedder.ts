import type { EmbeddingConfig } from '../config/app-config';
import type { Embedder } from '../core/contracts/embedding';
import { HashingEmbedder } from './hashing-embedder';
import { HttpEmbedder } from './http-embedder';

export async function createEmbedder(config: EmbeddingConfig): Promise<Embedder> {
  if (config.provider === 'http') {
    return HttpEmbedder.create({
      baseUrl: config.apiUrl,
      apiKey: config.apiKey,
      model: config.model,
      dimension: config.dimension,
      timeoutMs: config.timeoutMs
    });
  }
  return HashingEmbedder.load(config.modelPath);
}
