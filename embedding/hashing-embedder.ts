import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { Embedder } from '../core/contracts/embedding';
import { ModelUnavailableError } from '../core/errors';

const artifactSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  dimension: z.number().int().positive(),
  seed: z.number().int().nonnegative(),
  features: z.object({
    unigramWeight: z.number().nonnegative(),
    bigramWeight: z.number().nonnegative(),
    trigramWeight: z.number().nonnegative()
  }),
  stopwords: z.array(z.string())
});

export type HashingModelArtifact = z.infer<typeof artifactSchema>;

const FNV_OFFSET = 2166136261;
const FNV_PRIME = 16777619;

/**
 * In-process embedder: feature-hashes word unigrams, word bigrams and character
 * trigrams of the text into a fixed number of signed buckets, then L2-normalises.
 * The artifact is frozen once loaded, so concurrent `embed` calls share no mutable state.
 */
export class HashingEmbedder implements Embedder {
  readonly dimension: number;
  readonly modelName: string;
  private readonly seed: number;
  private readonly weights: Readonly<HashingModelArtifact['features']>;
  private readonly stopwords: ReadonlySet<string>;

  private constructor(artifact: HashingModelArtifact) {
    this.dimension = artifact.dimension;
    this.modelName = `${artifact.name}@${artifact.version}`;
    this.seed = artifact.seed;
    this.weights = Object.freeze({ ...artifact.features });
    this.stopwords = new Set(artifact.stopwords.map((word) => word.toLowerCase()));
    Object.freeze(this);
  }

  static async load(artifactPath: string): Promise<HashingEmbedder> {
    let raw: string;
    try {
      raw = await readFile(artifactPath, 'utf8');
    } catch (error) {
      throw new ModelUnavailableError(`Embedding model artifact not readable: ${artifactPath}`, { cause: error });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ModelUnavailableError(`Embedding model artifact is not valid JSON: ${artifactPath}`, { cause: error });
    }

    return HashingEmbedder.fromArtifact(parsed);
  }

  static fromArtifact(artifact: unknown): HashingEmbedder {
    const result = artifactSchema.safeParse(artifact);
    if (!result.success) {
      const reason = result.error.issues.map((issue) => `${issue.path.join('.') || 'artifact'}: ${issue.message}`).join('; ');
      throw new ModelUnavailableError(`Invalid embedding model artifact: ${reason}`);
    }
    return new HashingEmbedder(result.data);
  }

  async embed(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = tokenize(text).filter((token) => !this.stopwords.has(token));

    tokens.forEach((token, index) => {
      this.accumulate(vector, `w:${token}`, this.weights.unigramWeight);

      const padded = `#${token}#`;
      for (let offset = 0; offset + 3 <= padded.length; offset += 1) {
        this.accumulate(vector, `c:${padded.slice(offset, offset + 3)}`, this.weights.trigramWeight);
      }

      const next = tokens[index + 1];
      if (next !== undefined) {
        this.accumulate(vector, `b:${token} ${next}`, this.weights.bigramWeight);
      }
    });

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    if (norm === 0) {
      return vector;
    }

    return vector.map((value) => value / norm);
  }

  private accumulate(vector: number[], feature: string, weight: number): void {
    if (weight === 0) {
      return;
    }
    const hash = fnv1a(feature, this.seed);
    const slot = hash % this.dimension;
    const sign = (hash >>> 16) & 1 ? -1 : 1;
    vector[slot] = (vector[slot] ?? 0) + sign * weight;
  }
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

function fnv1a(input: string, seed: number): number {
  let hash = (FNV_OFFSET ^ seed) >>> 0;
  for (let index = 0; index < input.length; index += 1) {
    hash ^= input.charCodeAt(index);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}
