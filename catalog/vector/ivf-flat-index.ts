import { squaredL2 } from './distance';

export interface IndexedVector {
  id: number;
  vector: readonly number[];
}

export interface IvfModel {
  centroids: number[][];
  /** id -> cluster number */
  assignments: Map<number, number>;
}

export interface ScoredCandidate<T> {
  id: number;
  distance: number;
  item: T;
}

const DEFAULT_MAX_ITERATIONS = 10;

/**
 * Lloyd's k-means over the entries. Seeds are taken at evenly spaced positions of the
 * id-sorted input, so the same catalog always trains the same centroids.
 * The returned assignments are always computed against the returned centroids.
 */
export function trainIvf(entries: readonly IndexedVector[], nlist: number, maxIterations: number = DEFAULT_MAX_ITERATIONS): IvfModel {
  if (!Number.isInteger(nlist) || nlist <= 0) {
    throw new Error('nlist must be a positive integer');
  }
  if (entries.length === 0) {
    return { centroids: [], assignments: new Map() };
  }

  const sorted = [...entries].sort((a, b) => a.id - b.id);
  const clusterCount = Math.min(nlist, sorted.length);
  let centroids: number[][] = [];
  for (let i = 0; i < clusterCount; i += 1) {
    const seed = sorted[Math.floor((i * sorted.length) / clusterCount)];
    if (seed) {
      centroids.push([...seed.vector]);
    }
  }

  let labels = sorted.map((entry) => nearestCluster(centroids, entry.vector));
  for (let iteration = 0; iteration < maxIterations; iteration += 1) {
    centroids = recomputeCentroids(sorted, labels, centroids);
    const next = sorted.map((entry) => nearestCluster(centroids, entry.vector));
    const changed = next.some((label, index) => label !== labels[index]);
    labels = next;
    if (!changed) {
      break;
    }
  }

  const assignments = new Map<number, number>();
  sorted.forEach((entry, index) => {
    assignments.set(entry.id, labels[index] ?? 0);
  });

  return { centroids, assignments };
}

export function nearestCluster(centroids: readonly (readonly number[])[], vector: readonly number[]): number {
  let best = 0;
  let bestDistance = Infinity;
  centroids.forEach((centroid, index) => {
    const distance = squaredL2(centroid, vector);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = index;
    }
  });
  return best;
}

/** Cluster numbers ordered by centroid distance to `vector`, lowest number first on ties. */
export function rankClusters(centroids: readonly (readonly number[])[], vector: readonly number[]): number[] {
  return centroids
    .map((centroid, index) => ({ index, distance: squaredL2(centroid, vector) }))
    .sort((a, b) => a.distance - b.distance || a.index - b.index)
    .map((entry) => entry.index);
}

export function compareCandidates<T>(a: ScoredCandidate<T>, b: ScoredCandidate<T>): number {
  return a.distance - b.distance || a.id - b.id;
}

/**
 * Scans clusters in `order`, `nprobe` at a time, until at least `limit` candidates have
 * been collected or every cluster was visited. `fetch` returns only candidates that
 * already satisfy the caller's predicate, so a selective filter widens the probe
 * instead of shrinking the result.
 */
export async function probeClusters<T>(options: {
  order: readonly number[];
  nprobe: number;
  limit: number;
  fetch: (clusters: number[]) => Promise<ScoredCandidate<T>[]>;
}): Promise<ScoredCandidate<T>[]> {
  const batchSize = Math.max(1, Math.floor(options.nprobe));
  const collected: ScoredCandidate<T>[] = [];
  let cursor = 0;

  while (cursor < options.order.length && collected.length < options.limit) {
    const clusters = options.order.slice(cursor, cursor + batchSize);
    cursor += clusters.length;
    collected.push(...await options.fetch(clusters));
  }

  return collected.sort(compareCandidates).slice(0, options.limit);
}

function recomputeCentroids(entries: readonly IndexedVector[], labels: readonly number[], previous: readonly number[][]): number[][] {
  const dimension = previous[0]?.length ?? 0;
  const sums = previous.map(() => new Array<number>(dimension).fill(0));
  const counts = previous.map(() => 0);

  entries.forEach((entry, index) => {
    const label = labels[index] ?? 0;
    const sum = sums[label];
    if (!sum) {
      return;
    }
    counts[label] = (counts[label] ?? 0) + 1;
    entry.vector.forEach((value, dim) => {
      sum[dim] = (sum[dim] ?? 0) + value;
    });
  });

  return sums.map((sum, cluster) => {
    const count = counts[cluster] ?? 0;
    if (count === 0) {
      return [...(previous[cluster] ?? sum)];
    }
    return sum.map((value) => value / count);
  });
}

/** In-memory inverted-file index: centroids plus the entries filed under each one. */
export class IvfFlatIndex<T extends IndexedVector> {
  private constructor(
    readonly centroids: readonly (readonly number[])[],
    private readonly lists: readonly (readonly T[])[]
  ) {}

  static build<T extends IndexedVector>(entries: readonly T[], nlist: number): IvfFlatIndex<T> {
    const model = trainIvf(entries, nlist);
    const lists: T[][] = model.centroids.map(() => []);
    for (const entry of entries) {
      const cluster = model.assignments.get(entry.id) ?? 0;
      lists[cluster]?.push(entry);
    }
    return new IvfFlatIndex(
      Object.freeze(model.centroids.map((centroid) => Object.freeze(centroid))),
      Object.freeze(lists.map((list) => Object.freeze(list)))
    );
  }

  get clusterCount(): number {
    return this.centroids.length;
  }

  rank(vector: readonly number[]): number[] {
    return rankClusters(this.centroids, vector);
  }

  list(cluster: number): readonly T[] {
    return this.lists[cluster] ?? [];
  }
}
