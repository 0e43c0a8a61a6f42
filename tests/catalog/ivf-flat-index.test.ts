import { IvfFlatIndex, probeClusters, rankClusters, trainIvf, type ScoredCandidate } from '../../catalog/vector/ivf-flat-index';
import { squaredL2, validateVector } from '../../catalog/vector/distance';

describe('squaredL2', () => {
  it('sums squared differences', () => {
    expect(squaredL2([0, 0], [3, 4])).toBe(25);
  });

  it('rejects vectors of different length', () => {
    expect(() => squaredL2([1], [1, 2])).toThrow('Vector length mismatch');
  });

  it('validates vectors', () => {
    expect(() => validateVector([])).toThrow('Vector cannot be empty');
    expect(() => validateVector([1, Number.NaN])).toThrow('Vector contains invalid values');
  });
});

describe('trainIvf', () => {
  it('returns an empty model for an empty catalog', () => {
    expect(trainIvf([], 4)).toEqual({ centroids: [], assignments: new Map() });
  });

  it('rejects a non-positive cluster count', () => {
    expect(() => trainIvf([{ id: 1, vector: [0] }], 0)).toThrow('nlist must be a positive integer');
  });

  it('clamps the cluster count to the number of records', () => {
    const model = trainIvf([
      { id: 3, vector: [5, 5] },
      { id: 1, vector: [0, 0] },
      { id: 2, vector: [0, 9] }
    ], 128);

    expect(model.centroids).toEqual([[0, 0], [0, 9], [5, 5]]);
    expect(model.assignments).toEqual(new Map([[1, 0], [2, 1], [3, 2]]));
  });

  it('separates well-apart groups', () => {
    const model = trainIvf([
      { id: 1, vector: [0, 0] },
      { id: 2, vector: [0, 1] },
      { id: 3, vector: [10, 10] },
      { id: 4, vector: [10, 11] }
    ], 2);

    expect(model.centroids).toEqual([[0, 0.5], [10, 10.5]]);
    expect(model.assignments).toEqual(new Map([[1, 0], [2, 0], [3, 1], [4, 1]]));
  });

  it('trains the same model for the same input in any order', () => {
    const entries = [
      { id: 4, vector: [1, 3] },
      { id: 2, vector: [2, 2] },
      { id: 9, vector: [8, 1] },
      { id: 5, vector: [7, 0] }
    ];

    expect(trainIvf(entries, 2)).toEqual(trainIvf([...entries].reverse(), 2));
  });
});

describe('rankClusters', () => {
  it('orders clusters by centroid distance', () => {
    expect(rankClusters([[0, 0], [5, 5], [1, 1]], [1, 1])).toEqual([2, 0, 1]);
  });

  it('breaks ties by cluster number', () => {
    expect(rankClusters([[1, 0], [0, 1]], [0, 0])).toEqual([0, 1]);
  });
});

describe('probeClusters', () => {
  const candidate = (id: number, distance: number): ScoredCandidate<string> => ({ id, distance, item: `p${id}` });

  it('widens the probe until enough matching candidates are found', async () => {
    const byCluster: Record<number, ScoredCandidate<string>[]> = {
      0: [],
      1: [candidate(5, 3)],
      2: [candidate(7, 1)]
    };
    const fetch = jest.fn(async (clusters: number[]) => clusters.flatMap((cluster) => byCluster[cluster] ?? []));

    const result = await probeClusters({ order: [0, 1, 2], nprobe: 1, limit: 2, fetch });

    expect(fetch.mock.calls).toEqual([[[0]], [[1]], [[2]]]);
    expect(result.map((entry) => entry.id)).toEqual([7, 5]);
  });

  it('stops once the first batch fills the limit', async () => {
    const fetch = jest.fn(async () => [candidate(2, 0.5), candidate(1, 0.5), candidate(3, 0.1)]);

    const result = await probeClusters({ order: [0, 1, 2, 3], nprobe: 2, limit: 2, fetch });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith([0, 1]);
    expect(result.map((entry) => entry.id)).toEqual([3, 1]);
  });

  it('returns fewer candidates when every cluster is exhausted', async () => {
    const fetch = jest.fn(async (clusters: number[]) => clusters.map((cluster) => candidate(cluster + 10, cluster)));

    const result = await probeClusters({ order: [1, 0], nprobe: 10, limit: 5, fetch });

    expect(result.map((entry) => entry.id)).toEqual([10, 11]);
  });
});

describe('IvfFlatIndex', () => {
  it('files every entry under its assigned cluster', () => {
    const index = IvfFlatIndex.build([
      { id: 1, vector: [0, 0] },
      { id: 2, vector: [0, 1] },
      { id: 3, vector: [10, 10] }
    ], 2);

    expect(index.clusterCount).toBe(2);
    expect(index.list(0).map((entry) => entry.id)).toEqual([1, 2]);
    expect(index.list(1).map((entry) => entry.id)).toEqual([3]);
    expect(index.list(7)).toEqual([]);
    expect(index.rank([9, 9])).toEqual([1, 0]);
  });
});
