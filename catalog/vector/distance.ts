export function squaredL2(vectorA: readonly number[], vectorB: readonly number[]): number {
  if (vectorA.length !== vectorB.length) {
    throw new Error('Vector length mismatch');
  }

  let sum = 0;
  for (let i = 0; i < vectorA.length; i += 1) {
    const diff = (vectorA[i] ?? 0) - (vectorB[i] ?? 0);
    sum += diff * diff;
  }
  return sum;
}

export function validateVector(vector: readonly number[]): void {
  if (!vector.length) {
    throw new Error('Vector cannot be empty');
  }

  if (vector.some((value) => !Number.isFinite(value))) {
    throw new Error('Vector contains invalid values');
  }
}
