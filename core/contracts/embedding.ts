export interface Embedder {
  readonly dimension: number;
  readonly modelName: string;
  embed(text: string): Promise<number[]>;
}
