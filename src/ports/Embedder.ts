export type EmbeddingVector = readonly number[];

export interface EmbeddingProvider {
  readonly name: string;
  embed(text: string): Promise<EmbeddingVector>;
  /** One vector per input, in input order. */
  embedBatch(texts: readonly string[]): Promise<EmbeddingVector[]>;
  close(): Promise<void>;
}
