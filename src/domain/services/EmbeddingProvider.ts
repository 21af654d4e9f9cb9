/**
 * Turns text into a vector of fixed length.
 *
 * `dimension` is fixed for the lifetime of the process: collections are created
 * with it and reject vectors of any other size.
 * Implementations throw EmbeddingError on provider failure.
 */
export interface EmbeddingProvider {
  readonly dimension: number;
  embed(text: string): Promise<number[]>;
}

export async function embedAll(provider: EmbeddingProvider, texts: string[]): Promise<number[][]> {
  const vectors: number[][] = [];
  for (const text of texts) {
    vectors.push(await provider.embed(text));
  }
  return vectors;
}
