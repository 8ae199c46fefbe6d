export interface Embedder {
  readonly name: 'openai' | 'gemini';
  readonly model: string;
  /** One vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}
