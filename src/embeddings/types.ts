export interface EmbeddingsProvider {
  embed(text: string): Promise<number[]>;
  readonly dimensions: number;
  /** Short label reported by get_system_info */
  readonly name: string;
}
