/**
 * Embedding provider interface for generating vector embeddings.
 */
export interface EmbeddingProvider {
	/** Number of dimensions in the embedding vectors */
	readonly dimensions: number;

	/**
	 * Initialize the provider (load model, etc.)
	 * Called lazily by embed() and embedSingle() when omitted.
	 */
	initialize(): Promise<void>;

	/**
	 * Generate embeddings for multiple texts, one vector per text.
	 */
	embed(texts: string[]): Promise<number[][]>;

	/**
	 * Generate embedding for a single text (query embedding).
	 */
	embedSingle(text: string): Promise<number[]>;

	/**
	 * Close the provider and free resources.
	 */
	close(): void;
}
