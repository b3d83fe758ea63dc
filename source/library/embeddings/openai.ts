/**
 * Embedding provider for OpenAI's embeddings API.
 *
 * Speaks the plain `POST {baseUrl}/embeddings` protocol, so any server that
 * implements it (a self-hosted model server, a proxy) works through
 * `embeddingBaseUrl`. Defaults to text-embedding-3-small at 1536 dimensions.
 */

import {z} from 'zod';
import {EmbeddingError} from '../errors.js';
import type {EmbeddingProvider} from './types.js';

export const OPENAI_API_BASE = 'https://api.openai.com/v1';
export const OPENAI_DEFAULT_MODEL = 'text-embedding-3-small';
export const OPENAI_DEFAULT_DIMENSIONS = 1536;

// OpenAI limits: 8,191 tokens/text, 300,000 tokens/batch, 2,048 texts/batch.
// Chunks are ~1000 characters (~250 tokens), so 256 texts stay far below.
const BATCH_SIZE = 256;

const CONCURRENCY = 3; // Max concurrent API requests
const MAX_RETRIES = 8; // Max retry attempts on rate limit
const INITIAL_BACKOFF_MS = 1000;
const MAX_BACKOFF_MS = 60000;

const embeddingResponseSchema = z.object({
	data: z.array(
		z.object({
			embedding: z.array(z.number()),
			index: z.number().int().nonnegative(),
		}),
	),
});

const errorBodySchema = z.object({
	error: z.object({message: z.string()}),
});

function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

export interface OpenAIEmbeddingOptions {
	/** Sent as a bearer token; servers that need none accept requests without */
	apiKey?: string;
	baseUrl?: string;
	model?: string;
	dimensions?: number;
	/** Retries on 429 before giving up */
	maxRetries?: number;
	/** First retry delay; doubles per attempt up to 60s */
	initialBackoffMs?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;
	private readonly apiKey: string;
	private readonly baseUrl: string;
	private readonly model: string;
	private readonly maxRetries: number;
	private readonly initialBackoffMs: number;

	constructor(options: OpenAIEmbeddingOptions = {}) {
		// Trim the key to remove any accidental whitespace
		this.apiKey = (options.apiKey ?? '').trim();
		this.baseUrl = (options.baseUrl ?? OPENAI_API_BASE).replace(/\/+$/, '');
		this.model = options.model ?? OPENAI_DEFAULT_MODEL;
		this.dimensions = options.dimensions ?? OPENAI_DEFAULT_DIMENSIONS;
		this.maxRetries = options.maxRetries ?? MAX_RETRIES;
		this.initialBackoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
	}

	async initialize(): Promise<void> {
		// Stateless: every call is a request
	}

	async embed(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		const batches: string[][] = [];
		for (let i = 0; i < texts.length; i += BATCH_SIZE) {
			batches.push(texts.slice(i, i + BATCH_SIZE));
		}

		const results: number[][] = [];
		for (let i = 0; i < batches.length; i += CONCURRENCY) {
			const group = batches.slice(i, i + CONCURRENCY);
			// Promise.all preserves batch order
			const groupResults = await Promise.all(
				group.map(batch => this.embedBatchWithRetry(batch)),
			);
			for (const result of groupResults) {
				results.push(...result);
			}
		}

		return results;
	}

	async embedSingle(text: string): Promise<number[]> {
		const [vector] = await this.embed([text]);
		if (!vector) {
			throw new EmbeddingError('Embedding service returned no vector');
		}
		return vector;
	}

	close(): void {
		// No connection to release
	}

	/**
	 * Embed a batch with exponential backoff on rate limiting (HTTP 429).
	 */
	private async embedBatchWithRetry(batch: string[]): Promise<number[][]> {
		let attempt = 0;
		let backoffMs = this.initialBackoffMs;

		for (;;) {
			try {
				return await this.embedBatch(batch);
			} catch (error) {
				const rateLimited =
					error instanceof EmbeddingError && error.status === 429;
				if (!rateLimited || attempt >= this.maxRetries) {
					throw error;
				}
				attempt++;
				await sleep(backoffMs);
				backoffMs = Math.min(backoffMs * 2, MAX_BACKOFF_MS);
			}
		}
	}

	private async embedBatch(texts: string[]): Promise<number[][]> {
		const headers: Record<string, string> = {'Content-Type': 'application/json'};
		if (this.apiKey) {
			headers['Authorization'] = `Bearer ${this.apiKey}`;
		}

		let response: Response;
		try {
			response = await fetch(`${this.baseUrl}/embeddings`, {
				method: 'POST',
				headers,
				body: JSON.stringify({
					model: this.model,
					input: texts,
					// Only the text-embedding-3 family can shorten its vectors
					...(this.model.startsWith('text-embedding-3')
						? {dimensions: this.dimensions}
						: {}),
				}),
			});
		} catch (error) {
			throw new EmbeddingError(
				`Cannot reach embedding service at ${this.baseUrl}: ${
					error instanceof Error ? error.message : String(error)
				}`,
				undefined,
				{cause: error},
			);
		}

		if (!response.ok) {
			throw await this.responseError(response);
		}

		const parsed = embeddingResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new EmbeddingError(
				`Unexpected response from ${this.baseUrl}/embeddings`,
				response.status,
			);
		}

		// Sort by index to ensure correct order
		const vectors = [...parsed.data.data]
			.sort((a, b) => a.index - b.index)
			.map(d => d.embedding);

		if (vectors.length !== texts.length) {
			throw new EmbeddingError(
				`Embedding service returned ${vectors.length} vectors for ${texts.length} texts`,
			);
		}
		const wrongSize = vectors.find(v => v.length !== this.dimensions);
		if (wrongSize) {
			throw new EmbeddingError(
				`Model ${this.model} returned ${wrongSize.length} dimensions, expected ${this.dimensions}`,
			);
		}
		return vectors;
	}

	private async responseError(response: Response): Promise<EmbeddingError> {
		const body = await response.text();
		let detail = body;
		try {
			const parsed = errorBodySchema.safeParse(JSON.parse(body));
			if (parsed.success) {
				detail = parsed.data.error.message;
			}
		} catch {
			// Not JSON: keep the raw body
		}

		if (response.status === 401) {
			return new EmbeddingError(
				`Embedding service rejected the API key (401). Set BOOKSHELF_EMBEDDING_API_KEY. ${detail}`,
				401,
			);
		}
		return new EmbeddingError(
			`Embedding service error (${response.status}): ${detail}`,
			response.status,
		);
	}
}
