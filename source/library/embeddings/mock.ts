/**
 * Mock embedding provider for testing.
 *
 * Generates deterministic hash-based embeddings that:
 * - Run instantly (no model loading)
 * - Are deterministic (same input = same output)
 * - Are normalized to unit length
 *
 * Identical texts embed identically, so a query equal to a chunk's text
 * finds that chunk at distance ~0. Nothing else about similarity is meaningful.
 */

import type {EmbeddingProvider} from './types.js';
import {DEFAULT_EMBEDDING_DIMENSIONS} from '../constants.js';

export class MockEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;

	constructor(dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS) {
		this.dimensions = dimensions;
	}

	async initialize(): Promise<void> {
		// Nothing to load
	}

	async embed(texts: string[]): Promise<number[][]> {
		return texts.map(t => this.hashToVector(t));
	}

	async embedSingle(text: string): Promise<number[]> {
		return this.hashToVector(text);
	}

	/**
	 * Convert text to a deterministic unit vector.
	 */
	private hashToVector(text: string): number[] {
		const seed = this.hash(text);

		const vec = Array.from({length: this.dimensions}, (_, i) => {
			// LCG-like pseudo-random based on seed and index
			const state =
				(((seed * (i + 1) * 1103515245 + 12345) >>> 0) % 0x7fffffff) /
				0x7fffffff;
			return state * 2 - 1; // Range [-1, 1]
		});

		const magnitude = Math.sqrt(vec.reduce((sum, v) => sum + v * v, 0));
		return vec.map(v => (magnitude > 0 ? v / magnitude : 0));
	}

	/**
	 * Simple string hash function (djb2).
	 */
	private hash(str: string): number {
		let h = 5381;
		for (let i = 0; i < str.length; i++) {
			h = (h * 33) ^ str.charCodeAt(i);
			h = h >>> 0;
		}
		return h;
	}

	close(): void {
		// Nothing to close
	}
}
