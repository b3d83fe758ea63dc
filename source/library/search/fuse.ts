/**
 * ResultFuser - collapses chunk-level hits into one ranked entry per book.
 *
 * A book's relevance is its best chunk's score (max, not mean), so a book
 * with one strongly matching passage outranks one with many weak ones.
 */

import {documentIdFromChunkId} from '../indexer/chunker.js';
import type {RankedBook, SimilarityHit} from './types.js';

/**
 * Chunks fetched per requested book. Several chunks of one book usually
 * land in the same neighbourhood, so the store over-fetches.
 */
export const OVER_FETCH_FACTOR = 3;

export const EXCERPT_LENGTH = 300;

/**
 * Cut text to the excerpt length, marking the cut.
 */
export function toExcerpt(text: string): string {
	return text.length > EXCERPT_LENGTH
		? text.slice(0, EXCERPT_LENGTH) + '...'
		: text;
}

/**
 * Fuse raw hits into at most `limit` books, best first.
 * Ties keep first-seen order.
 */
export function fuseResults(hits: SimilarityHit[], limit: number): RankedBook[] {
	if (hits.length === 0 || limit <= 0) {
		return [];
	}

	// Map preserves first-seen order, which the stable sort below relies on
	const groups = new Map<string, RankedBook>();

	for (const hit of hits) {
		const documentId = documentIdFromChunkId(hit.chunkId);
		const score = 1 - hit.distance;
		const matched = {chunkId: hit.chunkId, text: hit.text, score};

		const existing = groups.get(documentId);
		if (!existing) {
			const {metadata} = hit;
			groups.set(documentId, {
				documentId,
				title: metadata.title,
				author: metadata.author,
				filename: metadata.filename,
				filepath: metadata.filepath,
				format: metadata.format,
				length: metadata.length,
				relevanceScore: score,
				bestMatchExcerpt: toExcerpt(hit.text),
				allMatchedChunks: [matched],
			});
			continue;
		}

		existing.allMatchedChunks.push(matched);
		if (score > existing.relevanceScore) {
			existing.relevanceScore = score;
			existing.bestMatchExcerpt = toExcerpt(hit.text);
		}
	}

	return [...groups.values()]
		.sort((a, b) => b.relevanceScore - a.relevanceScore)
		.slice(0, limit);
}
