import type {BookFormat} from '../indexer/types.js';

/**
 * Metadata stored with every chunk of a book.
 */
export interface ChunkMetadata {
	documentId: string;
	title: string;
	author: string;
	filename: string;
	filepath: string;
	format: BookFormat;
	/** Length of the whole book's text */
	length: number;
	chunkIndex: number;
	totalChunks: number;
}

/**
 * One raw nearest-neighbour hit from the store.
 */
export interface SimilarityHit {
	chunkId: string;
	metadata: ChunkMetadata;
	text: string;
	/** Cosine distance; lower is closer */
	distance: number;
}

/**
 * A matched chunk kept on a ranked book.
 */
export interface MatchedChunk {
	chunkId: string;
	text: string;
	score: number;
}

/**
 * One book in a search result list.
 */
export interface RankedBook {
	documentId: string;
	title: string;
	author: string;
	filename: string;
	filepath: string;
	format: BookFormat;
	length: number;
	/** Best chunk score, 1 - distance */
	relevanceScore: number;
	/** Best chunk's text, cut to 300 characters */
	bestMatchExcerpt: string;
	/** Every matched chunk of this book, in hit order */
	allMatchedChunks: MatchedChunk[];
}

/**
 * Search results with timing information.
 */
export interface SearchResults {
	query: string;
	books: RankedBook[];
	elapsedMs: number;
}
