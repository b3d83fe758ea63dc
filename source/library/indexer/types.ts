/**
 * Book formats understood by the extractors.
 */
export type BookFormat = 'pdf' | 'epub' | 'fb2';

/**
 * A book's extracted text and metadata.
 * Created by an extractor, consumed once by the chunker, never mutated.
 */
export type Document = Readonly<{
	/** MD5 hex of the absolute source path */
	id: string;
	title: string;
	author: string;
	format: BookFormat;
	filename: string;
	/** Absolute source path */
	filepath: string;
	/** Whitespace-normalized text */
	rawText: string;
	/** Length of rawText in characters */
	length: number;
}>;

/**
 * A contiguous window of a document's text.
 * Identity is (documentId, sequenceIndex), rendered by chunkId().
 */
export type Chunk = Readonly<{
	documentId: string;
	sequenceIndex: number;
	totalChunks: number;
	text: string;
}>;

/**
 * Per-run outcome counters.
 * `skipped` is reserved: already-indexed documents count as success.
 */
export interface IndexStats {
	success: number;
	failed: number;
	skipped: number;
}

/**
 * Progress callback for indexing operations.
 */
export type ProgressCallback = (
	current: number,
	total: number,
	file: string,
) => void;

/**
 * Create empty index stats.
 */
export function createEmptyIndexStats(): IndexStats {
	return {success: 0, failed: 0, skipped: 0};
}
