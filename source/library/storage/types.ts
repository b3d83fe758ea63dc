import {z} from 'zod';
import {chunkId} from '../indexer/chunker.js';
import type {BookFormat, Chunk, Document} from '../indexer/types.js';
import type {SimilarityHit} from '../search/types.js';

export const bookFormatSchema = z.enum(['pdf', 'epub', 'fb2']);

/**
 * Row shape of the book_chunks table, minus the vector column.
 * Rows read back from LanceDB are validated against this.
 */
export const bookChunkRowSchema = z.object({
	id: z.string(),
	text: z.string(),
	document_id: z.string(),
	chunk_index: z.number(),
	total_chunks: z.number(),
	title: z.string(),
	author: z.string(),
	filename: z.string(),
	filepath: z.string(),
	format: bookFormatSchema,
	length: z.number(),
	fingerprint: z.string(),
});

export type BookChunkRow = z.infer<typeof bookChunkRowSchema> & {
	vector: number[];
};

const searchRowSchema = bookChunkRowSchema.extend({
	_distance: z.number(),
});

/**
 * Metadata columns needed to list books (everything but text and vector).
 */
export const BOOK_COLUMNS = [
	'document_id',
	'total_chunks',
	'title',
	'author',
	'filename',
	'filepath',
	'format',
	'length',
] as const;

const bookRowSchema = bookChunkRowSchema.pick({
	document_id: true,
	total_chunks: true,
	title: true,
	author: true,
	filename: true,
	filepath: true,
	format: true,
	length: true,
});

/**
 * One indexed book, as listed by the store.
 */
export interface BookSummary {
	documentId: string;
	title: string;
	author: string;
	filename: string;
	filepath: string;
	format: BookFormat;
	length: number;
	/** Chunks stored for this book */
	chunkCount: number;
	/** Chunks the book was split into; differs from chunkCount after an interrupted run */
	totalChunks: number;
}

/**
 * Store-wide counters.
 */
export interface StoreStats {
	tableName: string;
	chunkCount: number;
	bookCount: number;
}

/**
 * Build a table row for one chunk of a document.
 */
export function chunkToRow(
	document: Document,
	chunk: Chunk,
	vector: number[],
	fingerprint: string,
): BookChunkRow {
	return {
		id: chunkId(chunk.documentId, chunk.sequenceIndex),
		vector,
		text: chunk.text,
		document_id: chunk.documentId,
		chunk_index: chunk.sequenceIndex,
		total_chunks: chunk.totalChunks,
		title: document.title,
		author: document.author,
		filename: document.filename,
		filepath: document.filepath,
		format: document.format,
		length: document.length,
		fingerprint,
	};
}

/**
 * Convert a vector search row to a similarity hit.
 */
export function rowToHit(row: unknown): SimilarityHit {
	const parsed = searchRowSchema.parse(row);
	return {
		chunkId: parsed.id,
		text: parsed.text,
		distance: parsed._distance,
		metadata: {
			documentId: parsed.document_id,
			title: parsed.title,
			author: parsed.author,
			filename: parsed.filename,
			filepath: parsed.filepath,
			format: parsed.format,
			length: parsed.length,
			chunkIndex: parsed.chunk_index,
			totalChunks: parsed.total_chunks,
		},
	};
}

/**
 * Collapse metadata rows (one per chunk) into one summary per book.
 */
export function rowsToBooks(rows: unknown[]): BookSummary[] {
	const books = new Map<string, BookSummary>();

	for (const row of rows) {
		const parsed = bookRowSchema.parse(row);
		const existing = books.get(parsed.document_id);
		if (existing) {
			existing.chunkCount += 1;
			continue;
		}
		books.set(parsed.document_id, {
			documentId: parsed.document_id,
			title: parsed.title,
			author: parsed.author,
			filename: parsed.filename,
			filepath: parsed.filepath,
			format: parsed.format,
			length: parsed.length,
			chunkCount: 1,
			totalChunks: parsed.total_chunks,
		});
	}

	return [...books.values()].sort(
		(a, b) =>
			a.title.localeCompare(b.title) || a.filepath.localeCompare(b.filepath),
	);
}
