/**
 * Chunker - splits a document's text into overlapping windows.
 *
 * Windows prefer to end on a sentence boundary (". ", "? ", "! ") when one
 * falls in their second half, so chunks rarely cut a sentence in two.
 * Consecutive chunks share up to `overlap` characters of context.
 */

import type {Chunk, Document} from './types.js';

export interface ChunkOptions {
	/** Maximum characters per chunk (default: 1000) */
	chunkSize?: number;
	/** Characters repeated from the end of the previous chunk (default: 200) */
	overlap?: number;
}

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

const SENTENCE_BOUNDARIES = ['. ', '? ', '! '] as const;
const CHUNK_ID_SUFFIX = /_chunk_\d+$/;

/**
 * Index of the last sentence boundary in `window`, or -1.
 */
function lastSentenceBoundary(window: string): number {
	return Math.max(...SENTENCE_BOUNDARIES.map(mark => window.lastIndexOf(mark)));
}

/**
 * Split text into overlapping chunks.
 *
 * Single pass and finite: every step advances the window start by at least
 * one character. Empty text yields nothing; text no longer than `chunkSize`
 * yields exactly one chunk (trimmed).
 */
export function* chunkText(
	text: string,
	chunkSize: number = DEFAULT_CHUNK_SIZE,
	overlap: number = DEFAULT_CHUNK_OVERLAP,
): Generator<string> {
	if (chunkSize < 1) {
		throw new RangeError('chunkSize must be >= 1');
	}
	if (overlap < 0) {
		throw new RangeError('overlap must be >= 0');
	}

	const length = text.length;
	let start = 0;

	while (start < length) {
		let end = Math.min(start + chunkSize, length);

		if (end < length) {
			const boundary = lastSentenceBoundary(text.slice(start, end));
			if (boundary >= Math.floor(chunkSize / 2)) {
				// Keep the punctuation, drop the space after it
				end = start + boundary + 1;
			}
		}

		const chunk = text.slice(start, end).trim();
		if (chunk) {
			yield chunk;
		}

		if (end >= length) {
			break;
		}
		start = Math.max(end - overlap, start + 1);
	}
}

/**
 * Chunk a document into identified chunks.
 */
export function chunkDocument(
	document: Document,
	options: ChunkOptions = {},
): Chunk[] {
	const texts = [
		...chunkText(
			document.rawText,
			options.chunkSize ?? DEFAULT_CHUNK_SIZE,
			options.overlap ?? DEFAULT_CHUNK_OVERLAP,
		),
	];

	return texts.map((text, sequenceIndex) => ({
		documentId: document.id,
		sequenceIndex,
		totalChunks: texts.length,
		text,
	}));
}

/**
 * Render a chunk's stable id.
 */
export function chunkId(documentId: string, sequenceIndex: number): string {
	return `${documentId}_chunk_${sequenceIndex}`;
}

/**
 * Recover the document id from a chunk id.
 * Ids without a chunk suffix are returned unchanged.
 */
export function documentIdFromChunkId(id: string): string {
	return id.replace(CHUNK_ID_SUFFIX, '');
}
