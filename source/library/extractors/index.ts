/**
 * Book extraction: dispatch by extension, then normalize into a Document.
 */

import path from 'node:path';
import {ExtractionError, UnsupportedFormatError, formatError} from '../errors.js';
import {documentIdForPath} from '../indexer/identity.js';
import type {BookFormat, Document} from '../indexer/types.js';
import {extractEpub} from './epub.js';
import {extractFb2} from './fb2.js';
import {extractPdf} from './pdf.js';
import type {ExtractedBook, Extractor} from './types.js';

export type {ExtractedBook, Extractor} from './types.js';

const EXTRACTORS: Record<BookFormat, Extractor> = {
	pdf: extractPdf,
	epub: extractEpub,
	fb2: extractFb2,
};

const UNKNOWN_AUTHOR = 'Unknown';

/**
 * Book format for a path, from its extension (case-insensitive).
 */
export function formatForPath(filepath: string): BookFormat | null {
	switch (path.extname(filepath).toLowerCase()) {
		case '.pdf':
			return 'pdf';
		case '.epub':
			return 'epub';
		case '.fb2':
			return 'fb2';
		default:
			return null;
	}
}

/**
 * Collapse every run of whitespace to one space and trim.
 */
export function cleanText(text: string): string {
	return text.replace(/\s+/g, ' ').trim();
}

/**
 * Extract a book file into a Document.
 *
 * Missing metadata falls back to the file stem (title) and "Unknown" (author).
 *
 * @throws UnsupportedFormatError for extensions no extractor handles
 * @throws ExtractionError when the file cannot be read or parsed
 */
export async function extractBook(filepath: string): Promise<Document> {
	const absolute = path.resolve(filepath);
	const format = formatForPath(absolute);
	if (!format) {
		throw new UnsupportedFormatError(absolute);
	}

	let extracted: ExtractedBook;
	try {
		extracted = await EXTRACTORS[format](absolute);
	} catch (error) {
		throw new ExtractionError(absolute, formatError(error), {cause: error});
	}

	const rawText = cleanText(extracted.text);
	const filename = path.basename(absolute);

	return {
		id: documentIdForPath(absolute),
		title: extracted.title ?? path.basename(absolute, path.extname(absolute)),
		author: extracted.author ?? UNKNOWN_AUTHOR,
		format,
		filename,
		filepath: absolute,
		rawText,
		length: rawText.length,
	};
}
