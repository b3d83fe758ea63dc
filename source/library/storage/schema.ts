import {Field, FixedSizeList, Float32, Int32, Schema, Utf8} from 'apache-arrow';
import {DEFAULT_EMBEDDING_DIMENSIONS} from '../constants.js';

/**
 * Arrow schema for the book_chunks table.
 *
 * One row per chunk; book metadata is repeated on every row so a search
 * hit carries everything needed to display its book.
 */
export function createBookChunksSchema(
	dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS,
): Schema {
	return new Schema([
		new Field('id', new Utf8(), false), // "{documentId}_chunk_{n}"
		new Field(
			'vector',
			new FixedSizeList(dimensions, new Field('item', new Float32(), false)),
			false,
		),
		new Field('text', new Utf8(), false),
		new Field('document_id', new Utf8(), false),
		new Field('chunk_index', new Int32(), false),
		new Field('total_chunks', new Int32(), false),
		new Field('title', new Utf8(), false),
		new Field('author', new Utf8(), false),
		new Field('filename', new Utf8(), false),
		new Field('filepath', new Utf8(), false),
		new Field('format', new Utf8(), false), // pdf/epub/fb2
		new Field('length', new Int32(), false),
		new Field('fingerprint', new Utf8(), false), // see documentFingerprint()
	]);
}
