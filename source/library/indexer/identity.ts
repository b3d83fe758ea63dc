import crypto from 'node:crypto';
import path from 'node:path';

/**
 * Stable document id: MD5 hex of the absolute source path.
 * The same file always maps to the same id, so re-indexing upserts.
 */
export function documentIdForPath(filepath: string): string {
	return crypto.createHash('md5').update(path.resolve(filepath)).digest('hex');
}

/**
 * What a document's stored rows are built from: its text, its metadata and
 * the settings that chunk and embed it. Rows carrying the same fingerprint
 * need no re-embedding.
 */
export interface FingerprintSettings {
	chunkSize: number;
	chunkOverlap: number;
	embeddingModel: string;
}

/**
 * MD5 hex over a document's content and the settings it is indexed with.
 */
export function documentFingerprint(
	document: Readonly<{title: string; author: string; format: string; rawText: string}>,
	settings: FingerprintSettings,
): string {
	return crypto
		.createHash('md5')
		.update(
			JSON.stringify([
				settings.embeddingModel,
				settings.chunkSize,
				settings.chunkOverlap,
				document.title,
				document.author,
				document.format,
				document.rawText,
			]),
		)
		.digest('hex');
}
