/**
 * BookIndexer - walks a file or directory and feeds each book to the store.
 *
 * Pipeline per book: extract → chunk → embed → upsert (the last three inside
 * BookStore.upsert). One book finishes before the next starts, so an
 * interrupt between books never leaves more than one partial book behind.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import fg from 'fast-glob';
import {SUPPORTED_EXTENSIONS} from '../constants.js';
import {LockError, PathNotFoundError, formatError} from '../errors.js';
import {extractBook} from '../extractors/index.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import type {BookStore} from '../storage/index.js';
import {
	createEmptyIndexStats,
	type IndexStats,
	type ProgressCallback,
} from './types.js';

/**
 * Options for the index operation.
 */
export interface IndexOptions {
	/** Called before each book with its 1-based position */
	progressCallback?: ProgressCallback;
	/** Checked before each book; returning true stops the run */
	shouldStop?: () => boolean;
}

export type IndexOutcome =
	| {status: 'completed'; stats: IndexStats}
	| {status: 'interrupted'; stats: IndexStats};

/**
 * Find book files under a directory, sorted by path.
 * Extension matching is case-insensitive.
 */
export async function findBooks(
	directory: string,
	extensions: readonly string[] = SUPPORTED_EXTENSIONS,
): Promise<string[]> {
	const suffixes = extensions.map(ext => ext.replace(/^\./, ''));
	if (suffixes.length === 0) {
		return [];
	}
	const pattern =
		suffixes.length === 1 ? `**/*.${suffixes[0]}` : `**/*.{${suffixes.join(',')}}`;

	const files = await fg(pattern, {
		cwd: directory,
		absolute: true,
		onlyFiles: true,
		caseSensitiveMatch: false,
		followSymbolicLinks: false,
	});

	return files.map(file => path.normalize(file)).sort();
}

export class BookIndexer {
	private readonly store: BookStore;
	private readonly logger: Logger;

	constructor(store: BookStore, logger?: Logger) {
		this.store = store;
		this.logger = logger ?? createNullLogger();
	}

	/**
	 * Index a single book file or every book under a directory.
	 *
	 * Per-book failures are counted and logged; the run continues.
	 *
	 * @throws PathNotFoundError if the target does not exist
	 * @throws LockError if the library lock is lost mid-run
	 */
	async index(target: string, options: IndexOptions = {}): Promise<IndexOutcome> {
		const {progressCallback, shouldStop} = options;
		const absolute = path.resolve(target);
		const files = await this.collectFiles(absolute);
		const stats = createEmptyIndexStats();

		this.logger.info('Indexer', `Indexing ${files.length} book(s) from ${absolute}`);

		for (const [i, file] of files.entries()) {
			if (shouldStop?.()) {
				this.logger.info('Indexer', 'Interrupted', {...stats});
				return {status: 'interrupted', stats};
			}

			progressCallback?.(i + 1, files.length, file);

			if (await this.indexFile(file)) {
				stats.success += 1;
			} else {
				stats.failed += 1;
			}
		}

		this.logger.info('Indexer', 'Indexing complete', {...stats});
		return {status: 'completed', stats};
	}

	/**
	 * Extract and store one book.
	 * @returns false if it could not be extracted or had no text
	 * @throws LockError if the library lock is lost
	 */
	async indexFile(filepath: string): Promise<boolean> {
		try {
			const document = await extractBook(filepath);
			return await this.store.upsert(document);
		} catch (error) {
			if (error instanceof LockError) {
				throw error;
			}
			this.logger.warn('Indexer', `Failed to index ${filepath}`, {
				error: formatError(error),
			});
			return false;
		}
	}

	private async collectFiles(target: string): Promise<string[]> {
		let isDirectory: boolean;
		try {
			isDirectory = (await fs.stat(target)).isDirectory();
		} catch {
			throw new PathNotFoundError(target);
		}

		if (!isDirectory) {
			return [target];
		}
		return findBooks(target, this.store.config.extensions);
	}
}
