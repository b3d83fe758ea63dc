/**
 * BookStore - the library's only entry point to persisted data.
 *
 * Owns the StoreLock for its library (acquired in open(), released in close()),
 * the LanceDB connection and the embedding provider. Every read and write of
 * chunks goes through here.
 */

import * as lancedb from '@lancedb/lancedb';
import type {Connection, Table} from '@lancedb/lancedb';
import {loadConfig, type LibraryConfig} from '../config/index.js';
import {getLanceDbPath, TABLE_NAMES} from '../constants.js';
import {
	createEmbeddingProvider,
	type EmbeddingProvider,
} from '../embeddings/index.js';
import {LockError, StoreNotOpenError, toError} from '../errors.js';
import {chunkDocument} from '../indexer/chunker.js';
import {documentFingerprint, documentIdForPath} from '../indexer/identity.js';
import type {Document} from '../indexer/types.js';
import {StoreLock, type LockToken} from '../lock/index.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import {fuseResults, OVER_FETCH_FACTOR} from '../search/fuse.js';
import type {RankedBook, SimilarityHit} from '../search/types.js';
import {createBookChunksSchema} from './schema.js';
import {
	BOOK_COLUMNS,
	chunkToRow,
	rowToHit,
	rowsToBooks,
	type BookSummary,
	type StoreStats,
} from './types.js';

export * from './types.js';
export * from './schema.js';

export interface BookStoreOptions {
	/** Defaults to the library's config.json */
	config?: LibraryConfig;
	/** Defaults to the provider named by the config. A provider passed in is not closed by the store. */
	embeddings?: EmbeddingProvider;
	logger?: Logger;
	/** Overrides config.lockTimeoutMs; null waits forever */
	lockTimeoutMs?: number | null;
	/** Called once if another process holds the lock when opening */
	onLockWait?: () => void;
}

/**
 * Escape a string for use in SQL-like LanceDB filter expressions.
 * Escapes single quotes by doubling them.
 */
function escapeString(s: string): string {
	return s.replace(/'/g, "''");
}

function documentFilter(documentId: string): string {
	return `document_id = '${escapeString(documentId)}'`;
}

export class BookStore {
	readonly libraryRoot: string;
	readonly config: LibraryConfig;
	private readonly lock: StoreLock;
	private readonly embeddings: EmbeddingProvider;
	private readonly ownsEmbeddings: boolean;
	private readonly logger: Logger;
	private token: LockToken | null;
	private db: Connection | null;
	private table: Table | null;

	private constructor(
		libraryRoot: string,
		config: LibraryConfig,
		lock: StoreLock,
		token: LockToken,
		db: Connection,
		table: Table,
		embeddings: EmbeddingProvider,
		ownsEmbeddings: boolean,
		logger: Logger,
	) {
		this.libraryRoot = libraryRoot;
		this.config = config;
		this.lock = lock;
		this.token = token;
		this.db = db;
		this.table = table;
		this.embeddings = embeddings;
		this.ownsEmbeddings = ownsEmbeddings;
		this.logger = logger;
	}

	/**
	 * Acquire the library lock, then connect to the database.
	 * Creates the chunks table on first use.
	 *
	 * @throws LockTimeoutError if the lock stays taken past the timeout
	 */
	static async open(
		libraryRoot: string,
		options: BookStoreOptions = {},
	): Promise<BookStore> {
		const logger = options.logger ?? createNullLogger();
		const config = options.config ?? (await loadConfig(libraryRoot, logger));

		const lock = new StoreLock(libraryRoot, {
			pollIntervalMs: config.lockPollIntervalMs,
			staleMs: config.lockStaleMs,
			onWait: options.onLockWait,
			logger,
		});
		const timeoutMs =
			options.lockTimeoutMs !== undefined
				? options.lockTimeoutMs
				: config.lockTimeoutMs;
		const token = await lock.acquire(timeoutMs);

		try {
			const db = await lancedb.connect(getLanceDbPath(libraryRoot));
			const tableNames = await db.tableNames();
			const table = tableNames.includes(TABLE_NAMES.BOOK_CHUNKS)
				? await db.openTable(TABLE_NAMES.BOOK_CHUNKS)
				: await db.createEmptyTable(
						TABLE_NAMES.BOOK_CHUNKS,
						createBookChunksSchema(config.embeddingDimensions),
				  );
			const embeddings = options.embeddings ?? createEmbeddingProvider(config);

			logger.info('BookStore', `Opened ${libraryRoot}`);
			return new BookStore(
				libraryRoot,
				config,
				lock,
				token,
				db,
				table,
				embeddings,
				options.embeddings === undefined,
				logger,
			);
		} catch (error) {
			logger.error('BookStore', 'Failed to open store', toError(error));
			await lock.release(token);
			throw error;
		}
	}

	get isOpen(): boolean {
		return this.table !== null;
	}

	private ensureOpen(): {db: Connection; table: Table} {
		if (!this.db || !this.table) {
			throw new StoreNotOpenError();
		}
		if (this.token?.compromised) {
			throw new LockError(
				`Library lock at ${this.libraryRoot} was taken over by another process`,
			);
		}
		return {db: this.db, table: this.table};
	}

	// ============================================================
	// Writes
	// ============================================================

	/**
	 * Chunk, embed and store one document.
	 *
	 * Chunk ids are stable, so re-indexing a document overwrites its rows in
	 * place. A document whose every chunk is already stored with the same
	 * fingerprint (text, metadata and indexing settings) is left alone; an
	 * edited or partially stored one is embedded and written again.
	 *
	 * @returns false if the document produced no chunks
	 */
	async upsert(document: Document): Promise<boolean> {
		const {table} = this.ensureOpen();

		const chunks = chunkDocument(document, {
			chunkSize: this.config.chunkSize,
			overlap: this.config.chunkOverlap,
		});
		if (chunks.length === 0) {
			this.logger.warn('BookStore', `No text to index in ${document.filepath}`);
			return false;
		}

		const fingerprint = documentFingerprint(document, this.config);
		const filter = documentFilter(document.id);
		const [stored, current] = await Promise.all([
			table.countRows(filter),
			table.countRows(
				`${filter} AND fingerprint = '${escapeString(fingerprint)}'`,
			),
		]);
		if (stored === chunks.length && current === chunks.length) {
			this.logger.debug('BookStore', `Already indexed: ${document.filepath}`);
			return true;
		}

		const vectors = await this.embeddings.embed(chunks.map(c => c.text));
		const rows = chunks.map((chunk, i) => {
			const vector = vectors[i];
			if (!vector) {
				throw new Error(`Missing embedding for chunk ${i} of ${document.filepath}`);
			}
			return chunkToRow(document, chunk, vector, fingerprint);
		});

		// Re-check right before writing: a long embed may outlive the lock
		this.ensureOpen();
		await table
			.mergeInsert('id')
			.whenMatchedUpdateAll()
			.whenNotMatchedInsertAll()
			.execute(rows);

		if (stored > 0) {
			// Tail of an earlier, longer version of the book
			await table.delete(`${filter} AND chunk_index >= ${chunks.length}`);
		}

		this.logger.info(
			'BookStore',
			`Indexed ${document.filepath} (${chunks.length} chunks)`,
		);
		return true;
	}

	/**
	 * Drop and recreate the chunks table.
	 */
	async reset(): Promise<void> {
		const {db} = this.ensureOpen();
		await db.dropTable(TABLE_NAMES.BOOK_CHUNKS);
		this.table = await db.createEmptyTable(
			TABLE_NAMES.BOOK_CHUNKS,
			createBookChunksSchema(this.config.embeddingDimensions),
		);
		this.logger.info('BookStore', 'Reset book_chunks table');
	}

	// ============================================================
	// Reads
	// ============================================================

	/**
	 * Nearest chunks to the query text, closest first.
	 */
	async query(text: string, overFetchCount: number): Promise<SimilarityHit[]> {
		const {table} = this.ensureOpen();
		if (overFetchCount <= 0 || (await table.countRows()) === 0) {
			return [];
		}

		const vector = await this.embeddings.embedSingle(text);
		const rows = await table
			.vectorSearch(vector)
			.distanceType('cosine')
			.limit(overFetchCount)
			.toArray();

		return rows.map(rowToHit);
	}

	/**
	 * Search for books: over-fetch chunks, then fuse them per book.
	 */
	async search(
		text: string,
		limit: number = this.config.searchLimit,
	): Promise<RankedBook[]> {
		const hits = await this.query(text, limit * OVER_FETCH_FACTOR);
		return fuseResults(hits, limit);
	}

	/**
	 * Ids of every document with at least one stored chunk.
	 */
	async listIndexedDocumentKeys(): Promise<Set<string>> {
		const {table} = this.ensureOpen();
		const rows = await table.query().select(['document_id']).toArray();

		const keys = new Set<string>();
		for (const row of rows) {
			const {document_id: documentId} = row;
			if (typeof documentId === 'string') {
				keys.add(documentId);
			}
		}
		return keys;
	}

	/**
	 * One summary per indexed book, sorted by title.
	 */
	async listBooks(): Promise<BookSummary[]> {
		const {table} = this.ensureOpen();
		const rows = await table.query().select([...BOOK_COLUMNS]).toArray();
		return rowsToBooks(rows);
	}

	/**
	 * Whether a book file is fully indexed (every chunk stored).
	 */
	async isIndexed(filepath: string): Promise<boolean> {
		const {table} = this.ensureOpen();
		const filter = documentFilter(documentIdForPath(filepath));
		const rows = await table
			.query()
			.where(filter)
			.select(['total_chunks'])
			.limit(1)
			.toArray();

		const [first] = rows;
		if (!first || typeof first.total_chunks !== 'number') {
			return false;
		}
		return (await table.countRows(filter)) === first.total_chunks;
	}

	async stats(): Promise<StoreStats> {
		const {table} = this.ensureOpen();
		const [chunkCount, keys] = await Promise.all([
			table.countRows(),
			this.listIndexedDocumentKeys(),
		]);
		return {
			tableName: TABLE_NAMES.BOOK_CHUNKS,
			chunkCount,
			bookCount: keys.size,
		};
	}

	// ============================================================
	// Lifecycle
	// ============================================================

	/**
	 * Close the connection and release the library lock. Idempotent.
	 */
	async close(): Promise<void> {
		if (this.db) {
			this.db.close();
		}
		this.db = null;
		this.table = null;
		if (this.ownsEmbeddings) {
			this.embeddings.close();
		}

		const token = this.token;
		this.token = null;
		if (token) {
			await this.lock.release(token);
			this.logger.info('BookStore', `Closed ${this.libraryRoot}`);
		}
	}
}

/**
 * Run `fn` with an open store; the store is closed (and its lock released)
 * on every exit path.
 */
export async function withBookStore<T>(
	libraryRoot: string,
	options: BookStoreOptions,
	fn: (store: BookStore) => Promise<T>,
): Promise<T> {
	const store = await BookStore.open(libraryRoot, options);
	try {
		return await fn(store);
	} finally {
		await store.close();
	}
}
