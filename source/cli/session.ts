/**
 * LibrarySession - what the CLI holds on to between commands.
 *
 * The store is opened per command, not for the session, so the library lock
 * is only held while a command runs and a background worker can take it in
 * between. Config and the embedding provider (the slow part to load) are
 * created on first use and kept.
 */

import {
	createEmbeddingProvider,
	createNullLogger,
	IndexingSupervisor,
	loadConfig,
	withBookStore,
	type BookStore,
	type EmbeddingProvider,
	type LibraryConfig,
	type Logger,
} from '../library/index.js';

export interface LibrarySessionOptions {
	logger?: Logger;
	/** Defaults to a supervisor logging to the session logger */
	supervisor?: IndexingSupervisor;
}

export class LibrarySession {
	readonly libraryRoot: string;
	readonly supervisor: IndexingSupervisor;
	private readonly logger: Logger;
	private config: LibraryConfig | null = null;
	private embeddings: EmbeddingProvider | null = null;

	constructor(libraryRoot: string, options: LibrarySessionOptions = {}) {
		this.libraryRoot = libraryRoot;
		this.logger = options.logger ?? createNullLogger();
		this.supervisor =
			options.supervisor ?? new IndexingSupervisor({logger: this.logger});
	}

	async getConfig(): Promise<LibraryConfig> {
		if (!this.config) {
			this.config = await loadConfig(this.libraryRoot, this.logger);
		}
		return this.config;
	}

	/**
	 * Open the store, run `fn`, close the store.
	 * `onLockWait` fires once if another process holds the library lock.
	 */
	async withStore<T>(
		fn: (store: BookStore) => Promise<T>,
		onLockWait?: () => void,
	): Promise<T> {
		const config = await this.getConfig();
		if (!this.embeddings) {
			this.embeddings = createEmbeddingProvider(config);
		}

		return withBookStore(
			this.libraryRoot,
			{config, embeddings: this.embeddings, logger: this.logger, onLockWait},
			fn,
		);
	}

	/**
	 * Start indexing `target` in a background worker.
	 * @returns false if one is already running
	 */
	startBackgroundIndexing(target: string): boolean {
		return this.supervisor.startIndexing(target, this.libraryRoot);
	}

	/**
	 * Stop any background worker and close the embedding provider.
	 */
	async close(): Promise<void> {
		if (this.supervisor.isRunning()) {
			this.logger.info('LibrarySession', 'Stopping background indexing');
		}
		await this.supervisor.stop();
		this.embeddings?.close();
		this.embeddings = null;
	}
}
