/**
 * Bookshelf library core.
 *
 * Provides book extraction, overlapping chunking, a lock-guarded vector
 * store over LanceDB, per-book result fusion and background indexing in a
 * supervised worker process.
 */

// Config
export {
	loadConfig,
	saveConfig,
	configExists,
	createConfigForProvider,
	DEFAULT_CONFIG,
	PROVIDER_CONFIGS,
	type LibraryConfig,
	type EmbeddingProviderType,
} from './config/index.js';

// Constants
export {
	getDefaultLibraryDir,
	getLockPath,
	getLogsDir,
	LOCK_FILE_NAME,
	SUPPORTED_EXTENSIONS,
	TABLE_NAMES,
} from './constants.js';

// Errors
export {
	LibraryError,
	LockError,
	LockTimeoutError,
	ExtractionError,
	UnsupportedFormatError,
	WorkerSetupError,
	PathNotFoundError,
	StoreNotOpenError,
	EmbeddingError,
	formatError,
	toError,
	type LibraryErrorCode,
} from './errors.js';

// Logger
export {
	createServiceLogger,
	createNullLogger,
	type Logger,
	type LogLevel,
} from './logger/index.js';

// Lock
export {
	StoreLock,
	LockToken,
	withStoreLock,
	type StoreLockOptions,
} from './lock/index.js';

// Extraction
export {extractBook, cleanText, formatForPath} from './extractors/index.js';

// Indexing
export {
	chunkText,
	chunkDocument,
	chunkId,
	documentIdFromChunkId,
} from './indexer/chunker.js';
export {BookIndexer, findBooks, type IndexOutcome} from './indexer/indexer.js';
export {documentIdForPath} from './indexer/identity.js';
export type {
	BookFormat,
	Chunk,
	Document,
	IndexStats,
	ProgressCallback,
} from './indexer/types.js';

// Embeddings
export {
	createEmbeddingProvider,
	OpenAIEmbeddingProvider,
	MockEmbeddingProvider,
	type EmbeddingProvider,
} from './embeddings/index.js';

// Storage
export {
	BookStore,
	withBookStore,
	type BookStoreOptions,
	type BookSummary,
	type StoreStats,
} from './storage/index.js';

// Search
export {fuseResults, toExcerpt, OVER_FETCH_FACTOR} from './search/fuse.js';
export type {
	RankedBook,
	SimilarityHit,
	ChunkMetadata,
	MatchedChunk,
	SearchResults,
} from './search/types.js';

// Background indexing
export {IndexingSupervisor, formatElapsed} from './background/supervisor.js';
export {StatusChannel} from './background/channel.js';
export {
	isTerminal,
	type StatusEvent,
	type StatusPhase,
	type TerminalStatusEvent,
} from './background/protocol.js';
