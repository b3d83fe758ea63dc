/**
 * Error taxonomy for library operations.
 *
 * Every error carries a stable `code` so callers (and the worker protocol)
 * can branch on the kind of failure without string matching.
 */

export type LibraryErrorCode =
	| 'LOCK_FAILED'
	| 'LOCK_TIMEOUT'
	| 'EXTRACTION_FAILED'
	| 'UNSUPPORTED_FORMAT'
	| 'WORKER_SETUP_FAILED'
	| 'PATH_NOT_FOUND'
	| 'STORE_NOT_OPEN'
	| 'EMBEDDING_FAILED';

export class LibraryError extends Error {
	readonly code: LibraryErrorCode;

	constructor(code: LibraryErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/**
 * The lock file could not be created or locked for a reason other than contention.
 */
export class LockError extends LibraryError {
	constructor(message: string, options?: ErrorOptions) {
		super('LOCK_FAILED', message, options);
	}
}

/**
 * Another process kept the lock for longer than the caller was willing to wait.
 * Retryable.
 */
export class LockTimeoutError extends LibraryError {
	readonly waitedMs: number;

	constructor(libraryRoot: string, waitedMs: number) {
		super(
			'LOCK_TIMEOUT',
			`Timed out after ${waitedMs}ms waiting for the library lock at ${libraryRoot}`,
		);
		this.waitedMs = waitedMs;
	}
}

export class ExtractionError extends LibraryError {
	readonly filepath: string;

	constructor(filepath: string, message: string, options?: ErrorOptions) {
		super('EXTRACTION_FAILED', `${filepath}: ${message}`, options);
		this.filepath = filepath;
	}
}

export class UnsupportedFormatError extends LibraryError {
	readonly filepath: string;

	constructor(filepath: string) {
		super('UNSUPPORTED_FORMAT', `Unsupported file format: ${filepath}`);
		this.filepath = filepath;
	}
}

export class WorkerSetupError extends LibraryError {
	constructor(message: string, options?: ErrorOptions) {
		super('WORKER_SETUP_FAILED', message, options);
	}
}

export class PathNotFoundError extends LibraryError {
	readonly filepath: string;

	constructor(filepath: string) {
		super('PATH_NOT_FOUND', `Path does not exist: ${filepath}`);
		this.filepath = filepath;
	}
}

export class StoreNotOpenError extends LibraryError {
	constructor() {
		super('STORE_NOT_OPEN', 'Book store is not open. Call BookStore.open() first.');
	}
}

/**
 * The embedding service refused or failed a request.
 * `status` is the HTTP status, when there was a response.
 */
export class EmbeddingError extends LibraryError {
	readonly status: number | undefined;

	constructor(message: string, status?: number, options?: ErrorOptions) {
		super('EMBEDDING_FAILED', message, options);
		this.status = status;
	}
}

/**
 * Render any thrown value as a message.
 */
export function formatError(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}

/**
 * Coerce any thrown value to an Error (for Logger.error).
 */
export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
