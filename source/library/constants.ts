import os from 'node:os';
import path from 'node:path';

/**
 * Environment variable that overrides the default library location.
 */
export const HOME_ENV = 'BOOKSHELF_HOME';

/**
 * Environment variable that overrides the configured embedding provider.
 */
export const EMBEDDING_PROVIDER_ENV = 'BOOKSHELF_EMBEDDING_PROVIDER';

/**
 * Environment variables holding the API key for the embedding service,
 * in order of preference.
 */
export const EMBEDDING_API_KEY_ENVS = [
	'BOOKSHELF_EMBEDDING_API_KEY',
	'OPENAI_API_KEY',
] as const;

/**
 * Name of the advisory lock file inside a library directory.
 * The file itself is never deleted; only the lock held on it is.
 */
export const LOCK_FILE_NAME = '.db.lock';

/**
 * Get the default library directory.
 * Honors BOOKSHELF_HOME, otherwise follows the XDG data directory layout.
 */
export function getDefaultLibraryDir(): string {
	const override = process.env[HOME_ENV];
	if (override) {
		return path.resolve(override);
	}
	const dataHome =
		process.env['XDG_DATA_HOME'] ?? path.join(os.homedir(), '.local', 'share');
	return path.join(dataHome, 'bookshelf', 'library');
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(libraryRoot: string): string {
	return path.join(libraryRoot, 'config.json');
}

/**
 * Get the path to the lock file.
 */
export function getLockPath(libraryRoot: string): string {
	return path.join(libraryRoot, LOCK_FILE_NAME);
}

/**
 * Get the path to the LanceDB database directory.
 */
export function getLanceDbPath(libraryRoot: string): string {
	return path.join(libraryRoot, 'lancedb');
}

/**
 * Get the path to the logs directory.
 */
export function getLogsDir(libraryRoot: string): string {
	return path.join(libraryRoot, 'logs');
}

/**
 * Service names for per-service log directories.
 */
export type ServiceName = 'cli' | 'worker';

/**
 * Get the log directory for one service.
 */
export function getServiceLogsDir(
	libraryRoot: string,
	service: ServiceName,
): string {
	return path.join(getLogsDir(libraryRoot), service);
}

/**
 * Get the current hourly log file for one service.
 */
export function getServiceLogPath(
	libraryRoot: string,
	service: ServiceName,
): string {
	const hour = new Date().toISOString().slice(0, 13).replace('T', '-'); // YYYY-MM-DD-HH
	return path.join(getServiceLogsDir(libraryRoot, service), `${hour}.log`);
}

/**
 * LanceDB table names.
 */
export const TABLE_NAMES = {
	BOOK_CHUNKS: 'book_chunks',
} as const;

/**
 * Book formats the extractors understand.
 */
export const SUPPORTED_EXTENSIONS = ['.pdf', '.epub', '.fb2'] as const;

/**
 * Embedding dimensions of the mock provider.
 */
export const DEFAULT_EMBEDDING_DIMENSIONS = 384;
