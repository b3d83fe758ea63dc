/**
 * Library commands for the CLI.
 *
 * Shared by the REPL and the one-shot commands: the run* functions do the
 * work through a LibrarySession, the format* functions turn results into
 * plain text.
 */

import os from 'node:os';
import path from 'node:path';
import {
	BookIndexer,
	formatElapsed,
	isTerminal,
	type BookSummary,
	type IndexOutcome,
	type IndexStats,
	type SearchResults,
	type StatusEvent,
	type StoreStats,
	type TerminalStatusEvent,
} from '../../library/index.js';
import type {LibrarySession} from '../session.js';

// ============================================================================
// Commands
// ============================================================================

export interface CommandInfo {
	name: string;
	usage: string;
	description: string;
}

export const COMMANDS: readonly CommandInfo[] = [
	{name: '/help', usage: '/help', description: 'Show this help'},
	{name: '/index', usage: '/index <path>', description: 'Index a book file or directory (foreground)'},
	{
		name: '/index-bg',
		usage: '/index-bg <path>',
		description: 'Index a book file or directory in the background',
	},
	{name: '/index-status', usage: '/index-status', description: 'Show background indexing status'},
	{name: '/books', usage: '/books', description: 'List indexed books'},
	{name: '/stats', usage: '/stats', description: 'Show database statistics'},
	{name: '/reset', usage: '/reset', description: 'Delete every indexed book (run twice to confirm)'},
	{name: '/clear', usage: '/clear', description: 'Clear the screen'},
	{name: '/quit', usage: '/quit', description: 'Exit (also /exit)'},
];

export interface ParsedCommand {
	/** Lower-cased command word, including the slash */
	name: string;
	/** Everything after the command word, trimmed */
	argument: string;
}

/**
 * Split "/index  ~/books " into its command word and argument.
 */
export function parseCommand(input: string): ParsedCommand {
	const trimmed = input.trim();
	const match = /^(\S+)\s*(.*)$/s.exec(trimmed);
	return {
		name: (match?.[1] ?? '').toLowerCase(),
		argument: (match?.[2] ?? '').trim(),
	};
}

/**
 * Resolve a user-typed path, expanding a leading "~".
 */
export function resolveUserPath(input: string): string {
	if (input === '~') {
		return os.homedir();
	}
	if (input.startsWith('~/')) {
		return path.join(os.homedir(), input.slice(2));
	}
	return path.resolve(input);
}

export function getHelpText(): string {
	const width = Math.max(...COMMANDS.map(c => c.usage.length));
	const lines = COMMANDS.map(c => `  ${c.usage.padEnd(width)}  ${c.description}`);
	return [
		'Type a question to search your books, or a command:',
		...lines,
		'',
		'Tips:',
		'  Ctrl+C          Clear input (twice to quit)',
		'  Escape          Clear input',
		'  Up/Down         Command history',
		'  Tab             Complete a command',
	].join('\n');
}

// ============================================================================
// Operations
// ============================================================================

export interface RunIndexOptions {
	onProgress?: (current: number, total: number, file: string) => void;
	shouldStop?: () => boolean;
	onLockWait?: () => void;
}

/**
 * Index a file or directory in this process.
 */
export async function runIndex(
	session: LibrarySession,
	target: string,
	options: RunIndexOptions = {},
): Promise<IndexOutcome> {
	return session.withStore(
		store =>
			new BookIndexer(store).index(target, {
				progressCallback: options.onProgress,
				shouldStop: options.shouldStop,
			}),
		options.onLockWait,
	);
}

/**
 * Search the library and time it.
 */
export async function runSearch(
	session: LibrarySession,
	query: string,
	limit?: number,
	onLockWait?: () => void,
): Promise<SearchResults> {
	const start = Date.now();
	const books = await session.withStore(
		store => store.search(query, limit),
		onLockWait,
	);
	return {query, books, elapsedMs: Date.now() - start};
}

export async function loadBooks(
	session: LibrarySession,
	onLockWait?: () => void,
): Promise<BookSummary[]> {
	return session.withStore(store => store.listBooks(), onLockWait);
}

export async function loadStats(
	session: LibrarySession,
	onLockWait?: () => void,
): Promise<StoreStats> {
	return session.withStore(store => store.stats(), onLockWait);
}

export async function resetLibrary(
	session: LibrarySession,
	onLockWait?: () => void,
): Promise<void> {
	await session.withStore(store => store.reset(), onLockWait);
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Counter lines for a finished run.
 */
export function formatIndexStats(stats: IndexStats, savedLabel = 'Successfully indexed'): string {
	const lines = [`  ${savedLabel}: ${stats.success} book(s)`];
	if (stats.failed > 0) {
		lines.push(`  Failed: ${stats.failed} book(s)`);
	}
	return lines.join('\n');
}

/**
 * Summary of a foreground run.
 */
export function formatIndexOutcome(outcome: IndexOutcome): string {
	return outcome.status === 'completed'
		? `Indexing complete:\n${formatIndexStats(outcome.stats)}`
		: `Indexing interrupted:\n${formatIndexStats(outcome.stats, 'Progress saved')}`;
}

export type Tone = 'success' | 'warning' | 'error';

/**
 * How to announce the end of a background run.
 */
export function describeTerminalEvent(event: TerminalStatusEvent): {
	text: string;
	tone: Tone;
} {
	switch (event.phase) {
		case 'completed':
			return {
				text: `Background indexing completed!\n${formatIndexStats(event.stats)}`,
				tone: 'success',
			};
		case 'interrupted':
			return {
				text: `Background indexing was interrupted\n${formatIndexStats(
					event.stats,
					'Progress saved',
				)}`,
				tone: 'warning',
			};
		case 'error':
			return {
				text: `Background indexing failed:\n  ${event.message}`,
				tone: 'error',
			};
	}
}

/**
 * Answer to /index-status.
 *
 * @param lastEvent - Most recent event of the current or last run
 */
export function formatIndexingStatus(
	running: boolean,
	elapsedMs: number | null,
	lastEvent: StatusEvent | null,
): string {
	if (running) {
		const lines = [
			'Background indexing status:',
			'  Status: Running',
			`  Elapsed time: ${formatElapsed(elapsedMs ?? 0)}`,
		];
		if (lastEvent) {
			lines.push(`  Current: ${lastEvent.message}`);
		}
		return lines.join('\n');
	}

	if (lastEvent && isTerminal(lastEvent)) {
		return describeTerminalEvent(lastEvent).text;
	}
	return 'No background indexing is currently running.';
}

export function formatStoreStats(stats: StoreStats): string {
	return [
		'Database statistics:',
		`  Collection: ${stats.tableName}`,
		`  Indexed books: ${stats.bookCount}`,
		`  Indexed chunks: ${stats.chunkCount}`,
	].join('\n');
}

/**
 * One line per book: title, author, format and chunk counts.
 */
export function formatBookLine(book: BookSummary): string {
	const chunks =
		book.chunkCount === book.totalChunks
			? `${book.chunkCount} chunks`
			: `${book.chunkCount}/${book.totalChunks} chunks, partial`;
	return `${book.title} by ${book.author} (${book.format.toUpperCase()}, ${chunks})`;
}

/**
 * Relevance as a percentage with one decimal.
 */
export function formatScore(score: number): string {
	return `${(score * 100).toFixed(1)}%`;
}
