/**
 * One-shot commands: `bookshelf index|search|stats|books`.
 * Plain chalk output, no ink.
 */

import path from 'node:path';
import chalk from 'chalk';
import {
	formatError,
	isTerminal,
	type IndexOutcome,
	type SearchResults,
	type StatusEvent,
	type TerminalStatusEvent,
} from '../../library/index.js';
import type {LibrarySession} from '../session.js';
import {
	describeTerminalEvent,
	formatBookLine,
	formatIndexOutcome,
	formatScore,
	formatStoreStats,
	loadBooks,
	loadStats,
	runIndex,
	runSearch,
	type Tone,
} from './handlers.js';

export type Writer = (line: string) => void;

const defaultWriter: Writer = line => console.log(line);

const TONES: Record<Tone, (text: string) => string> = {
	success: chalk.green,
	warning: chalk.yellow,
	error: chalk.red,
};

const STATUS_POLL_MS = 500;

/**
 * Index in this process, printing one line per book.
 * The first Ctrl+C stops after the current book.
 */
export async function indexCommand(
	session: LibrarySession,
	target: string,
	write: Writer = defaultWriter,
): Promise<IndexOutcome> {
	let stopRequested = false;
	const onSigint = () => {
		stopRequested = true;
		write(chalk.yellow('Stopping after the current book...'));
	};
	process.once('SIGINT', onSigint);

	try {
		write(chalk.cyan(`Indexing books from: ${target}`));
		write(chalk.dim(`Using library: ${session.libraryRoot}`));

		const outcome = await runIndex(session, target, {
			onProgress: (current, total, file) =>
				write(chalk.dim(`[${current}/${total}] ${path.basename(file)}`)),
			shouldStop: () => stopRequested,
			onLockWait: () => write(chalk.yellow('Waiting for the library lock...')),
		});

		const summary = formatIndexOutcome(outcome);
		write(outcome.status === 'completed' ? chalk.green(summary) : chalk.yellow(summary));
		return outcome;
	} finally {
		process.removeListener('SIGINT', onSigint);
	}
}

function printEvent(event: StatusEvent, write: Writer): void {
	if (isTerminal(event)) {
		const {text, tone} = describeTerminalEvent(event);
		write(TONES[tone](text));
	} else {
		write(chalk.dim(event.message));
	}
}

/**
 * Index through a background worker and follow its status until it ends.
 * Ctrl+C stops the worker.
 *
 * @returns the run's final event, or null if it was stopped before reporting one
 */
export async function backgroundIndexCommand(
	session: LibrarySession,
	target: string,
	write: Writer = defaultWriter,
): Promise<TerminalStatusEvent | null> {
	const {supervisor} = session;
	if (!session.startBackgroundIndexing(target)) {
		throw new Error('Background indexing is already running');
	}

	const onSigint = () => {
		write(chalk.yellow('Stopping background indexing...'));
		supervisor.stop().catch(error => write(chalk.red(formatError(error))));
	};
	process.once('SIGINT', onSigint);

	try {
		for (;;) {
			const event = await supervisor.nextStatus(STATUS_POLL_MS);
			if (event) {
				printEvent(event, write);
				if (isTerminal(event)) return event;
			} else if (!supervisor.isRunning()) {
				break;
			}
		}

		// Exited: whatever it sent before closing is in the channel now
		await supervisor.waitForExit();
		let last: TerminalStatusEvent | null = null;
		for (const event of supervisor.drainAllStatus()) {
			printEvent(event, write);
			if (isTerminal(event)) last = event;
		}
		return last;
	} finally {
		process.removeListener('SIGINT', onSigint);
	}
}

/**
 * Lines for a search, ready to print.
 */
export function formatSearchResults(results: SearchResults): string[] {
	if (results.books.length === 0) {
		return [chalk.yellow(`No matching books found for "${results.query}".`)];
	}

	const lines = [
		chalk.bold(`Found ${results.books.length} matching book(s) for "${results.query}"`) +
			chalk.dim(` (${results.elapsedMs}ms)`),
	];
	results.books.forEach((book, index) => {
		lines.push(
			'',
			`${index + 1}. ${chalk.cyan.bold(book.title)} by ${chalk.magenta(book.author)} ` +
				`${chalk.green(`[${book.format.toUpperCase()}]`)} ${chalk.yellow(
					formatScore(book.relevanceScore),
				)}`,
			`   ${chalk.blue(book.filepath)}`,
			`   ${book.bestMatchExcerpt}`,
		);
	});
	return lines;
}

export async function searchCommand(
	session: LibrarySession,
	query: string,
	limit?: number,
	write: Writer = defaultWriter,
): Promise<SearchResults> {
	const results = await runSearch(session, query, limit, () =>
		write(chalk.yellow('Waiting for the library lock...')),
	);
	for (const line of formatSearchResults(results)) {
		write(line);
	}
	return results;
}

export async function statsCommand(
	session: LibrarySession,
	write: Writer = defaultWriter,
): Promise<void> {
	write(formatStoreStats(await loadStats(session)));
}

export async function booksCommand(
	session: LibrarySession,
	write: Writer = defaultWriter,
): Promise<void> {
	const books = await loadBooks(session);
	if (books.length === 0) {
		write(chalk.yellow('No books indexed yet.'));
		return;
	}
	for (const book of books) {
		write(`${formatBookLine(book)}\n  ${chalk.dim(book.filepath)}`);
	}
}
