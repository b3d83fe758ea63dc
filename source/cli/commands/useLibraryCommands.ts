/**
 * REPL input handling hook.
 * Free text is a search; slash commands are routed to the handlers.
 */

import fs from 'node:fs/promises';
import {useCallback, useRef} from 'react';
import {useApp} from 'ink';
import {
	formatError,
	type BookSummary,
	type SearchResults,
	type StatusEvent,
} from '../../library/index.js';
import type {LibrarySession} from '../session.js';
import type {AppStatus} from '../types.js';
import {
	formatIndexingStatus,
	formatIndexOutcome,
	formatStoreStats,
	getHelpText,
	loadBooks,
	loadStats,
	parseCommand,
	resetLibrary,
	resolveUserPath,
	runIndex,
	runSearch,
} from './handlers.js';

type LibraryCommandContext = {
	session: LibrarySession;
	addOutput: (content: string, color?: string) => void;
	addSearchResults: (data: SearchResults) => void;
	addBookList: (books: BookSummary[]) => void;
	setAppStatus: (status: AppStatus) => void;
	/** Shows pending background updates */
	drainBackground: () => void;
	getLastBackgroundEvent: () => StatusEvent | null;
	stdout: NodeJS.WriteStream;
};

const EMPTY_LIBRARY_HINT =
	'The library is empty. Use /index <path> to add books.';

async function pathExists(target: string): Promise<boolean> {
	try {
		await fs.access(target);
		return true;
	} catch {
		return false;
	}
}

export function useLibraryCommands({
	session,
	addOutput,
	addSearchResults,
	addBookList,
	setAppStatus,
	drainBackground,
	getLastBackgroundEvent,
	stdout,
}: LibraryCommandContext) {
	const {exit} = useApp();
	const busy = useRef(false);
	const resetRequested = useRef(false);

	const onLockWait = useCallback(() => {
		setAppStatus({
			state: 'warning',
			message: 'Waiting for the library lock (held by background indexing)...',
		});
	}, [setAppStatus]);

	/**
	 * Run one foreground task at a time; report its failure instead of throwing.
	 */
	const run = useCallback(
		(task: () => Promise<void>) => {
			if (busy.current) {
				addOutput('Still working on the previous command.', 'yellow');
				return;
			}
			busy.current = true;
			void task()
				.catch(error => addOutput(`Error: ${formatError(error)}`, 'red'))
				.finally(() => {
					busy.current = false;
					setAppStatus({state: 'ready'});
				});
		},
		[addOutput, setAppStatus],
	);

	const handleSearch = useCallback(
		(query: string) => {
			run(async () => {
				setAppStatus({state: 'searching'});
				const results = await runSearch(session, query, undefined, onLockWait);
				if (results.books.length === 0) {
					const stats = await loadStats(session, onLockWait);
					if (stats.chunkCount === 0) {
						addOutput(EMPTY_LIBRARY_HINT, 'yellow');
						return;
					}
				}
				addSearchResults(results);
			});
		},
		[run, session, onLockWait, setAppStatus, addOutput, addSearchResults],
	);

	const handleIndex = useCallback(
		(argument: string) => {
			if (!argument) {
				addOutput('Usage: /index <file_or_directory>', 'red');
				return;
			}
			run(async () => {
				setAppStatus({state: 'indexing', current: 0, total: 0, file: null});
				const outcome = await runIndex(session, resolveUserPath(argument), {
					onProgress: (current, total, file) =>
						setAppStatus({state: 'indexing', current, total, file}),
					onLockWait,
				});
				addOutput(formatIndexOutcome(outcome), 'green');
			});
		},
		[run, session, onLockWait, setAppStatus, addOutput],
	);

	const handleIndexBackground = useCallback(
		(argument: string) => {
			if (!argument) {
				addOutput('Usage: /index-bg <file_or_directory>', 'red');
				return;
			}
			run(async () => {
				const target = resolveUserPath(argument);
				if (!(await pathExists(target))) {
					addOutput(`Error: Path '${argument}' does not exist`, 'red');
					return;
				}
				if (!session.startBackgroundIndexing(target)) {
					addOutput(
						'Background indexing is already running! Use /index-status to check progress.',
						'yellow',
					);
					return;
				}
				addOutput(
					`✓ Started background indexing: ${target}\n` +
						'Use /index-status to check progress. Searches wait until it finishes.',
					'green',
				);
			});
		},
		[run, session, addOutput],
	);

	const handleIndexStatus = useCallback(() => {
		drainBackground();
		const {supervisor} = session;
		addOutput(
			formatIndexingStatus(
				supervisor.isRunning(),
				supervisor.elapsedTime(),
				getLastBackgroundEvent(),
			),
		);
	}, [session, drainBackground, getLastBackgroundEvent, addOutput]);

	const handleBooks = useCallback(() => {
		run(async () => {
			setAppStatus({state: 'working', message: 'Loading books'});
			addBookList(await loadBooks(session, onLockWait));
		});
	}, [run, session, onLockWait, setAppStatus, addBookList]);

	const handleStats = useCallback(() => {
		run(async () => {
			setAppStatus({state: 'working', message: 'Loading statistics'});
			addOutput(formatStoreStats(await loadStats(session, onLockWait)));
		});
	}, [run, session, onLockWait, setAppStatus, addOutput]);

	const handleReset = useCallback(
		(confirmed: boolean) => {
			if (!confirmed) {
				addOutput(
					'This deletes every indexed book. Run /reset again to confirm.',
					'yellow',
				);
				return;
			}
			run(async () => {
				setAppStatus({state: 'working', message: 'Resetting library'});
				await resetLibrary(session, onLockWait);
				addOutput('Library reset: every indexed book was removed.', 'green');
			});
		},
		[run, session, onLockWait, setAppStatus, addOutput],
	);

	const handleClear = useCallback(() => {
		// Clear screen, scrollback, cursor home
		stdout.write('\x1B[2J\x1B[3J\x1B[H');
	}, [stdout]);

	const executeInput = useCallback(
		(text: string) => {
			drainBackground();

			const trimmed = text.trim();
			if (!trimmed.startsWith('/')) {
				resetRequested.current = false;
				handleSearch(trimmed);
				return;
			}

			const {name, argument} = parseCommand(trimmed);
			const confirmingReset = resetRequested.current && name === '/reset';
			resetRequested.current = name === '/reset' && !confirmingReset;

			switch (name) {
				case '/help':
					addOutput(getHelpText());
					break;
				case '/index':
					handleIndex(argument);
					break;
				case '/index-bg':
					handleIndexBackground(argument);
					break;
				case '/index-status':
					handleIndexStatus();
					break;
				case '/books':
					handleBooks();
					break;
				case '/stats':
					handleStats();
					break;
				case '/reset':
					handleReset(confirmingReset);
					break;
				case '/clear':
					handleClear();
					break;
				case '/quit':
				case '/exit':
					exit();
					break;
				default:
					addOutput(
						`Unknown command: ${name}. Type /help for available commands.`,
						'red',
					);
			}
		},
		[
			exit,
			addOutput,
			drainBackground,
			handleSearch,
			handleIndex,
			handleIndexBackground,
			handleIndexStatus,
			handleBooks,
			handleStats,
			handleReset,
			handleClear,
		],
	);

	return {executeInput};
}
