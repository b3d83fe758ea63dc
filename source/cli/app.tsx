import React, {useState, useCallback} from 'react';
import {Box, Static, Text, useStdout} from 'ink';
import type {
	BookSummary,
	SearchResults,
	TerminalStatusEvent,
} from '../library/index.js';
import TextInput from './components/TextInput.js';
import StatusBar from './components/StatusBar.js';
import WelcomeBanner from './components/WelcomeBanner.js';
import BookResults from './components/BookResults.js';
import BookList from './components/BookList.js';
import {useCtrlC} from './hooks/useCtrlC.js';
import {useCommandHistory} from './hooks/useCommandHistory.js';
import {useBackgroundIndexing} from './hooks/useBackgroundIndexing.js';
import {useLibraryCommands} from './commands/useLibraryCommands.js';
import {COMMANDS, describeTerminalEvent, type Tone} from './commands/handlers.js';
import type {LibrarySession} from './session.js';
import type {AppStatus, OutputItem} from './types.js';

type Props = {
	session: LibrarySession;
	version: string;
};

const TONE_COLORS: Record<Tone, string> = {
	success: 'green',
	warning: 'yellow',
	error: 'red',
};

// Module-level counter for unique IDs
let nextId = 0;

export default function App({session, version}: Props) {
	const [outputItems, setOutputItems] = useState<OutputItem[]>([
		{id: 'welcome', type: 'welcome'},
	]);
	const [appStatus, setAppStatus] = useState<AppStatus>({state: 'ready'});
	const {stdout} = useStdout();

	const {addToHistory, navigateUp, navigateDown, resetPosition} =
		useCommandHistory();

	const addOutput = useCallback((content: string, color?: string) => {
		const id = String(nextId++);
		setOutputItems(prev => [...prev, {id, type: 'system', content, color}]);
	}, []);

	const addSearchResults = useCallback((data: SearchResults) => {
		const id = String(nextId++);
		setOutputItems(prev => [...prev, {id, type: 'search-results', data}]);
	}, []);

	const addBookList = useCallback((books: BookSummary[]) => {
		const id = String(nextId++);
		setOutputItems(prev => [...prev, {id, type: 'book-list', books}]);
	}, []);

	const onBackgroundFinished = useCallback(
		(event: TerminalStatusEvent) => {
			const {text, tone} = describeTerminalEvent(event);
			addOutput(text, TONE_COLORS[tone]);
		},
		[addOutput],
	);

	const background = useBackgroundIndexing(session.supervisor, {
		onFinished: onBackgroundFinished,
	});

	const {handleCtrlC} = useCtrlC({
		onFirstPress: useCallback(
			() => setAppStatus({state: 'warning', message: 'Press Ctrl+C again to quit'}),
			[],
		),
		onWindowClosed: useCallback(() => setAppStatus({state: 'ready'}), []),
	});

	const {executeInput} = useLibraryCommands({
		session,
		addOutput,
		addSearchResults,
		addBookList,
		setAppStatus,
		drainBackground: background.drain,
		getLastBackgroundEvent: background.getLastEvent,
		stdout,
	});

	const handleSubmit = (text: string) => {
		if (!text.trim()) return;
		addToHistory(text);
		setOutputItems(prev => [
			...prev,
			{id: String(nextId++), type: 'user', content: text},
		]);
		executeInput(text);
	};

	return (
		<Box flexDirection="column">
			<Static items={outputItems}>
				{item => {
					switch (item.type) {
						case 'welcome':
							return (
								<Box key={item.id} marginBottom={1}>
									<WelcomeBanner version={version} libraryRoot={session.libraryRoot} />
								</Box>
							);
						case 'search-results':
							return (
								<Box key={item.id} paddingX={1} marginBottom={1}>
									<BookResults data={item.data} />
								</Box>
							);
						case 'book-list':
							return (
								<Box key={item.id} paddingX={1} marginBottom={1}>
									<BookList books={item.books} />
								</Box>
							);
						case 'user':
							return (
								<Box key={item.id} paddingX={1} marginBottom={1}>
									<Text color="cyan">&gt; {item.content}</Text>
								</Box>
							);
						case 'system':
							return (
								<Box key={item.id} paddingX={1} marginBottom={1}>
									<Text color={item.color}>{item.content}</Text>
								</Box>
							);
					}
				}}
			</Static>

			<StatusBar status={appStatus} background={background.status} />

			<TextInput
				onSubmit={handleSubmit}
				onCtrlC={handleCtrlC}
				commands={COMMANDS}
				navigateHistoryUp={navigateUp}
				navigateHistoryDown={navigateDown}
				resetHistoryIndex={resetPosition}
				prefix={background.status ? '⏳ Indexing...' : undefined}
			/>
		</Box>
	);
}
