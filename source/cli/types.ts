import type {BookSummary, SearchResults} from '../library/index.js';

/**
 * Output items for the REPL scrollback.
 */
export type OutputItem =
	| {id: string; type: 'user'; content: string}
	| {id: string; type: 'system'; content: string; color?: string}
	| {id: string; type: 'welcome'}
	| {id: string; type: 'search-results'; data: SearchResults}
	| {id: string; type: 'book-list'; books: BookSummary[]};

/**
 * Foreground status for the status bar.
 */
export type AppStatus =
	| {state: 'ready'}
	| {state: 'indexing'; current: number; total: number; file: string | null}
	| {state: 'searching'}
	| {state: 'working'; message: string}
	| {state: 'warning'; message: string};

/**
 * Background worker status for the status bar.
 * null when no worker is running.
 */
export type BackgroundStatus = {
	message: string;
	elapsedMs: number;
	current: number | null;
	total: number | null;
} | null;

export type TextBufferState = {
	text: string;
	cursor: number;
};
