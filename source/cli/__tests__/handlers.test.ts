import os from 'node:os';
import path from 'node:path';
import {describe, it, expect} from 'vitest';
import type {BookSummary} from '../../library/index.js';
import {
	describeTerminalEvent,
	formatBookLine,
	formatIndexingStatus,
	formatIndexOutcome,
	formatScore,
	formatStoreStats,
	getHelpText,
	parseCommand,
	resolveUserPath,
} from '../commands/handlers.js';

describe('parseCommand', () => {
	it('splits the command word from its argument', () => {
		expect(parseCommand('/index  ~/books ')).toEqual({name: '/index', argument: '~/books'});
		expect(parseCommand('/search two words')).toEqual({
			name: '/search',
			argument: 'two words',
		});
	});

	it('lower-cases the command word only', () => {
		expect(parseCommand('/INDEX-BG /Books/Sci-Fi')).toEqual({
			name: '/index-bg',
			argument: '/Books/Sci-Fi',
		});
		expect(parseCommand('/stats')).toEqual({name: '/stats', argument: ''});
	});
});

describe('resolveUserPath', () => {
	it('expands the home directory', () => {
		expect(resolveUserPath('~')).toBe(os.homedir());
		expect(resolveUserPath('~/Books')).toBe(path.join(os.homedir(), 'Books'));
	});

	it('resolves relative paths against the working directory', () => {
		expect(resolveUserPath('shelf/a.fb2')).toBe(path.resolve('shelf/a.fb2'));
	});
});

describe('formatIndexOutcome', () => {
	it('summarizes a completed run, with failures when there were any', () => {
		expect(
			formatIndexOutcome({status: 'completed', stats: {success: 2, failed: 1, skipped: 0}}),
		).toBe('Indexing complete:\n  Successfully indexed: 2 book(s)\n  Failed: 1 book(s)');
		expect(
			formatIndexOutcome({status: 'completed', stats: {success: 4, failed: 0, skipped: 0}}),
		).toBe('Indexing complete:\n  Successfully indexed: 4 book(s)');
	});

	it('summarizes an interrupted run as saved progress', () => {
		expect(
			formatIndexOutcome({status: 'interrupted', stats: {success: 3, failed: 0, skipped: 0}}),
		).toBe('Indexing interrupted:\n  Progress saved: 3 book(s)');
	});
});

describe('describeTerminalEvent', () => {
	it('gives each ending its own tone', () => {
		expect(
			describeTerminalEvent({
				phase: 'completed',
				message: 'Indexing completed successfully!',
				stats: {success: 1, failed: 0, skipped: 0},
			}),
		).toEqual({
			text: 'Background indexing completed!\n  Successfully indexed: 1 book(s)',
			tone: 'success',
		});
		expect(
			describeTerminalEvent({
				phase: 'interrupted',
				message: 'Indexing interrupted',
				stats: {success: 2, failed: 1, skipped: 0},
			}),
		).toEqual({
			text: 'Background indexing was interrupted\n  Progress saved: 2 book(s)\n  Failed: 1 book(s)',
			tone: 'warning',
		});
		expect(
			describeTerminalEvent({
				phase: 'error',
				message: 'Indexing failed: boom',
				error: 'boom',
			}),
		).toEqual({
			text: 'Background indexing failed:\n  Indexing failed: boom',
			tone: 'error',
		});
	});
});

describe('formatIndexingStatus', () => {
	it('shows elapsed time and the latest message while running', () => {
		expect(
			formatIndexingStatus(true, 65_000, {
				phase: 'running',
				message: 'Indexing 3/10: /books/x.fb2',
			}),
		).toBe(
			'Background indexing status:\n' +
				'  Status: Running\n' +
				'  Elapsed time: 1m 5s\n' +
				'  Current: Indexing 3/10: /books/x.fb2',
		);
	});

	it('repeats the ending of the last run once idle', () => {
		expect(
			formatIndexingStatus(false, null, {
				phase: 'error',
				message: 'Indexing failed: boom',
				error: 'boom',
			}),
		).toBe('Background indexing failed:\n  Indexing failed: boom');
	});

	it('says so when nothing ran', () => {
		expect(formatIndexingStatus(false, null, null)).toBe(
			'No background indexing is currently running.',
		);
		expect(
			formatIndexingStatus(false, null, {phase: 'starting', message: 'Initializing indexer...'}),
		).toBe('No background indexing is currently running.');
	});
});

describe('formatters', () => {
	const book: BookSummary = {
		documentId: 'abc',
		title: 'Sea Tales',
		author: 'Ann Lee',
		filename: 'sea.fb2',
		filepath: '/books/sea.fb2',
		format: 'fb2',
		length: 5000,
		chunkCount: 7,
		totalChunks: 7,
	};

	it('formats a book line, flagging partial books', () => {
		expect(formatBookLine(book)).toBe('Sea Tales by Ann Lee (FB2, 7 chunks)');
		expect(formatBookLine({...book, chunkCount: 3})).toBe(
			'Sea Tales by Ann Lee (FB2, 3/7 chunks, partial)',
		);
	});

	it('formats store statistics', () => {
		expect(formatStoreStats({tableName: 'book_chunks', chunkCount: 12, bookCount: 2})).toBe(
			'Database statistics:\n' +
				'  Collection: book_chunks\n' +
				'  Indexed books: 2\n' +
				'  Indexed chunks: 12',
		);
	});

	it('formats scores as percentages', () => {
		expect(formatScore(0.8734)).toBe('87.3%');
		expect(formatScore(1)).toBe('100.0%');
	});

	it('lists every command in the help text', () => {
		const help = getHelpText();

		expect(help).toContain(`  ${'/books'.padEnd(16)}  List indexed books`);
		expect(help).toContain(
			`  ${'/index-bg <path>'}  Index a book file or directory in the background`,
		);
	});
});
