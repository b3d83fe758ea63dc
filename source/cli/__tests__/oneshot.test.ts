import path from 'node:path';
import {stripVTControlCharacters} from 'node:util';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {StoreLock} from '../../library/index.js';
import {
	createTempLibrary,
	prose,
	writeFb2,
	type TestContext,
} from '../../library/__tests__/helpers.js';
import {
	backgroundIndexCommand,
	booksCommand,
	formatSearchResults,
	indexCommand,
	searchCommand,
	statsCommand,
} from '../commands/oneshot.js';
import {LibrarySession} from '../session.js';

describe('one-shot commands', () => {
	let ctx: TestContext;
	let session: LibrarySession;
	let lines: string[];
	const write = (line: string) => lines.push(stripVTControlCharacters(line));

	beforeEach(async () => {
		ctx = await createTempLibrary();
		session = new LibrarySession(ctx.libraryRoot);
		lines = [];
	});

	afterEach(async () => {
		await session.close();
		await ctx.cleanup();
	});

	it('indexes in the foreground with one line per book', async () => {
		await writeFb2(ctx.booksDir, 'a.fb2', {title: 'Alpha', paragraphs: [prose('a', 5)]});
		await writeFb2(ctx.booksDir, 'b.fb2', {title: 'Beta', paragraphs: [prose('b', 5)]});

		const outcome = await indexCommand(session, ctx.booksDir, write);

		expect(outcome.stats).toEqual({success: 2, failed: 0, skipped: 0});
		expect(lines).toEqual([
			`Indexing books from: ${ctx.booksDir}`,
			`Using library: ${ctx.libraryRoot}`,
			'[1/2] a.fb2',
			'[2/2] b.fb2',
			'Indexing complete:\n  Successfully indexed: 2 book(s)',
		]);
		expect(await new StoreLock(ctx.libraryRoot).isLocked()).toBe(false);
	});

	it('searches, lists and counts what was indexed', async () => {
		await writeFb2(ctx.booksDir, 'a.fb2', {
			title: 'Alpha',
			firstName: 'Ann',
			lastName: 'Lee',
			paragraphs: ['A lighthouse keeper counts the ships.'],
		});
		await indexCommand(session, ctx.booksDir, () => {});

		const results = await searchCommand(
			session,
			'A lighthouse keeper counts the ships.',
			3,
			write,
		);
		expect(results.books).toHaveLength(1);
		expect(lines[2]).toBe(
			`1. Alpha by Ann Lee [FB2] ${((results.books[0]?.relevanceScore ?? 0) * 100).toFixed(1)}%`,
		);
		expect(lines[3]).toBe(`   ${path.join(ctx.booksDir, 'a.fb2')}`);
		expect(lines[4]).toBe('   A lighthouse keeper counts the ships.');

		lines = [];
		await booksCommand(session, write);
		expect(lines).toEqual([
			`Alpha by Ann Lee (FB2, 1 chunks)\n  ${path.join(ctx.booksDir, 'a.fb2')}`,
		]);

		lines = [];
		await statsCommand(session, write);
		expect(lines).toEqual([
			'Database statistics:\n  Collection: book_chunks\n  Indexed books: 1\n  Indexed chunks: 1',
		]);
	});

	it('reports an empty library', async () => {
		await booksCommand(session, write);

		expect(lines).toEqual(['No books indexed yet.']);
	});

	it('follows a background run to its end', async () => {
		await writeFb2(ctx.booksDir, 'a.fb2', {paragraphs: [prose('a', 5)]});

		const event = await backgroundIndexCommand(session, ctx.booksDir, write);

		expect(event).toEqual({
			phase: 'completed',
			message: 'Indexing completed successfully!',
			stats: {success: 1, failed: 0, skipped: 0},
		});
		expect(lines[0]).toBe('Initializing indexer...');
		expect(lines.at(-1)).toBe(
			'Background indexing completed!\n  Successfully indexed: 1 book(s)',
		);
	});
});

describe('formatSearchResults', () => {
	it('says when nothing matched', () => {
		expect(
			formatSearchResults({query: 'dragons', books: [], elapsedMs: 4}).map(line =>
				stripVTControlCharacters(line),
			),
		).toEqual(['No matching books found for "dragons".']);
	});
});
