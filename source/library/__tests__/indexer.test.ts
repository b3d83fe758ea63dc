import fs from 'node:fs/promises';
import path from 'node:path';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {PathNotFoundError} from '../errors.js';
import {BookIndexer, findBooks} from '../indexer/indexer.js';
import {BookStore} from '../storage/index.js';
import {createTempLibrary, prose, writeEpub, writeFb2, type TestContext} from './helpers.js';

describe('findBooks', () => {
	let ctx: TestContext;

	beforeEach(async () => {
		ctx = await createTempLibrary();
	});

	afterEach(async () => {
		await ctx.cleanup();
	});

	it('finds supported books recursively, any case, sorted', async () => {
		await fs.mkdir(path.join(ctx.booksDir, 'nested', 'deeper'), {recursive: true});
		for (const name of [
			'b.fb2',
			'A.PDF',
			'nested/c.epub',
			'nested/deeper/d.Fb2',
			'notes.txt',
			'cover.jpg',
		]) {
			await fs.writeFile(path.join(ctx.booksDir, name), '');
		}

		const books = await findBooks(ctx.booksDir);

		expect(books).toEqual(
			['A.PDF', 'b.fb2', 'nested/c.epub', 'nested/deeper/d.Fb2'].map(name =>
				path.join(ctx.booksDir, name),
			),
		);
	});

	it('honours a narrower extension list', async () => {
		await fs.writeFile(path.join(ctx.booksDir, 'a.fb2'), '');
		await fs.writeFile(path.join(ctx.booksDir, 'b.epub'), '');

		expect(await findBooks(ctx.booksDir, ['.epub'])).toEqual([
			path.join(ctx.booksDir, 'b.epub'),
		]);
		expect(await findBooks(ctx.booksDir, [])).toEqual([]);
	});
});

describe('BookIndexer', () => {
	let ctx: TestContext;
	let store: BookStore;
	let indexer: BookIndexer;

	beforeEach(async () => {
		ctx = await createTempLibrary();
		store = await BookStore.open(ctx.libraryRoot);
		indexer = new BookIndexer(store);
	});

	afterEach(async () => {
		await store.close();
		await ctx.cleanup();
	});

	it('indexes a directory and counts failures without stopping', async () => {
		await writeFb2(ctx.booksDir, 'one.fb2', {title: 'One', paragraphs: [prose('one', 5)]});
		await writeEpub(ctx.booksDir, 'two.epub', {title: 'Two', chapters: [prose('two', 5)]});
		await fs.writeFile(path.join(ctx.booksDir, 'broken.fb2'), 'this is not a book');

		const progress: Array<[number, number, string]> = [];
		const outcome = await indexer.index(ctx.booksDir, {
			progressCallback: (current, total, file) => progress.push([current, total, file]),
		});

		expect(outcome).toEqual({
			status: 'completed',
			stats: {success: 2, failed: 1, skipped: 0},
		});
		expect(progress).toEqual([
			[1, 3, path.join(ctx.booksDir, 'broken.fb2')],
			[2, 3, path.join(ctx.booksDir, 'one.fb2')],
			[3, 3, path.join(ctx.booksDir, 'two.epub')],
		]);
		expect((await store.listBooks()).map(b => b.title)).toEqual(['One', 'Two']);
	});

	it('indexes a single file', async () => {
		const file = await writeFb2(ctx.booksDir, 'solo.fb2', {paragraphs: ['Alone.']});

		const outcome = await indexer.index(file);

		expect(outcome.stats).toEqual({success: 1, failed: 0, skipped: 0});
		expect(await store.isIndexed(file)).toBe(true);
	});

	it('counts a book without text as failed', async () => {
		await writeFb2(ctx.booksDir, 'empty.fb2', {title: 'Empty', paragraphs: []});

		const outcome = await indexer.index(ctx.booksDir);

		expect(outcome.stats).toEqual({success: 0, failed: 1, skipped: 0});
	});

	it('counts an already indexed book as a success on a second run', async () => {
		await writeFb2(ctx.booksDir, 'one.fb2', {paragraphs: [prose('one', 30)]});
		await indexer.index(ctx.booksDir);
		const {chunkCount} = await store.stats();

		const outcome = await indexer.index(ctx.booksDir);

		expect(outcome.stats).toEqual({success: 1, failed: 0, skipped: 0});
		expect((await store.stats()).chunkCount).toBe(chunkCount);
	});

	it('stops before the next book once asked to', async () => {
		for (const name of ['a.fb2', 'b.fb2', 'c.fb2']) {
			await writeFb2(ctx.booksDir, name, {paragraphs: [prose(name, 3)]});
		}

		let seen = 0;
		const outcome = await indexer.index(ctx.booksDir, {
			progressCallback: () => {
				seen += 1;
			},
			shouldStop: () => seen >= 2,
		});

		expect(outcome).toEqual({
			status: 'interrupted',
			stats: {success: 2, failed: 0, skipped: 0},
		});
		expect((await store.stats()).bookCount).toBe(2);
	});

	it('rejects a missing target', async () => {
		await expect(
			indexer.index(path.join(ctx.booksDir, 'nowhere')),
		).rejects.toBeInstanceOf(PathNotFoundError);
	});
});
