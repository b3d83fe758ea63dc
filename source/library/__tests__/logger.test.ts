import fs from 'node:fs/promises';
import {describe, it, expect, beforeEach, afterEach} from 'vitest';
import {getServiceLogPath} from '../constants.js';
import {createServiceLogger, formatEntry} from '../logger/index.js';
import {createTempLibrary, type TestContext} from './helpers.js';

describe('formatEntry', () => {
	it('renders level, component and message on one line', () => {
		expect(formatEntry('warn', 'Indexer', 'Slow book')).toMatch(
			/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN \] Indexer: Slow book$/,
		);
	});

	it('appends data as JSON on its own line', () => {
		const [, data] = formatEntry('info', 'Indexer', 'Done', {success: 2}).split('\n');

		expect(data).toBe('  {"success":2}');
	});

	it('appends the message and stack of an error', () => {
		const error = new Error('disk full');
		const lines = formatEntry('error', 'BookStore', 'Write failed', error).split('\n');

		expect(lines[1]).toBe('  Error: disk full');
		expect(lines[2]).toBe(`  Stack: ${error.stack?.split('\n')[0]}`);
	});
});

describe('createServiceLogger', () => {
	let ctx: TestContext;

	beforeEach(async () => {
		ctx = await createTempLibrary();
	});

	afterEach(async () => {
		await ctx.cleanup();
	});

	it('appends entries to the hourly file of its service', async () => {
		const logger = createServiceLogger(ctx.libraryRoot, 'worker');

		logger.info('IndexingWorker', 'first');
		logger.debug('IndexingWorker', 'second', {n: 1});

		const content = await fs.readFile(getServiceLogPath(ctx.libraryRoot, 'worker'), 'utf-8');
		const lines = content.trimEnd().split('\n');
		expect(lines).toHaveLength(3);
		expect(lines[0]).toMatch(/\[INFO \] IndexingWorker: first$/);
		expect(lines[1]).toMatch(/\[DEBUG\] IndexingWorker: second$/);
		expect(lines[2]).toBe('  {"n":1}');
	});

	it('does not throw when the library directory cannot be written', async () => {
		const fileInTheWay = `${ctx.booksDir}/not-a-dir`;
		await fs.writeFile(fileInTheWay, '');
		const logger = createServiceLogger(fileInTheWay, 'cli');

		expect(() => logger.warn('Cli', 'nowhere to go')).not.toThrow();
	});
});
