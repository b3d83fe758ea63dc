import {fork, type ChildProcess} from 'node:child_process';
import {once} from 'node:events';
import fs from 'node:fs/promises';
import path from 'node:path';
import {fileURLToPath} from 'node:url';
import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import {LockError, LockTimeoutError} from '../errors.js';
import {StoreLock, withStoreLock} from '../lock/index.js';
import {createTempLibrary, type TestContext} from './helpers.js';

describe('StoreLock', () => {
	let ctx: TestContext;

	beforeEach(async () => {
		ctx = await createTempLibrary();
	});

	afterEach(async () => {
		await ctx.cleanup();
	});

	it('creates the lock file and keeps it after release', async () => {
		const lock = new StoreLock(ctx.libraryRoot);
		const token = await lock.acquire();

		expect(lock.held).toBe(true);
		await expect(
			fs.stat(path.join(ctx.libraryRoot, '.db.lock')),
		).resolves.toBeDefined();

		await lock.release();

		expect(token.released).toBe(true);
		expect(lock.held).toBe(false);
		const stat = await fs.stat(path.join(ctx.libraryRoot, '.db.lock'));
		expect(stat.isFile()).toBe(true);
	});

	it('makes a second holder wait until the first releases', async () => {
		const first = new StoreLock(ctx.libraryRoot);
		await first.acquire();

		const onWait = vi.fn();
		const second = new StoreLock(ctx.libraryRoot, {pollIntervalMs: 20, onWait});
		const pending = second.acquire(10_000);

		await new Promise(resolve => setTimeout(resolve, 200));
		const releasedAt = Date.now();
		await first.release();

		const token = await pending;
		expect(token.acquiredAt).toBeGreaterThanOrEqual(releasedAt);
		expect(onWait).toHaveBeenCalledTimes(1);

		await second.release();
	});

	it('times out while another holder keeps the lock', async () => {
		const first = new StoreLock(ctx.libraryRoot);
		await first.acquire();

		const second = new StoreLock(ctx.libraryRoot, {pollIntervalMs: 20});
		const error = await second.acquire(150).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(LockTimeoutError);
		expect(error).toMatchObject({code: 'LOCK_TIMEOUT'});
		expect(second.held).toBe(false);

		await first.release();
	});

	it('fails at once with a zero timeout under contention', async () => {
		const first = new StoreLock(ctx.libraryRoot);
		await first.acquire();

		const startedAt = Date.now();
		await expect(new StoreLock(ctx.libraryRoot).acquire(0)).rejects.toBeInstanceOf(
			LockTimeoutError,
		);
		expect(Date.now() - startedAt).toBeLessThan(500);

		await first.release();
	});

	it('can be taken again as soon as it is released', async () => {
		const first = new StoreLock(ctx.libraryRoot);
		await first.acquire();
		await first.release();

		const second = new StoreLock(ctx.libraryRoot);
		const token = await second.acquire(0);
		expect(token.released).toBe(false);
		await second.release();
	});

	it('releases idempotently', async () => {
		const lock = new StoreLock(ctx.libraryRoot);
		const token = await lock.acquire();

		await token.release();
		await token.release();
		await lock.release(token);
		await lock.release();

		expect(token.released).toBe(true);
	});

	it('treats release without a held lock as a no-op', async () => {
		const lock = new StoreLock(ctx.libraryRoot);
		await expect(lock.release()).resolves.toBeUndefined();
	});

	it('refuses to acquire twice through one instance', async () => {
		const lock = new StoreLock(ctx.libraryRoot);
		await lock.acquire();

		await expect(lock.acquire(0)).rejects.toBeInstanceOf(LockError);

		await lock.release();
	});

	it('reports whether the library is locked', async () => {
		const lock = new StoreLock(ctx.libraryRoot);
		await lock.acquire();
		expect(await new StoreLock(ctx.libraryRoot).isLocked()).toBe(true);

		await lock.release();
		expect(await new StoreLock(ctx.libraryRoot).isLocked()).toBe(false);
	});

	it('takes over a lock abandoned by a crashed holder', async () => {
		// What a killed holder leaves behind: the sentinel, no longer refreshed
		await fs.mkdir(ctx.libraryRoot, {recursive: true});
		await fs.writeFile(path.join(ctx.libraryRoot, '.db.lock'), '');
		const sentinel = path.join(ctx.libraryRoot, '.db.lock.lock');
		await fs.mkdir(sentinel);
		const longAgo = new Date(Date.now() - 60_000);
		await fs.utimes(sentinel, longAgo, longAgo);

		const lock = new StoreLock(ctx.libraryRoot, {staleMs: 5000});
		const token = await lock.acquire(0);

		expect(token.released).toBe(false);
		await lock.release();
	});

	it('raises LockError when the lock file cannot be created', async () => {
		const blocker = path.join(ctx.booksDir, 'not-a-directory');
		await fs.writeFile(blocker, '');

		const lock = new StoreLock(path.join(blocker, 'library'));
		const error = await lock.acquire(0).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(LockError);
		expect(error).toMatchObject({code: 'LOCK_FAILED'});
	});
});

describe('withStoreLock', () => {
	let ctx: TestContext;

	beforeEach(async () => {
		ctx = await createTempLibrary();
	});

	afterEach(async () => {
		await ctx.cleanup();
	});

	it('returns the callback result and releases the lock', async () => {
		const result = await withStoreLock(ctx.libraryRoot, {}, async token => {
			expect(token.released).toBe(false);
			return 42;
		});

		expect(result).toBe(42);
		expect(await new StoreLock(ctx.libraryRoot).isLocked()).toBe(false);
	});

	it('releases the lock when the callback throws', async () => {
		await expect(
			withStoreLock(ctx.libraryRoot, {}, async () => {
				throw new Error('boom');
			}),
		).rejects.toThrow('boom');

		const lock = new StoreLock(ctx.libraryRoot);
		await expect(lock.acquire(0)).resolves.toBeDefined();
		await lock.release();
	});
});

describe('StoreLock across processes', () => {
	const holderScript = fileURLToPath(
		new URL('./fixtures/lock-holder.ts', import.meta.url),
	);
	let ctx: TestContext;
	let holder: ChildProcess | null;

	/** Fork a process that takes the lock; resolves once it holds it */
	async function forkHolder(): Promise<ChildProcess> {
		const child = fork(holderScript, [ctx.libraryRoot], {
			execArgv: ['--import', 'tsx'],
			stdio: ['ignore', 'ignore', 'ignore', 'ipc'],
		});
		holder = child;
		await new Promise<void>((resolve, reject) => {
			child.once('message', message => {
				if (message === 'locked') resolve();
			});
			child.once('exit', code => {
				reject(new Error(`Lock holder exited early with code ${code}`));
			});
		});
		return child;
	}

	beforeEach(async () => {
		ctx = await createTempLibrary();
		holder = null;
	});

	afterEach(async () => {
		if (holder && holder.exitCode === null && holder.signalCode === null) {
			const exited = once(holder, 'exit');
			holder.kill('SIGKILL');
			await exited;
		}
		await ctx.cleanup();
	});

	it('makes this process wait until the other process releases', async () => {
		const child = await forkHolder();
		const lock = new StoreLock(ctx.libraryRoot, {pollIntervalMs: 20});

		expect(await lock.holderPid()).toBe(child.pid);
		await expect(
			new StoreLock(ctx.libraryRoot).acquire(0),
		).rejects.toBeInstanceOf(LockTimeoutError);

		const pending = lock.acquire(10_000);
		await new Promise(resolve => setTimeout(resolve, 100));
		expect(lock.held).toBe(false);

		child.send('release');
		const token = await pending;

		expect(token.released).toBe(false);
		expect(await lock.holderPid()).toBe(process.pid);
		await lock.release();
		expect(await lock.holderPid()).toBeNull();
	});

	it('frees at once a lock whose holder was killed outright', async () => {
		const child = await forkHolder();
		const pid = child.pid;
		if (pid === undefined) throw new Error('Lock holder has no pid');
		const exited = once(child, 'exit');
		child.kill('SIGKILL');
		await exited;

		const lock = new StoreLock(ctx.libraryRoot);
		// The sentinel outlives its holder until it goes stale
		await expect(lock.acquire(100)).rejects.toBeInstanceOf(LockTimeoutError);

		expect(await lock.releaseAbandoned(pid)).toBe(true);

		const token = await lock.acquire(0);
		expect(token.released).toBe(false);
		await lock.release();
	});

	it('leaves a lock alone while its holder is alive', async () => {
		const child = await forkHolder();
		const pid = child.pid;
		if (pid === undefined) throw new Error('Lock holder has no pid');
		const lock = new StoreLock(ctx.libraryRoot);

		expect(await lock.releaseAbandoned(pid)).toBe(false);
		expect(await lock.releaseAbandoned(process.pid)).toBe(false);
		expect(await lock.isLocked()).toBe(true);
	});
});
