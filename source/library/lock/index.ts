/**
 * StoreLock - cross-process exclusion for one library directory.
 *
 * The lock file `<library>/.db.lock` is created on first use and never deleted;
 * while the lock is held it contains the holder's pid. Ownership is held
 * through proper-lockfile's sentinel directory next to it, whose mtime the
 * holder refreshes. A holder that exits or is terminated by a catchable
 * signal removes the sentinel itself. One killed outright leaves it behind:
 * whoever saw it die can reclaim it at once with releaseAbandoned(), and
 * otherwise it goes stale after `staleMs` and the next acquirer takes over.
 *
 * Advisory only: code that touches the store without going through StoreLock
 * is not stopped.
 */

import fs from 'node:fs/promises';
import lockfile from 'proper-lockfile';
import {getLockPath} from '../constants.js';
import {LockError, LockTimeoutError, formatError} from '../errors.js';
import {createNullLogger, type Logger} from '../logger/index.js';

export interface StoreLockOptions {
	/** Delay between attempts while another process holds the lock (default: 500ms) */
	pollIntervalMs?: number;
	/** Age after which an unrefreshed lock is treated as abandoned (default: 10s) */
	staleMs?: number;
	/** Called once, on the first failed attempt of an acquire() call */
	onWait?: () => void;
	logger?: Logger;
}

const DEFAULT_POLL_INTERVAL_MS = 500;
const DEFAULT_STALE_MS = 10_000;

function isLockedError(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ELOCKED';
}

function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		// EPERM: it exists but belongs to someone else
		return error instanceof Error && 'code' in error && error.code === 'EPERM';
	}
}

function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Proof that this process holds the lock for one library.
 * Never persisted; release() is idempotent and never throws.
 */
export class LockToken {
	readonly lockPath: string;
	readonly acquiredAt: number;
	private releaseFn: (() => Promise<void>) | null;
	private wasCompromised = false;
	private readonly logger: Logger;

	constructor(
		lockPath: string,
		release: () => Promise<void>,
		logger: Logger,
	) {
		this.lockPath = lockPath;
		this.releaseFn = release;
		this.acquiredAt = Date.now();
		this.logger = logger;
	}

	get released(): boolean {
		return this.releaseFn === null;
	}

	/** True if another process took the lock over while we believed we held it */
	get compromised(): boolean {
		return this.wasCompromised;
	}

	markCompromised(): void {
		this.wasCompromised = true;
	}

	async release(): Promise<void> {
		const release = this.releaseFn;
		if (!release) return;
		this.releaseFn = null;

		try {
			await release();
			this.logger.debug('StoreLock', `Released ${this.lockPath}`);
		} catch (error) {
			// Already released by a compromise, or the library directory is gone
			this.logger.warn('StoreLock', `Release of ${this.lockPath} failed`, {
				error: formatError(error),
			});
		}
	}
}

/**
 * Mutual exclusion for one library directory across processes.
 */
export class StoreLock {
	readonly libraryRoot: string;
	readonly lockPath: string;
	/** proper-lockfile's sentinel directory */
	readonly sentinelPath: string;
	private readonly pollIntervalMs: number;
	private readonly staleMs: number;
	private readonly onWait?: () => void;
	private readonly logger: Logger;
	private token: LockToken | null = null;

	constructor(libraryRoot: string, options: StoreLockOptions = {}) {
		this.libraryRoot = libraryRoot;
		this.lockPath = getLockPath(libraryRoot);
		this.sentinelPath = `${this.lockPath}.lock`;
		this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
		this.staleMs = options.staleMs ?? DEFAULT_STALE_MS;
		this.onWait = options.onWait;
		this.logger = options.logger ?? createNullLogger();
	}

	/** True while this instance holds an unreleased token */
	get held(): boolean {
		return this.token !== null && !this.token.released;
	}

	/**
	 * Acquire the lock, polling while another process holds it.
	 *
	 * @param timeoutMs - Give up after this long; null or undefined waits forever
	 * @throws LockTimeoutError when the timeout elapses under contention
	 * @throws LockError when the lock file cannot be created or locked
	 */
	async acquire(timeoutMs: number | null = null): Promise<LockToken> {
		if (this.held) {
			throw new LockError(`Lock ${this.lockPath} is already held by this StoreLock`);
		}

		await this.ensureLockFile();

		const startedAt = Date.now();
		let notified = false;

		for (;;) {
			const token = await this.tryLock();
			if (token) {
				this.token = token;
				this.logger.info('StoreLock', `Acquired ${this.lockPath}`, {
					waitedMs: Date.now() - startedAt,
				});
				return token;
			}

			if (!notified) {
				notified = true;
				this.logger.info(
					'StoreLock',
					`Waiting for library lock at ${this.lockPath}`,
				);
				this.onWait?.();
			}

			const waited = Date.now() - startedAt;
			if (timeoutMs !== null && waited >= timeoutMs) {
				this.logger.warn('StoreLock', 'Gave up waiting for library lock', {
					waitedMs: waited,
				});
				throw new LockTimeoutError(this.libraryRoot, waited);
			}

			const delay =
				timeoutMs === null
					? this.pollIntervalMs
					: Math.min(this.pollIntervalMs, timeoutMs - waited);
			await sleep(delay);
		}
	}

	/**
	 * Release a token (defaults to the one this instance holds).
	 * No-op if there is nothing to release.
	 */
	async release(token?: LockToken): Promise<void> {
		const target = token ?? this.token;
		if (!target) return;
		if (target === this.token) {
			this.token = null;
		}
		await target.release();
	}

	/**
	 * Whether any process currently holds a fresh lock on this library.
	 */
	async isLocked(): Promise<boolean> {
		try {
			return await lockfile.check(this.lockPath, {
				stale: this.staleMs,
				realpath: false,
				lockfilePath: this.sentinelPath,
			});
		} catch (error) {
			throw new LockError(
				`Cannot check lock ${this.lockPath}: ${formatError(error)}`,
				{cause: error},
			);
		}
	}

	/**
	 * Pid recorded by the current holder, or null if none is recorded.
	 */
	async holderPid(): Promise<number | null> {
		let content: string;
		try {
			content = await fs.readFile(this.lockPath, 'utf-8');
		} catch {
			return null;
		}
		const pid = Number.parseInt(content.trim(), 10);
		return Number.isInteger(pid) && pid > 0 ? pid : null;
	}

	/**
	 * Free the lock left behind by `pid` if that process held it and is gone.
	 *
	 * Only for a holder known to have died without cleanup (SIGKILL): the
	 * sentinel then cannot be refreshed or taken by anyone else until it goes
	 * stale, so removing it races with nobody.
	 *
	 * @returns true if a lock was freed
	 */
	async releaseAbandoned(pid: number): Promise<boolean> {
		if ((await this.holderPid()) !== pid || isProcessAlive(pid)) {
			return false;
		}

		try {
			await fs.rm(this.sentinelPath, {recursive: true, force: true});
			await fs.writeFile(this.lockPath, '');
		} catch (error) {
			throw new LockError(
				`Cannot free lock ${this.lockPath} left by process ${pid}: ${formatError(error)}`,
				{cause: error},
			);
		}

		this.logger.warn('StoreLock', `Freed lock left by dead process ${pid}`);
		return true;
	}

	private async ensureLockFile(): Promise<void> {
		try {
			await fs.mkdir(this.libraryRoot, {recursive: true});
			// 'a' creates the file without truncating one that exists
			const handle = await fs.open(this.lockPath, 'a');
			await handle.close();
		} catch (error) {
			throw new LockError(
				`Cannot create lock file ${this.lockPath}: ${formatError(error)}`,
				{cause: error},
			);
		}
	}

	/**
	 * One non-blocking attempt. Returns null under contention.
	 */
	private async tryLock(): Promise<LockToken | null> {
		let token: LockToken | null = null;
		let releaseSentinel: () => Promise<void>;

		try {
			releaseSentinel = await lockfile.lock(this.lockPath, {
				stale: this.staleMs,
				retries: 0,
				realpath: false,
				lockfilePath: this.sentinelPath,
				onCompromised: err => {
					this.logger.warn('StoreLock', `Lock compromised: ${err.message}`);
					token?.markCompromised();
				},
			});
		} catch (error) {
			if (isLockedError(error)) {
				return null;
			}
			throw new LockError(
				`Cannot lock ${this.lockPath}: ${formatError(error)}`,
				{cause: error},
			);
		}

		try {
			await fs.writeFile(this.lockPath, `${process.pid}\n`);
		} catch (error) {
			await releaseSentinel();
			throw new LockError(
				`Cannot record holder in ${this.lockPath}: ${formatError(error)}`,
				{cause: error},
			);
		}

		const release = async (): Promise<void> => {
			// After a takeover the pid on record is the new holder's
			if (!token?.compromised && (await this.holderPid()) === process.pid) {
				await fs.writeFile(this.lockPath, '');
			}
			await releaseSentinel();
		};
		token = new LockToken(this.lockPath, release, this.logger);
		return token;
	}
}

export interface WithStoreLockOptions extends StoreLockOptions {
	timeoutMs?: number | null;
}

/**
 * Run `fn` while holding the library lock; the lock is released on every exit path.
 */
export async function withStoreLock<T>(
	libraryRoot: string,
	options: WithStoreLockOptions,
	fn: (token: LockToken) => Promise<T>,
): Promise<T> {
	const {timeoutMs = null, ...lockOptions} = options;
	const lock = new StoreLock(libraryRoot, lockOptions);
	const token = await lock.acquire(timeoutMs);
	try {
		return await fn(token);
	} finally {
		await lock.release(token);
	}
}
