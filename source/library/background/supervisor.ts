/**
 * IndexingSupervisor - runs indexing in a forked worker process.
 *
 * The owner (CLI, REPL) keeps full control of its own event loop: it starts
 * a run, then polls the status channel whenever convenient. At most one
 * worker runs per supervisor. The worker opens the store (and takes the
 * library lock) itself, so a search in the owner simply waits for the lock.
 */

import {fork, type ChildProcess} from 'node:child_process';
import path from 'node:path';
import {fileURLToPath} from 'node:url';
import {formatError, toError} from '../errors.js';
import {StoreLock} from '../lock/index.js';
import {createNullLogger, type Logger} from '../logger/index.js';
import {StatusChannel} from './channel.js';
import {
	isTerminal,
	workerToOwnerSchema,
	type OwnerToWorkerMessage,
	type StatusEvent,
} from './protocol.js';

export interface IndexingSupervisorOptions {
	/** Time a stopping worker gets to exit before SIGKILL (default: 2000ms) */
	graceMs?: number;
	/** Node executable for the worker (default: the current one) */
	execPath?: string;
	logger?: Logger;
}

const DEFAULT_GRACE_MS = 2000;

interface WorkerEntry {
	modulePath: string;
	execArgv: string[];
}

/**
 * Locate the worker module next to this one.
 * When running from TypeScript sources the worker is loaded through tsx.
 */
function resolveWorkerEntry(): WorkerEntry {
	const here = fileURLToPath(import.meta.url);
	const fromSources = path.extname(here) === '.ts';
	return {
		modulePath: path.join(
			path.dirname(here),
			fromSources ? 'worker.ts' : 'worker.js',
		),
		execArgv: fromSources ? ['--import', 'tsx'] : [],
	};
}

/**
 * Format a duration as "42s" or "3m 5s".
 */
export function formatElapsed(ms: number): string {
	const totalSeconds = Math.floor(ms / 1000);
	if (totalSeconds < 60) {
		return `${totalSeconds}s`;
	}
	const minutes = Math.floor(totalSeconds / 60);
	return `${minutes}m ${totalSeconds % 60}s`;
}

export class IndexingSupervisor {
	private readonly channel = new StatusChannel<StatusEvent>();
	private readonly graceMs: number;
	private readonly execPath: string | undefined;
	private readonly logger: Logger;
	private child: ChildProcess | null = null;
	private exited: Promise<void> = Promise.resolve();
	private startTime: number | null = null;
	private stopRequested = false;
	private sawTerminal = false;

	constructor(options: IndexingSupervisorOptions = {}) {
		this.graceMs = options.graceMs ?? DEFAULT_GRACE_MS;
		this.execPath = options.execPath;
		this.logger = options.logger ?? createNullLogger();
	}

	/**
	 * Start indexing `target` into the library at `libraryRoot`.
	 * @returns false if a worker is already running
	 */
	startIndexing(target: string, libraryRoot: string): boolean {
		if (this.isRunning()) {
			return false;
		}

		this.channel.clear();
		this.stopRequested = false;
		this.sawTerminal = false;

		const job = {
			target: path.resolve(target),
			libraryRoot: path.resolve(libraryRoot),
		};
		const entry = resolveWorkerEntry();
		const child = fork(entry.modulePath, [], {
			execArgv: entry.execArgv,
			execPath: this.execPath,
			stdio: ['ignore', 'ignore', 'ignore', 'ipc'],
		});

		this.child = child;
		this.startTime = Date.now();
		this.exited = new Promise<void>(resolve => {
			// A failed spawn emits 'error' and may still emit 'close'
			let handled = false;
			const finish = (code: number | null, signal: NodeJS.Signals | null) => {
				if (handled) return;
				handled = true;
				this.handleExit(child, code, signal);
				this.reclaimLock(child, job.libraryRoot, signal).then(resolve, error => {
					this.logger.error(
						'IndexingSupervisor',
						'Could not free the lock of a killed worker',
						toError(error),
					);
					resolve();
				});
			};

			// 'close' (not 'exit') fires only after the IPC channel has delivered
			// every message the worker sent
			child.once('close', finish);
			child.once('error', error => {
				this.logger.error('IndexingSupervisor', 'Worker process error', error);
				if (child.pid === undefined) {
					finish(null, null);
				}
			});
		});

		child.on('message', message => this.handleMessage(child, message));

		this.send(child, {type: 'start', job});
		this.logger.info('IndexingSupervisor', `Started worker ${child.pid}`, job);

		return true;
	}

	/**
	 * True while the current worker has neither exited nor been killed.
	 */
	isRunning(): boolean {
		const child = this.child;
		return (
			child !== null &&
			child.pid !== undefined &&
			child.exitCode === null &&
			child.signalCode === null
		);
	}

	/**
	 * Oldest unread status event, or null. Never blocks.
	 */
	pollStatus(): StatusEvent | null {
		return this.channel.poll();
	}

	/**
	 * Every unread status event, oldest first. Never blocks.
	 */
	drainAllStatus(): StatusEvent[] {
		return this.channel.drain();
	}

	/**
	 * Wait for the next status event; null on timeout.
	 */
	nextStatus(timeoutMs?: number): Promise<StatusEvent | null> {
		return this.channel.pull(timeoutMs);
	}

	/**
	 * Milliseconds since the current run started, or null if none was started.
	 */
	elapsedTime(): number | null {
		return this.startTime === null ? null : Date.now() - this.startTime;
	}

	/**
	 * Resolves when the current worker (if any) has exited and all its
	 * messages are in the channel.
	 */
	waitForExit(): Promise<void> {
		return this.exited;
	}

	/**
	 * Ask the worker to stop at the next book boundary; kill it if it has not
	 * exited within the grace period. Always leaves the supervisor idle.
	 */
	async stop(): Promise<void> {
		const child = this.child;

		if (child && this.isRunning()) {
			this.stopRequested = true;
			this.logger.info('IndexingSupervisor', `Stopping worker ${child.pid}`);

			this.send(child, {type: 'interrupt'});
			child.kill('SIGTERM');

			let timer: ReturnType<typeof setTimeout> | undefined;
			const exitedInTime = await Promise.race([
				this.exited.then(() => true),
				new Promise<boolean>(resolve => {
					timer = setTimeout(() => resolve(false), this.graceMs);
				}),
			]);
			clearTimeout(timer);

			if (!exitedInTime) {
				this.logger.warn(
					'IndexingSupervisor',
					`Worker ${child.pid} ignored stop request; killing`,
				);
				child.kill('SIGKILL');
			}
		}

		// Also when the worker already exited: its last messages may still be
		// in flight until 'close'
		await this.exited;
		this.child = null;
		this.startTime = null;
	}

	private send(child: ChildProcess, message: OwnerToWorkerMessage): void {
		if (!child.connected) return;
		child.send(message, error => {
			if (error) {
				this.logger.warn('IndexingSupervisor', 'Failed to message worker', {
					type: message.type,
					error: formatError(error),
				});
			}
		});
	}

	private handleMessage(child: ChildProcess, raw: unknown): void {
		if (child !== this.child) return;

		const parsed = workerToOwnerSchema.safeParse(raw);
		if (!parsed.success) {
			this.logger.warn('IndexingSupervisor', 'Dropped malformed worker message', {
				issues: parsed.error.issues.map(issue => issue.message),
			});
			return;
		}

		const {event} = parsed.data;
		if (isTerminal(event)) {
			this.sawTerminal = true;
		}
		this.channel.push(event);
	}

	/**
	 * A worker killed with SIGKILL cannot remove its lock sentinel; free it now
	 * instead of leaving the library locked until the lock goes stale.
	 */
	private async reclaimLock(
		child: ChildProcess,
		libraryRoot: string,
		signal: NodeJS.Signals | null,
	): Promise<void> {
		if (signal !== 'SIGKILL' || child.pid === undefined) return;
		const lock = new StoreLock(libraryRoot, {logger: this.logger});
		await lock.releaseAbandoned(child.pid);
	}

	private handleExit(
		child: ChildProcess,
		code: number | null,
		signal: NodeJS.Signals | null,
	): void {
		if (child !== this.child) return;

		this.logger.info('IndexingSupervisor', `Worker ${child.pid} exited`, {
			code,
			signal,
		});

		if (!this.sawTerminal && !this.stopRequested) {
			const detail = `code ${code ?? 'none'}, signal ${signal ?? 'none'}`;
			this.channel.push({
				phase: 'error',
				message: `Indexing worker exited unexpectedly (${detail})`,
				error: `Worker exited without reporting a result (${detail})`,
			});
		}
	}
}
