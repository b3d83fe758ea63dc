/**
 * Indexing worker - entry point of the process forked by IndexingSupervisor.
 *
 * Waits for one `start` message, indexes the job's target into the library
 * (holding the library lock for the whole run), reports progress as status
 * events, then exits. An `interrupt` message, SIGTERM or SIGINT stops the run
 * at the next book boundary.
 */

import fs from 'node:fs/promises';
import {loadConfig} from '../config/index.js';
import {
	PathNotFoundError,
	WorkerSetupError,
	formatError,
	toError,
} from '../errors.js';
import {BookIndexer} from '../indexer/indexer.js';
import {createServiceLogger, type Logger} from '../logger/index.js';
import {BookStore} from '../storage/index.js';
import {
	ownerToWorkerSchema,
	type IndexingJob,
	type StatusEvent,
	type WorkerToOwnerMessage,
} from './protocol.js';

let interruptRequested = false;
let storeOpen = false;
let started = false;

/**
 * Send a status event; resolves once it is handed to the IPC channel.
 * Never rejects: an owner that went away has nobody to tell.
 */
function report(event: StatusEvent): Promise<void> {
	const message: WorkerToOwnerMessage = {type: 'status', event};
	return new Promise(resolve => {
		if (!process.send || !process.connected) {
			resolve();
			return;
		}
		process.send(message, undefined, {}, () => resolve());
	});
}

async function targetKind(target: string): Promise<'directory' | 'file'> {
	try {
		return (await fs.stat(target)).isDirectory() ? 'directory' : 'file';
	} catch {
		throw new PathNotFoundError(target);
	}
}

async function runJob(job: IndexingJob, logger: Logger): Promise<number> {
	await report({phase: 'starting', message: 'Initializing indexer...'});

	let store: BookStore;
	let kind: 'directory' | 'file';
	try {
		kind = await targetKind(job.target);
		const config = await loadConfig(job.libraryRoot, logger);
		store = await BookStore.open(job.libraryRoot, {
			config,
			logger,
			onLockWait: () => {
				void report({
					phase: 'running',
					message: 'Waiting for library lock...',
				});
			},
		});
		storeOpen = true;
	} catch (error) {
		const setupError = new WorkerSetupError(formatError(error), {cause: error});
		logger.error('IndexingWorker', 'Setup failed', setupError);
		await report({
			phase: 'error',
			message: `Indexing failed: ${setupError.message}`,
			error: setupError.message,
		});
		return 1;
	}

	try {
		await report({
			phase: 'running',
			message: `Indexing ${kind}: ${job.target}`,
		});

		const indexer = new BookIndexer(store, logger);
		const outcome = await indexer.index(job.target, {
			shouldStop: () => interruptRequested,
			progressCallback: (current, total, file) => {
				void report({
					phase: 'running',
					message: `Indexing ${current}/${total}: ${file}`,
					progress: {current, total, file},
				});
			},
		});

		if (outcome.status === 'interrupted') {
			await report({
				phase: 'interrupted',
				message: 'Indexing interrupted',
				stats: outcome.stats,
			});
		} else {
			await report({
				phase: 'completed',
				message: 'Indexing completed successfully!',
				stats: outcome.stats,
			});
		}
		return 0;
	} catch (error) {
		logger.error('IndexingWorker', 'Indexing failed', toError(error));
		await report({
			phase: 'error',
			message: `Indexing failed: ${formatError(error)}`,
			error: formatError(error),
		});
		return 1;
	} finally {
		await store.close();
		storeOpen = false;
	}
}

function requestInterrupt(): void {
	interruptRequested = true;
	// Nothing to finish cleanly before the store is open (e.g. still waiting
	// for the lock): leave right away
	if (!storeOpen) {
		process.exit(0);
	}
}

process.on('SIGTERM', requestInterrupt);
process.on('SIGINT', requestInterrupt);
process.on('disconnect', requestInterrupt);

process.on('message', raw => {
	const parsed = ownerToWorkerSchema.safeParse(raw);
	if (!parsed.success) {
		return;
	}

	const message = parsed.data;
	switch (message.type) {
		case 'interrupt':
			requestInterrupt();
			return;
		case 'start': {
			if (started) return;
			started = true;
			const logger = createServiceLogger(message.job.libraryRoot, 'worker');
			logger.info('IndexingWorker', `Starting job for ${message.job.target}`);
			runJob(message.job, logger).then(
				code => process.exit(code),
				error => {
					logger.error('IndexingWorker', 'Unhandled failure', toError(error));
					process.exit(1);
				},
			);
			return;
		}
	}
});

if (!process.send) {
	console.error('The indexing worker must be started by IndexingSupervisor.');
	process.exit(1);
}
