/**
 * Messages exchanged between the IndexingSupervisor and its worker over
 * the child process IPC channel.
 *
 * Both sides validate what they receive; a malformed message is dropped
 * and logged rather than trusted.
 */

import {z} from 'zod';

// ============================================================================
// Status events (worker → owner)
// ============================================================================

const statsSchema = z.object({
	success: z.number().int().nonnegative(),
	failed: z.number().int().nonnegative(),
	skipped: z.number().int().nonnegative(),
});

export const statusEventSchema = z.discriminatedUnion('phase', [
	z.object({phase: z.literal('starting'), message: z.string()}),
	z.object({
		phase: z.literal('running'),
		message: z.string(),
		progress: z
			.object({
				current: z.number().int(),
				total: z.number().int(),
				file: z.string(),
			})
			.optional(),
	}),
	z.object({
		phase: z.literal('completed'),
		message: z.string(),
		stats: statsSchema,
	}),
	z.object({
		phase: z.literal('interrupted'),
		message: z.string(),
		stats: statsSchema,
	}),
	z.object({
		phase: z.literal('error'),
		message: z.string(),
		error: z.string(),
	}),
]);

/**
 * Progress of one background indexing run.
 * A run emits `starting`, any number of `running`, then exactly one of
 * `completed`, `interrupted` or `error`.
 */
export type StatusEvent = z.infer<typeof statusEventSchema>;

export type StatusPhase = StatusEvent['phase'];

/**
 * The event that ends a run.
 */
export type TerminalStatusEvent = Extract<
	StatusEvent,
	{phase: 'completed' | 'interrupted' | 'error'}
>;

/**
 * Whether an event ends its run.
 */
export function isTerminal(event: StatusEvent): event is TerminalStatusEvent {
	switch (event.phase) {
		case 'completed':
		case 'interrupted':
		case 'error':
			return true;
		case 'starting':
		case 'running':
			return false;
	}
}

// ============================================================================
// IPC messages
// ============================================================================

export const indexingJobSchema = z.object({
	/** File or directory to index */
	target: z.string().min(1),
	/** Library directory */
	libraryRoot: z.string().min(1),
});

export type IndexingJob = z.infer<typeof indexingJobSchema>;

export const ownerToWorkerSchema = z.discriminatedUnion('type', [
	z.object({type: z.literal('start'), job: indexingJobSchema}),
	z.object({type: z.literal('interrupt')}),
]);

export type OwnerToWorkerMessage = z.infer<typeof ownerToWorkerSchema>;

export const workerToOwnerSchema = z.object({
	type: z.literal('status'),
	event: statusEventSchema,
});

export type WorkerToOwnerMessage = z.infer<typeof workerToOwnerSchema>;
