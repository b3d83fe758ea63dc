import {useState, useCallback, useEffect, useRef} from 'react';
import {
	isTerminal,
	type IndexingSupervisor,
	type StatusEvent,
	type TerminalStatusEvent,
} from '../../library/index.js';
import type {BackgroundStatus} from '../types.js';

type Options = {
	/** Called once per finished background run */
	onFinished: (event: TerminalStatusEvent) => void;
	pollIntervalMs?: number;
};

/**
 * Drains the supervisor's status channel on a timer (and on demand, before
 * each command) and keeps a status-bar view of the running worker.
 */
export function useBackgroundIndexing(
	supervisor: IndexingSupervisor,
	{onFinished, pollIntervalMs = 500}: Options,
) {
	const [status, setStatus] = useState<BackgroundStatus>(null);
	const lastEvent = useRef<StatusEvent | null>(null);
	const onFinishedRef = useRef(onFinished);
	onFinishedRef.current = onFinished;

	const drain = useCallback(() => {
		const events = supervisor.drainAllStatus();
		for (const event of events) {
			lastEvent.current = event;
			if (isTerminal(event)) {
				onFinishedRef.current(event);
			}
		}

		if (!supervisor.isRunning()) {
			setStatus(null);
			return;
		}

		const latest = events[events.length - 1];
		const progress = latest?.phase === 'running' ? latest.progress : undefined;
		setStatus(prev => ({
			message: latest?.message ?? prev?.message ?? 'Starting...',
			elapsedMs: supervisor.elapsedTime() ?? 0,
			current: progress?.current ?? prev?.current ?? null,
			total: progress?.total ?? prev?.total ?? null,
		}));
	}, [supervisor]);

	useEffect(() => {
		const timer = setInterval(drain, pollIntervalMs);
		return () => clearInterval(timer);
	}, [drain, pollIntervalMs]);

	const getLastEvent = useCallback(() => lastEvent.current, []);

	return {status, drain, getLastEvent};
}
