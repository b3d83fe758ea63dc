import {useState, useCallback, useRef} from 'react';

/**
 * Shell-style input history. Walking up from the prompt keeps what was being
 * typed, and walking back down past the newest entry restores it.
 */
export function useCommandHistory() {
	const [history, setHistory] = useState<string[]>([]);
	// -1 = at the prompt, not browsing
	const position = useRef(-1);
	const draft = useRef('');

	const addToHistory = useCallback((entry: string) => {
		setHistory(prev =>
			!entry.trim() || prev[prev.length - 1] === entry ? prev : [...prev, entry],
		);
		position.current = -1;
		draft.current = '';
	}, []);

	const navigateUp = useCallback(
		(current: string): string | null => {
			if (history.length === 0) return null;

			if (position.current === -1) {
				draft.current = current;
				position.current = history.length - 1;
			} else if (position.current > 0) {
				position.current -= 1;
			}
			return history[position.current] ?? null;
		},
		[history],
	);

	const navigateDown = useCallback((): string | null => {
		if (position.current === -1) return null;

		if (position.current < history.length - 1) {
			position.current += 1;
			return history[position.current] ?? null;
		}
		position.current = -1;
		return draft.current;
	}, [history]);

	const resetPosition = useCallback(() => {
		position.current = -1;
	}, []);

	return {history, addToHistory, navigateUp, navigateDown, resetPosition};
}
