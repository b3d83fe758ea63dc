import {useRef, useCallback, useEffect} from 'react';
import {useApp} from 'ink';

type Options = {
	/** Called on the first press; a second press within `windowMs` exits */
	onFirstPress: () => void;
	/** Called when the window passes without a second press */
	onWindowClosed: () => void;
	windowMs?: number;
};

/**
 * Double Ctrl+C to quit.
 */
export function useCtrlC({onFirstPress, onWindowClosed, windowMs = 2000}: Options) {
	const {exit} = useApp();
	const armed = useRef<ReturnType<typeof setTimeout> | null>(null);

	useEffect(() => {
		return () => {
			if (armed.current) clearTimeout(armed.current);
		};
	}, []);

	const handleCtrlC = useCallback(() => {
		if (armed.current) {
			clearTimeout(armed.current);
			armed.current = null;
			exit();
			return;
		}

		onFirstPress();
		armed.current = setTimeout(() => {
			armed.current = null;
			onWindowClosed();
		}, windowMs);
	}, [exit, onFirstPress, onWindowClosed, windowMs]);

	return {handleCtrlC};
}
