import {useState, useCallback} from 'react';
import type {TextBufferState} from '../types.js';

const EMPTY: TextBufferState = {text: '', cursor: 0};

/**
 * Single-line edit buffer with a cursor.
 */
export function useTextBuffer() {
	const [state, setState] = useState<TextBufferState>(EMPTY);

	const insert = useCallback((chars: string) => {
		// Pasted text may carry line breaks; queries are one line
		const clean = chars.replace(/[\r\n]+/g, ' ');
		setState(prev => ({
			text: prev.text.slice(0, prev.cursor) + clean + prev.text.slice(prev.cursor),
			cursor: prev.cursor + clean.length,
		}));
	}, []);

	const deleteBefore = useCallback(() => {
		setState(prev =>
			prev.cursor === 0
				? prev
				: {
						text: prev.text.slice(0, prev.cursor - 1) + prev.text.slice(prev.cursor),
						cursor: prev.cursor - 1,
				  },
		);
	}, []);

	const moveCursor = useCallback((direction: 'left' | 'right' | 'home' | 'end') => {
		setState(prev => {
			switch (direction) {
				case 'left':
					return {...prev, cursor: Math.max(0, prev.cursor - 1)};
				case 'right':
					return {...prev, cursor: Math.min(prev.text.length, prev.cursor + 1)};
				case 'home':
					return {...prev, cursor: 0};
				case 'end':
					return {...prev, cursor: prev.text.length};
			}
		});
	}, []);

	const setText = useCallback((text: string) => {
		setState({text, cursor: text.length});
	}, []);

	const clear = useCallback(() => {
		setState(EMPTY);
	}, []);

	return {
		state,
		insert,
		deleteBefore,
		moveCursor,
		setText,
		clear,
	};
}
