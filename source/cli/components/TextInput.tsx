import React, {useState, useMemo} from 'react';
import {Box, Text, useInput} from 'ink';
import {useTextBuffer} from '../hooks/useTextBuffer.js';
import type {CommandInfo} from '../commands/handlers.js';
import CommandSuggestions from './CommandSuggestions.js';

type Props = {
	onSubmit: (text: string) => void;
	onCtrlC: () => void;
	commands?: readonly CommandInfo[];
	navigateHistoryUp?: (current: string) => string | null;
	navigateHistoryDown?: () => string | null;
	resetHistoryIndex?: () => void;
	/** Shown before the prompt, e.g. while background indexing runs */
	prefix?: string;
};

/**
 * Commands whose name starts with what was typed, while only the command
 * word has been typed.
 */
export function filterCommands(
	input: string,
	commands: readonly CommandInfo[],
): readonly CommandInfo[] {
	if (!input.startsWith('/') || /\s/.test(input)) return [];
	const lower = input.toLowerCase();
	return commands.filter(cmd => cmd.name.startsWith(lower));
}

export default function TextInput({
	onSubmit,
	onCtrlC,
	commands = [],
	navigateHistoryUp,
	navigateHistoryDown,
	resetHistoryIndex,
	prefix,
}: Props) {
	const {state, insert, deleteBefore, moveCursor, setText, clear} = useTextBuffer();
	const [selectedSuggestionIndex, setSelectedSuggestionIndex] = useState(0);

	const suggestions = useMemo(
		() => filterCommands(state.text, commands),
		[state.text, commands],
	);
	const suggestionsVisible = suggestions.length > 0;

	useInput((input, key) => {
		if (key.ctrl && input === 'c') {
			if (state.text) {
				clear();
				setSelectedSuggestionIndex(0);
			} else {
				onCtrlC();
			}
			return;
		}

		if (key.tab && suggestionsVisible) {
			const selected = suggestions[selectedSuggestionIndex];
			if (selected) {
				setText(selected.name + ' ');
				setSelectedSuggestionIndex(0);
			}
			return;
		}

		if (key.return) {
			let text = state.text;
			// Enter on a highlighted suggestion runs that command
			const selected = suggestionsVisible
				? suggestions[selectedSuggestionIndex]
				: undefined;
			if (selected && text !== selected.name) {
				text = selected.name;
			}

			if (text.trim()) {
				onSubmit(text);
				clear();
				setSelectedSuggestionIndex(0);
			}
			return;
		}

		if (key.backspace || key.delete) {
			deleteBefore();
			setSelectedSuggestionIndex(0);
			return;
		}

		if (key.upArrow) {
			if (suggestionsVisible) {
				setSelectedSuggestionIndex(i => Math.max(0, i - 1));
			} else if (navigateHistoryUp) {
				const previous = navigateHistoryUp(state.text);
				if (previous !== null) setText(previous);
			}
			return;
		}

		if (key.downArrow) {
			if (suggestionsVisible) {
				setSelectedSuggestionIndex(i => Math.min(suggestions.length - 1, i + 1));
			} else if (navigateHistoryDown) {
				const next = navigateHistoryDown();
				if (next !== null) setText(next);
			}
			return;
		}

		if (key.leftArrow) {
			moveCursor('left');
			return;
		}
		if (key.rightArrow) {
			moveCursor('right');
			return;
		}
		if (key.ctrl && input === 'a') {
			moveCursor('home');
			return;
		}
		if (key.ctrl && input === 'e') {
			moveCursor('end');
			return;
		}

		if (key.escape) {
			clear();
			setSelectedSuggestionIndex(0);
			return;
		}

		if (input && !key.ctrl && !key.meta) {
			resetHistoryIndex?.();
			insert(input);
			setSelectedSuggestionIndex(0);
		}
	});

	const before = state.text.slice(0, state.cursor);
	const cursorChar = state.text[state.cursor] ?? ' ';
	const after = state.text.slice(state.cursor + 1);

	return (
		<Box flexDirection="column">
			<Box borderStyle="round" borderColor="blue" paddingX={1}>
				{prefix && <Text dimColor>{prefix} </Text>}
				<Text color="blue">&gt; </Text>
				<Text>{before}</Text>
				<Text inverse>{cursorChar}</Text>
				<Text>{after}</Text>
			</Box>
			<CommandSuggestions
				suggestions={suggestions}
				selectedIndex={selectedSuggestionIndex}
			/>
		</Box>
	);
}
