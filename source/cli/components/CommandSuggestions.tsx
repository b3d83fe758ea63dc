import React from 'react';
import {Box, Text} from 'ink';
import type {CommandInfo} from '../commands/handlers.js';

type Props = {
	suggestions: readonly CommandInfo[];
	selectedIndex: number;
};

/**
 * Matching slash commands under the prompt, with the selected one highlighted.
 */
export default function CommandSuggestions({suggestions, selectedIndex}: Props) {
	if (suggestions.length === 0) {
		return null;
	}

	const width = Math.max(...suggestions.map(s => s.usage.length));

	return (
		<Box flexDirection="column" marginLeft={2}>
			{suggestions.map((suggestion, index) => {
				const selected = index === selectedIndex;
				return (
					<Box key={suggestion.name}>
						<Text color={selected ? 'cyan' : undefined} inverse={selected}>
							{` ${suggestion.usage.padEnd(width)} `}
						</Text>
						<Text dimColor> {suggestion.description}</Text>
					</Box>
				);
			})}
		</Box>
	);
}
