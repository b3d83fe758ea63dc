import React from 'react';
import {Box, Text} from 'ink';
import Gradient from 'ink-gradient';
import BigText from 'ink-big-text';

type Props = {
	version: string;
	libraryRoot: string;
};

const EXAMPLE_QUERIES = [
	'books about artificial intelligence',
	'a sea voyage that goes wrong',
	'the history of Rome',
];

export default function WelcomeBanner({version, libraryRoot}: Props) {
	return (
		<Box flexDirection="column" paddingX={1}>
			<Gradient colors={['#F4A261', '#2A9D8F']}>
				<BigText text="Bookshelf" />
			</Gradient>

			<Box flexDirection="column" marginTop={1}>
				<Text dimColor>v{version}</Text>
				<Text dimColor>Library: {libraryRoot}</Text>
			</Box>

			<Box flexDirection="column" marginTop={1}>
				<Text>Ask about your books in plain language, for example:</Text>
				{EXAMPLE_QUERIES.map(query => (
					<Text key={query} color="cyan">
						{'  '}
						{query}
					</Text>
				))}
			</Box>

			<Box marginTop={1}>
				<Text dimColor>Type /help for available commands, /index {'<path>'} to add books</Text>
			</Box>
		</Box>
	);
}
