import React from 'react';
import {Box, Text} from 'ink';
import type {BookSummary} from '../../library/index.js';
import {formatBookLine} from '../commands/handlers.js';

type Props = {
	books: BookSummary[];
};

export default function BookList({books}: Props) {
	if (books.length === 0) {
		return <Text color="yellow">No books indexed yet. Use /index {'<path>'} to add some.</Text>;
	}

	return (
		<Box flexDirection="column">
			<Text bold>{books.length} indexed book(s):</Text>
			{books.map(book => (
				<Box key={book.documentId} flexDirection="column" marginLeft={2}>
					<Text color={book.chunkCount === book.totalChunks ? undefined : 'yellow'}>
						{formatBookLine(book)}
					</Text>
					<Text dimColor>  {book.filepath}</Text>
				</Box>
			))}
		</Box>
	);
}
