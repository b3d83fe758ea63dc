/**
 * Ranked book list for a search.
 */

import React from 'react';
import {Box, Text, useStdout} from 'ink';
import type {RankedBook, SearchResults} from '../../library/index.js';
import {formatScore} from '../commands/handlers.js';

type Props = {
	data: SearchResults;
};

function getScoreColor(score: number): string {
	if (score > 0.6) return 'green';
	if (score > 0.3) return 'yellow';
	return 'red';
}

/**
 * Cut an excerpt to fit the terminal.
 */
export function truncateExcerpt(text: string, maxWidth: number): string {
	return text.length > maxWidth ? text.slice(0, maxWidth - 3) + '...' : text;
}

function BookResult({
	rank,
	book,
	maxWidth,
}: {
	rank: number;
	book: RankedBook;
	maxWidth: number;
}) {
	const chunkCount = book.allMatchedChunks.length;

	return (
		<Box flexDirection="column" marginBottom={1}>
			<Box>
				<Text dimColor>{rank}. </Text>
				<Text bold color="cyan">
					{book.title}
				</Text>
				<Text> by </Text>
				<Text color="magenta">{book.author}</Text>
				<Text color="green"> [{book.format.toUpperCase()}]</Text>
				<Text> </Text>
				<Text color={getScoreColor(book.relevanceScore)}>
					{formatScore(book.relevanceScore)}
				</Text>
				<Text dimColor>
					{' '}
					({chunkCount} matching passage{chunkCount === 1 ? '' : 's'})
				</Text>
			</Box>
			<Box marginLeft={3}>
				<Text color="blue">{book.filepath}</Text>
			</Box>
			<Box marginLeft={3}>
				<Text>{truncateExcerpt(book.bestMatchExcerpt, maxWidth)}</Text>
			</Box>
		</Box>
	);
}

export default function BookResults({data}: Props) {
	const {stdout} = useStdout();
	const maxWidth = Math.min((stdout?.columns ?? 80) - 4, 240);

	if (data.books.length === 0) {
		return (
			<Text color="yellow">
				No matching books found for "{data.query}" ({data.elapsedMs}ms)
			</Text>
		);
	}

	return (
		<Box flexDirection="column">
			<Box marginBottom={1}>
				<Text bold>Found {data.books.length} matching book(s) for </Text>
				<Text color="cyan">"{data.query}"</Text>
				<Text dimColor> ({data.elapsedMs}ms):</Text>
			</Box>
			{data.books.map((book, index) => (
				<BookResult
					key={book.documentId}
					rank={index + 1}
					book={book}
					maxWidth={maxWidth}
				/>
			))}
		</Box>
	);
}
