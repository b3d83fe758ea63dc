import {describe, it, expect} from 'vitest';
import {EXCERPT_LENGTH, fuseResults, toExcerpt} from '../search/fuse.js';
import type {SimilarityHit} from '../search/types.js';

function hit(documentId: string, index: number, distance: number, text?: string): SimilarityHit {
	return {
		chunkId: `${documentId}_chunk_${index}`,
		text: text ?? `${documentId} passage ${index}`,
		distance,
		metadata: {
			documentId,
			title: `Title ${documentId}`,
			author: 'Unknown',
			filename: `${documentId}.fb2`,
			filepath: `/books/${documentId}.fb2`,
			format: 'fb2',
			length: 1234,
			chunkIndex: index,
			totalChunks: 10,
		},
	};
}

describe('fuseResults', () => {
	it('returns nothing for no hits', () => {
		expect(fuseResults([], 5)).toEqual([]);
	});

	it('returns nothing for a non-positive limit', () => {
		expect(fuseResults([hit('a', 0, 0.1)], 0)).toEqual([]);
	});

	it('groups chunks by book and scores each book by its best chunk', () => {
		const books = fuseResults(
			[hit('a', 0, 0.4), hit('b', 2, 0.3), hit('a', 5, 0.1), hit('b', 1, 0.6)],
			5,
		);

		expect(books.map(b => b.documentId)).toEqual(['a', 'b']);
		expect(books[0]?.relevanceScore).toBeCloseTo(0.9);
		expect(books[0]?.bestMatchExcerpt).toBe('a passage 5');
		expect(books[1]?.relevanceScore).toBeCloseTo(0.7);
		expect(books[1]?.bestMatchExcerpt).toBe('b passage 2');
	});

	it('keeps every matched chunk in hit order', () => {
		const [book] = fuseResults([hit('a', 3, 0.5), hit('a', 1, 0.2), hit('a', 7, 0.4)], 5);

		expect(book?.allMatchedChunks.map(c => c.chunkId)).toEqual([
			'a_chunk_3',
			'a_chunk_1',
			'a_chunk_7',
		]);
		expect(book?.allMatchedChunks.map(c => c.score)).toEqual([
			1 - 0.5,
			1 - 0.2,
			1 - 0.4,
		]);
	});

	it('carries book metadata from the hits', () => {
		const [book] = fuseResults([hit('a', 0, 0.25)], 1);

		expect(book).toMatchObject({
			documentId: 'a',
			title: 'Title a',
			author: 'Unknown',
			filename: 'a.fb2',
			filepath: '/books/a.fb2',
			format: 'fb2',
			length: 1234,
			relevanceScore: 0.75,
		});
	});

	it('takes the excerpt from the first of equally scored chunks', () => {
		const [book] = fuseResults([hit('a', 0, 0.2, 'first'), hit('a', 1, 0.2, 'second')], 1);

		expect(book?.bestMatchExcerpt).toBe('first');
	});

	it('truncates to the limit, best first', () => {
		const hits = ['a', 'b', 'c', 'd'].map((id, i) => hit(id, 0, 0.1 * (4 - i)));
		const books = fuseResults(hits, 2);

		expect(books.map(b => b.documentId)).toEqual(['d', 'c']);
	});

	it('keeps first-seen order for tied books', () => {
		const books = fuseResults([hit('x', 0, 0.3), hit('y', 0, 0.3), hit('z', 0, 0.3)], 3);

		expect(books.map(b => b.documentId)).toEqual(['x', 'y', 'z']);
	});

	it('ranks books the same whatever the order of hits', () => {
		const hits = [
			hit('a', 0, 0.5),
			hit('b', 0, 0.15),
			hit('a', 1, 0.05),
			hit('c', 0, 0.35),
			hit('b', 1, 0.45),
		];
		const forward = fuseResults(hits, 3).map(b => [b.documentId, b.relevanceScore]);
		const reversed = fuseResults([...hits].reverse(), 3).map(b => [
			b.documentId,
			b.relevanceScore,
		]);

		expect(reversed).toEqual(forward);
		expect(forward.map(([id]) => id)).toEqual(['a', 'b', 'c']);
	});
});

describe('toExcerpt', () => {
	it('keeps short text as is', () => {
		expect(toExcerpt('short')).toBe('short');
		const exact = 'e'.repeat(EXCERPT_LENGTH);
		expect(toExcerpt(exact)).toBe(exact);
	});

	it('cuts long text and marks the cut', () => {
		const excerpt = toExcerpt('q'.repeat(EXCERPT_LENGTH + 1));
		expect(excerpt).toBe('q'.repeat(EXCERPT_LENGTH) + '...');
	});
});
