/**
 * FictionBook 2 extractor.
 *
 * Metadata lives in description/title-info; text is everything in the
 * body elements (notes bodies included), minus style and script.
 */

import fs from 'node:fs/promises';
import type {Element} from '@xmldom/xmldom';
import {elementsByName, firstText, parseXml, visibleText} from './xml.js';
import type {ExtractedBook} from './types.js';

function authorName(titleInfo: Element): string | null {
	const [author] = elementsByName(titleInfo, 'author');
	if (!author) return null;

	const name = [firstText(author, 'first-name'), firstText(author, 'last-name')]
		.filter(part => part !== null)
		.join(' ');
	return name || firstText(author, 'nickname');
}

export async function extractFb2(filepath: string): Promise<ExtractedBook> {
	const source = await fs.readFile(filepath, 'utf-8');
	const document = parseXml(source, 'text/xml');

	const root = document.documentElement;
	if (!root || root.localName !== 'FictionBook') {
		throw new Error('Not a FictionBook document');
	}

	const [titleInfo] = elementsByName(root, 'title-info');
	const bodies = elementsByName(root, 'body');

	return {
		title: titleInfo ? firstText(titleInfo, 'book-title') : null,
		author: titleInfo ? authorName(titleInfo) : null,
		text: bodies.map(visibleText).join('\n'),
	};
}
