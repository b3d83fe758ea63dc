/**
 * Test helpers: temp libraries and on-the-fly book files.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import JSZip from 'jszip';
import {createConfigForProvider, saveConfig} from '../config/index.js';

/** Test context with temp directories and cleanup */
export interface TestContext {
	/** Library (store) directory */
	libraryRoot: string;
	/** Directory to put book files in */
	booksDir: string;
	cleanup: () => Promise<void>;
}

/**
 * Create a temp library configured for the mock embedding provider,
 * and an empty books directory next to it.
 */
export async function createTempLibrary(): Promise<TestContext> {
	const tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bookshelf-test-'));
	const libraryRoot = path.join(tempDir, 'library');
	const booksDir = path.join(tempDir, 'books');
	await fs.mkdir(booksDir, {recursive: true});
	await saveConfig(libraryRoot, {
		...createConfigForProvider('mock'),
		lockPollIntervalMs: 50,
	});

	return {
		libraryRoot,
		booksDir,
		cleanup: async () => {
			await fs.rm(tempDir, {recursive: true, force: true});
		},
	};
}

export interface FixtureBook {
	title?: string;
	firstName?: string;
	lastName?: string;
	paragraphs: string[];
}

/**
 * Render a minimal FictionBook 2 document.
 */
export function fb2Source(book: FixtureBook): string {
	const author =
		book.firstName || book.lastName
			? `<author>${book.firstName ? `<first-name>${book.firstName}</first-name>` : ''}${
					book.lastName ? `<last-name>${book.lastName}</last-name>` : ''
			  }</author>`
			: '';
	const title = book.title ? `<book-title>${book.title}</book-title>` : '';

	return [
		'<?xml version="1.0" encoding="UTF-8"?>',
		'<FictionBook xmlns="http://www.gribuser.ru/xml/fictionbook/2.0">',
		`<description><title-info>${author}${title}</title-info></description>`,
		'<body><section>',
		...book.paragraphs.map(p => `<p>${p}</p>`),
		'</section></body>',
		'</FictionBook>',
	].join('\n');
}

/**
 * Write an FB2 book into `dir` and return its absolute path.
 */
export async function writeFb2(
	dir: string,
	name: string,
	book: FixtureBook,
): Promise<string> {
	const filepath = path.join(dir, name);
	await fs.mkdir(path.dirname(filepath), {recursive: true});
	await fs.writeFile(filepath, fb2Source(book));
	return filepath;
}

/**
 * Write a minimal EPUB 3 book with one chapter per entry of `chapters`.
 */
export async function writeEpub(
	dir: string,
	name: string,
	book: {title?: string; creator?: string; chapters: string[]},
): Promise<string> {
	const zip = new JSZip();
	zip.file('mimetype', 'application/epub+zip');
	zip.file(
		'META-INF/container.xml',
		[
			'<?xml version="1.0"?>',
			'<container version="1.0" xmlns="urn:oasis:names:tc:opendocument:xmlns:container">',
			'<rootfiles><rootfile full-path="OEBPS/content.opf" media-type="application/oebps-package+xml"/></rootfiles>',
			'</container>',
		].join('\n'),
	);

	const items = book.chapters
		.map(
			(_, i) =>
				`<item id="ch${i}" href="text/ch${i}.xhtml" media-type="application/xhtml+xml"/>`,
		)
		.join('');
	// Spine lists chapters in reverse so reading order differs from manifest order
	const spine = book.chapters
		.map((_, i) => `<itemref idref="ch${book.chapters.length - 1 - i}"/>`)
		.join('');

	zip.file(
		'OEBPS/content.opf',
		[
			'<?xml version="1.0"?>',
			'<package xmlns="http://www.idpf.org/2007/opf" version="3.0">',
			'<metadata xmlns:dc="http://purl.org/dc/elements/1.1/">',
			book.title ? `<dc:title>${book.title}</dc:title>` : '',
			book.creator ? `<dc:creator>${book.creator}</dc:creator>` : '',
			'</metadata>',
			`<manifest>${items}</manifest>`,
			`<spine>${spine}</spine>`,
			'</package>',
		].join('\n'),
	);

	book.chapters.forEach((chapter, i) => {
		zip.file(
			`OEBPS/text/ch${i}.xhtml`,
			[
				'<html xmlns="http://www.w3.org/1999/xhtml">',
				'<head><title>Chapter</title><style>p { color: red; }</style></head>',
				`<body><p>${chapter}</p><script>var hidden = 1;</script></body>`,
				'</html>',
			].join('\n'),
		);
	});

	const filepath = path.join(dir, name);
	await fs.writeFile(filepath, await zip.generateAsync({type: 'nodebuffer'}));
	return filepath;
}

/**
 * A paragraph of `sentences` distinct sentences.
 */
export function prose(seed: string, sentences: number): string {
	return Array.from(
		{length: sentences},
		(_, i) => `The ${seed} story continues with passage number ${i}.`,
	).join(' ');
}
