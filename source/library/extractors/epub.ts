/**
 * EPUB extractor.
 *
 * Follows META-INF/container.xml to the package document, takes dc:title and
 * dc:creator from its metadata, then reads the spine's XHTML documents in
 * reading order.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import JSZip from 'jszip';
import type {Element} from '@xmldom/xmldom';
import {elementsByName, firstText, parseXml, visibleText} from './xml.js';
import type {ExtractedBook} from './types.js';

const CONTAINER_PATH = 'META-INF/container.xml';
const DOCUMENT_MEDIA_TYPES = new Set(['application/xhtml+xml', 'text/html']);

async function readEntry(zip: JSZip, entryPath: string): Promise<string> {
	const entry = zip.file(entryPath);
	if (!entry) {
		throw new Error(`Missing ${entryPath} in archive`);
	}
	return entry.async('string');
}

/**
 * Content document paths (archive-relative) in spine order.
 * Manifest documents missing from the spine are appended after it.
 */
function contentDocuments(packageRoot: Element, packageDir: string): string[] {
	const manifest = new Map<string, string>();
	for (const item of elementsByName(packageRoot, 'item')) {
		const id = item.getAttribute('id');
		const href = item.getAttribute('href');
		const mediaType = item.getAttribute('media-type') ?? '';
		if (id && href && DOCUMENT_MEDIA_TYPES.has(mediaType)) {
			manifest.set(id, path.posix.join(packageDir, decodeURIComponent(href)));
		}
	}

	const ordered: string[] = [];
	for (const itemref of elementsByName(packageRoot, 'itemref')) {
		const idref = itemref.getAttribute('idref');
		const href = idref ? manifest.get(idref) : undefined;
		if (href && idref) {
			ordered.push(href);
			manifest.delete(idref);
		}
	}
	return [...ordered, ...manifest.values()];
}

export async function extractEpub(filepath: string): Promise<ExtractedBook> {
	const zip = await JSZip.loadAsync(await fs.readFile(filepath));

	const container = parseXml(await readEntry(zip, CONTAINER_PATH), 'text/xml');
	const [rootfile] = elementsByName(container, 'rootfile');
	const packagePath = rootfile?.getAttribute('full-path');
	if (!packagePath) {
		throw new Error('container.xml names no package document');
	}

	const packageDocument = parseXml(await readEntry(zip, packagePath), 'text/xml');
	const packageRoot = packageDocument.documentElement;
	if (!packageRoot) {
		throw new Error('Empty package document');
	}
	const [metadata] = elementsByName(packageRoot, 'metadata');

	const parts: string[] = [];
	for (const documentPath of contentDocuments(
		packageRoot,
		path.posix.dirname(packagePath),
	)) {
		const entry = zip.file(documentPath);
		if (!entry) continue;

		const content = parseXml(await entry.async('string'), 'text/html', false);
		const [body] = elementsByName(content, 'body');
		const text = body ? visibleText(body) : '';
		if (text.trim()) {
			parts.push(text);
		}
	}

	return {
		title: metadata ? firstText(metadata, 'title') : null,
		author: metadata ? firstText(metadata, 'creator') : null,
		text: parts.join('\n'),
	};
}
