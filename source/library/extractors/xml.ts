/**
 * Small helpers over @xmldom/xmldom for the EPUB and FB2 extractors.
 */

import {DOMParser, type Document, type Element} from '@xmldom/xmldom';

/**
 * Parse a markup document.
 * Strict parsing rejects on any error; lenient parsing only on fatal ones
 * (EPUB content files are often sloppy XHTML).
 */
export function parseXml(
	source: string,
	mimeType: 'text/xml' | 'text/html',
	strict: boolean = true,
): Document {
	const parser = new DOMParser({
		onError: (level, message) => {
			if (level === 'fatalError' || (strict && level === 'error')) {
				throw new Error(message);
			}
		},
	});
	const document = parser.parseFromString(source, mimeType);
	if (!document.documentElement) {
		throw new Error('Document has no root element');
	}
	return document;
}

/**
 * Elements with the given local name, in any namespace, in document order.
 */
export function elementsByName(root: Document | Element, localName: string): Element[] {
	const list = root.getElementsByTagNameNS('*', localName);
	const elements: Element[] = [];
	for (let i = 0; i < list.length; i++) {
		const element = list.item(i);
		if (element) elements.push(element);
	}
	return elements;
}

/**
 * Trimmed text of the first element with the given local name, or null.
 */
export function firstText(root: Document | Element, localName: string): string | null {
	const [element] = elementsByName(root, localName);
	const text = element?.textContent?.trim();
	return text ? text : null;
}

/**
 * Text content of an element with its style and script elements removed.
 */
export function visibleText(element: Element): string {
	for (const tag of ['style', 'script']) {
		for (const node of elementsByName(element, tag)) {
			node.parentNode?.removeChild(node);
		}
	}
	return element.textContent ?? '';
}
