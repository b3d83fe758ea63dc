/**
 * PDF extractor using pdf-parse.
 */

import fs from 'node:fs/promises';
import {PDFParse} from 'pdf-parse';
import {z} from 'zod';
import type {ExtractedBook} from './types.js';

/**
 * The document information dictionary fields we read.
 * Anything else in it (or a missing dictionary) is ignored.
 */
const pdfInfoSchema = z
	.object({
		Title: z.string().optional(),
		Author: z.string().optional(),
	})
	.passthrough();

export async function extractPdf(filepath: string): Promise<ExtractedBook> {
	const data = await fs.readFile(filepath);
	const parser = new PDFParse({data});

	try {
		const textResult = await parser.getText();
		const infoResult = await parser.getInfo();
		const info = pdfInfoSchema.safeParse(infoResult.info);

		return {
			title: info.success ? info.data.Title?.trim() || null : null,
			author: info.success ? info.data.Author?.trim() || null : null,
			text: textResult.text,
		};
	} finally {
		await parser.destroy();
	}
}
