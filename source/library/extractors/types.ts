/**
 * Raw output of one extractor, before it becomes a Document.
 */
export interface ExtractedBook {
	/** Title from the book's own metadata, if it has one */
	title: string | null;
	/** Author from the book's own metadata, if it has one */
	author: string | null;
	text: string;
}

export type Extractor = (filepath: string) => Promise<ExtractedBook>;
