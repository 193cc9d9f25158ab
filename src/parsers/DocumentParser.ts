/**
 * Contract between the backends and the PDF parser that reads the document structure.
 *
 * @module DocumentParser
 */

import { PdfNode } from '../annotations/PdfNode';

/** Receives rendered text. Pages write into the same sink one after another. */
export interface TextSink {
    write(chunk: string): void;
}

/** Which pages to process */
export interface PageSelection {
    /** Zero-based page indexes. Empty selects every page. */
    pageNumbers: readonly number[];
    /** Maximum number of pages, 0 for no limit */
    maxPages: number;
}

/** A page of a parsed document */
export interface ParsedPage {
    /** Zero-based index of the page in the document */
    index: number;
    /** The `/Annots` value of the page, when it has one */
    annotations?: PdfNode;
    /** Renders the text of the page into the sink */
    renderText(sink: TextSink): Promise<void>;
}

/** A parsed document. Call `close` when done. */
export interface ParsedDocument {
    /** Info dictionary entries decoded to text */
    info: Record<string, string>;
    /** The raw XMP packet of the catalog, when present */
    embeddedMetadata?: Uint8Array;
    pageCount: number;
    /** Yields the selected pages in document order */
    pages(selection: PageSelection): AsyncIterable<ParsedPage>;
    close(): Promise<void>;
}

export interface ParserOpenOptions {
    password: string;
}

/** Reads the structure of a PDF document */
export interface DocumentParser {
    /**
     * @throws {DocumentSyntaxError} If the bytes are not a readable PDF document
     */
    open(bytes: Uint8Array, options: ParserOpenOptions): Promise<ParsedDocument>;
}

/** Raised by a parser for bytes that are not a readable PDF document */
export class DocumentSyntaxError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'DocumentSyntaxError';
    }
}

/**
 * Tells whether a zero-based page index is selected, given how many pages were already taken.
 */
export const isPageSelected = (index: number, taken: number, selection: PageSelection): boolean => {
    if (selection.maxPages > 0 && taken >= selection.maxPages) return false;
    return selection.pageNumbers.length === 0 || selection.pageNumbers.includes(index);
};
