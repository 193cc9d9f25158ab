/**
 * PDF Parser
 *
 * Reads the structure of a PDF document with pdf-lib and renders page text with PDF.js.
 *
 * **What comes from where:**
 * - Info dictionary (`/Info` of the trailer) → pdf-lib, values decoded to text
 * - Embedded XMP packet (`/Metadata` stream of the catalog) → pdf-lib, stream decoded
 * - Page annotations (`/Annots` of each page) → pdf-lib, converted to PdfNode values
 * - Page text → PDF.js text content, loaded on first use
 *
 * pdf-lib yields to the event loop while parsing (`parseSpeed`), so deadlines set around
 * `open` can fire during long parses.
 *
 * @module PdfLibParser
 */

import { decodePDFRawStream, ParseSpeeds, PDFDict, PDFDocument, PDFName, PDFPage, PDFRawStream } from 'pdf-lib';
import { LogConfig } from '../types';
import { setMetadataEntry } from '../metadata/normalizeMetadata';
import { describeError, logWarning } from '../utils/errorUtils';
import {
    DocumentParser,
    DocumentSyntaxError,
    isPageSelected,
    PageSelection,
    ParsedDocument,
    ParsedPage,
    ParserOpenOptions
} from './DocumentParser';
import { PdfJsModuleLoader, PdfJsTextRenderer } from './PdfJsTextRenderer';
import { decodeInfoValue, toPdfNode } from './pdfLibNodes';

export interface PdfLibParserOptions {
    /**
     * Reject invalid objects instead of skipping them.
     * Default is false.
     */
    strict?: boolean;
    /** PDF.js worker script location. Default is '' which resolves the installed worker. */
    workerSrc?: string;
    /** Logging configuration */
    logConfig?: LogConfig;
    /** Imports pdfjs-dist for text rendering. Default is a native dynamic import. */
    loadPdfJs?: PdfJsModuleLoader;
}

/**
 * A document opened with pdf-lib.
 */
class PdfLibDocument implements ParsedDocument {
    public readonly pageCount: number;

    constructor(
        private readonly doc: PDFDocument,
        private readonly pdfPages: PDFPage[],
        public readonly info: Record<string, string>,
        public readonly embeddedMetadata: Uint8Array | undefined,
        private readonly renderer: PdfJsTextRenderer
    ) {
        this.pageCount = pdfPages.length;
    }

    public async *pages(selection: PageSelection): AsyncIterable<ParsedPage> {
        let taken = 0;
        for (let index = 0; index < this.pdfPages.length; index++) {
            if (!isPageSelected(index, taken, selection)) continue;
            taken++;
            const annots = this.pdfPages[index].node.get(PDFName.of('Annots'));
            yield {
                index,
                annotations: annots === undefined ? undefined : toPdfNode(annots, this.doc.context),
                renderText: (sink) => this.renderer.renderPage(index, sink)
            };
        }
    }

    public async close(): Promise<void> {
        await this.renderer.close();
    }
}

/**
 * Reads the info dictionary into text values. Values that are not strings or names are skipped.
 */
const readInfo = (doc: PDFDocument): Record<string, string> => {
    const info: Record<string, string> = {};
    const dict = doc.context.lookup(doc.context.trailerInfo.Info);
    if (!(dict instanceof PDFDict)) return info;

    for (const [key, value] of dict.entries()) {
        const text = decodeInfoValue(value, doc.context);
        if (text !== undefined) {
            setMetadataEntry(info, key.decodeText(), text);
        }
    }
    return info;
};

/**
 * Reads the raw XMP packet of the catalog, if any.
 */
const readEmbeddedMetadata = (doc: PDFDocument, config: LogConfig): Uint8Array | undefined => {
    const stream = doc.context.lookup(doc.catalog.get(PDFName.of('Metadata')));
    if (!(stream instanceof PDFRawStream)) return undefined;
    try {
        return decodePDFRawStream(stream).decode();
    } catch (e) {
        logWarning('Could not decode the embedded metadata stream', config, e);
        return undefined;
    }
};

/**
 * Default DocumentParser: pdf-lib for the object graph, PDF.js for the text.
 */
export class PdfLibParser implements DocumentParser {
    constructor(private readonly options: PdfLibParserOptions = {}) {}

    public async open(bytes: Uint8Array, options: ParserOpenOptions): Promise<ParsedDocument> {
        const logConfig = this.options.logConfig ?? {};
        let doc: PDFDocument;
        let pdfPages: PDFPage[];
        let info: Record<string, string>;
        try {
            doc = await PDFDocument.load(bytes, {
                ignoreEncryption: true,
                updateMetadata: false,
                throwOnInvalidObject: this.options.strict ?? false,
                parseSpeed: ParseSpeeds.Slow
            });
            pdfPages = doc.getPages();
            info = readInfo(doc);
        } catch (e) {
            throw new DocumentSyntaxError(describeError(e), e);
        }

        const renderer = new PdfJsTextRenderer(bytes, {
            password: options.password,
            workerSrc: this.options.workerSrc ?? '',
            logConfig,
            loadModule: this.options.loadPdfJs
        });
        return new PdfLibDocument(doc, pdfPages, info, readEmbeddedMetadata(doc, logConfig), renderer);
    }
}
