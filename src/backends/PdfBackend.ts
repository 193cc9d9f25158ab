/**
 * PDF Backend
 *
 * Runs one pass over a PDF document:
 * 1. Open the document and read the info dictionary, merged with the decoded embedded XMP packet.
 * 2. For every selected page, in document order:
 *    a. render its text into one sink shared by all pages (skipped in annotation-only mode),
 *    b. count the page,
 *    c. resolve its link annotations into the `annotated` set.
 * 3. Normalize the metadata once, including the `Pages` count.
 * 4. Pattern match the complete text for urls and DOIs into the `scraped` set (skipped in annotation-only mode).
 *
 * Scraped references are all bound to the last processed page, because matching runs once over the
 * text of the whole document.
 *
 * @module PdfBackend
 */

import { resolveAnnotations } from '../annotations/resolveAnnotations';
import { PdfNode } from '../annotations/PdfNode';
import { extractDois, extractUrls } from '../extractors/patterns';
import { decodeXmp } from '../metadata/xmpDecoder';
import { normalizeMetadata } from '../metadata/normalizeMetadata';
import { DocumentParser, DocumentSyntaxError, ParsedDocument } from '../parsers/DocumentParser';
import { Reference } from '../references/Reference';
import { BackendKind, LogConfig, MetadataRecord } from '../types';
import { getPdfRefsError, logDebug, logWarning, PdfRefsErrorType } from '../utils/errorUtils';
import { SeekableByteStream } from '../utils/SeekableByteStream';
import { ReaderBackend } from './ReaderBackend';

export interface PdfBackendOptions {
    parser: DocumentParser;
    /** Logging configuration */
    config: LogConfig;
    password?: string;
    /** Zero-based page indexes to process, empty for all */
    pageNumbers?: readonly number[];
    /** Maximum number of pages to process, 0 for no limit */
    maxPages?: number;
    /** Skip text rendering and pattern matching, only resolve annotations */
    annotationsOnly?: boolean;
    /** Stops the pass between pages once aborted */
    signal?: AbortSignal;
}

export class PdfBackend extends ReaderBackend {
    public readonly kind: BackendKind;

    private constructor(
        kind: BackendKind,
        text: string,
        metadata: MetadataRecord,
        annotated: Reference[],
        scraped: Reference[]
    ) {
        super(text, metadata, annotated, scraped);
        this.kind = kind;
    }

    /**
     * Runs the document pass over the bytes of the stream.
     *
     * @throws {PdfRefsError} INVALID_DOCUMENT if the parser rejects the bytes,
     *         ANNOTATION_RESOLUTION_FAILED if walking the annotations of a page fails
     */
    public static async create(stream: SeekableByteStream, options: PdfBackendOptions): Promise<PdfBackend> {
        const { config, signal } = options;
        const annotationsOnly = options.annotationsOnly ?? false;

        let document: ParsedDocument;
        try {
            document = await options.parser.open(stream.readAll(), { password: options.password ?? '' });
        } catch (e) {
            if (e instanceof DocumentSyntaxError) {
                throw getPdfRefsError(PdfRefsErrorType.INVALID_DOCUMENT, config, e.message, e);
            }
            throw e;
        }

        try {
            const metadata: MetadataRecord = { ...document.info, ...readEmbeddedMetadata(document, config) };
            const chunks: string[] = [];
            const sink = { write: (chunk: string) => { chunks.push(chunk); } };
            const annotated: Reference[] = [];
            let pages = 0;

            for await (const page of document.pages({ pageNumbers: options.pageNumbers ?? [], maxPages: options.maxPages ?? 0 })) {
                signal?.throwIfAborted();
                if (!annotationsOnly) {
                    await page.renderText(sink);
                }
                pages++;
                if (page.annotations) {
                    annotated.push(...collectAnnotations(page.annotations, pages, config));
                }
            }
            metadata.Pages = pages;

            const text = chunks.join('');
            const scraped: Reference[] = [];
            if (!annotationsOnly) {
                for (const url of extractUrls(text)) {
                    scraped.push(new Reference(url, pages));
                }
                for (const doi of extractDois(text)) {
                    scraped.push(new Reference(`doi:${doi}`, pages));
                }
            }
            logDebug(`Processed ${pages} pages, ${annotated.length} annotation and ${scraped.length} text references`, config);

            return new PdfBackend(annotationsOnly ? 'annotationOnly' : 'full', text, normalizeMetadata(metadata), annotated, scraped);
        } catch (e) {
            // Text rendering opens the document a second time and may reject it late
            if (e instanceof DocumentSyntaxError) {
                throw getPdfRefsError(PdfRefsErrorType.INVALID_DOCUMENT, config, e.message, e);
            }
            throw e;
        } finally {
            await document.close();
        }
    }
}

/**
 * Decodes the embedded XMP packet. A packet that cannot be decoded is skipped with a warning.
 */
const readEmbeddedMetadata = (document: ParsedDocument, config: LogConfig): MetadataRecord => {
    if (!document.embeddedMetadata) return {};
    try {
        return decodeXmp(Buffer.from(document.embeddedMetadata).toString('utf8'), config);
    } catch (e) {
        logWarning('Skipping embedded metadata that could not be decoded', config, e);
        return {};
    }
};

/**
 * Resolves the annotations of one page. Unexpected failures abort the document pass.
 *
 * @param page - One-based number of the page
 */
const collectAnnotations = (annotations: PdfNode, page: number, config: LogConfig): Reference[] => {
    try {
        const resolution = resolveAnnotations(annotations, page);
        if (resolution.kind === 'invalidRoot') {
            logWarning(`Skipping annotations of page ${page}: top-level node is a ${resolution.nodeKind}, expected an indirect reference or an array`, config);
            return [];
        }
        return resolution.references;
    } catch (e) {
        logWarning(`Resolving the annotations of page ${page} failed`, config, e);
        throw getPdfRefsError(PdfRefsErrorType.ANNOTATION_RESOLUTION_FAILED, config, page, e);
    }
};
