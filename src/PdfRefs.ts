/**
 * pdfrefs - Main Entry Point
 *
 * This module provides the `PdfRefs` class whose static `open` method reads a local or remote PDF and
 * extracts its metadata and references.
 *
 * **Construction steps:**
 * 1. Acquire the bytes: read the file, or download the url. Bounded by `readTimeout`.
 * 2. Check the bytes are a PDF (file-type). Other input fails, or is read as text with `textFallback`.
 * 3. Run the document pass of the PDF backend. Bounded by `textTimeout`. When the deadline passes,
 *    the pass is abandoned and, with `limit`, run again in annotation-only mode; the document is then
 *    marked `degraded`.
 *
 * **Usage:**
 * ```typescript
 * import { PdfRefs } from 'pdfrefs';
 *
 * const pdf = await PdfRefs.open('https://example.org/paper.pdf', { textTimeout: 30 });
 * console.log(pdf.getMetadata());
 * console.log(pdf.getReferencesAsDict(true)); // { annot: [...], scrape: [...] }
 * await pdf.downloadPdfs('downloads');
 * ```
 *
 * @module PdfRefs
 */

import * as fileType from 'file-type';
import { acquireStream, AcquiredStream } from './acquisition/acquireStream';
import { fetchUrl } from './acquisition/fetcher';
import { PdfBackend, PdfBackendOptions } from './backends/PdfBackend';
import { ReaderBackend } from './backends/ReaderBackend';
import { TextBackend } from './backends/TextBackend';
import { isUrl } from './extractors/patterns';
import { PdfLibParser } from './parsers/PdfLibParser';
import { PdfRefDocument } from './PdfRefDocument';
import { PdfRefsConfig, ResolvedPdfRefsConfig } from './types';
import { DeadlineExceededError, withDeadline } from './utils/deadline';
import { getPdfRefsError, logDebug, logWarning, PdfRefsErrorType } from './utils/errorUtils';
import { SeekableByteStream } from './utils/SeekableByteStream';

/**
 * Applies the defaults to a configuration.
 */
export const resolveConfig = (config: PdfRefsConfig = {}): ResolvedPdfRefsConfig => {
    const logConfig = { outputErrorToConsole: config.outputErrorToConsole ?? false, verbose: config.verbose ?? false };
    return {
        limit: true,
        password: '',
        pageNumbers: [],
        maxPages: 0,
        textFallback: false,
        strict: false,
        pdfWorkerSrc: '',
        fetcher: fetchUrl,
        downloadConcurrency: 10,
        ...config,
        ...logConfig,
        parser: config.parser ?? new PdfLibParser({
            strict: config.strict ?? false,
            workerSrc: config.pdfWorkerSrc ?? '',
            logConfig
        })
    };
};

/**
 * Builds the backend for acquired bytes.
 */
const buildBackend = async (uri: string, stream: SeekableByteStream, config: ResolvedPdfRefsConfig): Promise<{ backend: ReaderBackend; degraded: boolean }> => {
    const type = await fileType.fromBuffer(stream.readAll());
    if (type?.ext !== 'pdf') {
        if (config.textFallback) {
            logDebug(`'${uri}' is not a PDF, reading it as text`, config);
            return { backend: TextBackend.create(stream), degraded: false };
        }
        throw getPdfRefsError(PdfRefsErrorType.INVALID_DOCUMENT, config, `not a PDF file, detected ${type?.mime ?? 'unknown content'}`);
    }

    const options: PdfBackendOptions = {
        parser: config.parser,
        config,
        password: config.password,
        pageNumbers: config.pageNumbers,
        maxPages: config.maxPages
    };
    try {
        const backend = await withDeadline(config.textTimeout, (signal) => PdfBackend.create(stream, { ...options, signal }));
        return { backend, degraded: false };
    } catch (e) {
        if (!(e instanceof DeadlineExceededError)) throw e;
        if (!config.limit) {
            throw getPdfRefsError(PdfRefsErrorType.TEXT_TIMEOUT, config, uri, e);
        }
        logWarning(`Extracting the text of '${uri}' timed out after ${e.seconds}s, reading annotations only`, config);
        const backend = await PdfBackend.create(stream, { ...options, annotationsOnly: true });
        return { backend, degraded: true };
    }
};

/**
 * Main class providing document opening.
 */
export class PdfRefs {
    /**
     * Opens a PDF from a file path or url and extracts its metadata and references.
     *
     * @param uri - Local file path or url
     * @param config - Optional configuration object (defaults applied for all omitted options)
     * @returns The document handle
     * @throws {PdfRefsError} FILE_NOT_FOUND, DOWNLOAD_FAILED, READ_TIMEOUT, TEXT_TIMEOUT,
     *         INVALID_DOCUMENT or ANNOTATION_RESOLUTION_FAILED
     */
    public static async open(uri: string, config: PdfRefsConfig = {}): Promise<PdfRefDocument> {
        const internalConfig = resolveConfig(config);
        if (!uri) {
            throw getPdfRefsError(PdfRefsErrorType.IMPROPER_ARGUMENTS, internalConfig, 'Need a file path or url');
        }
        logDebug(`Init with uri: ${uri}`, internalConfig);

        const isRemote = isUrl(uri);
        let acquired: AcquiredStream;
        try {
            acquired = await withDeadline(internalConfig.readTimeout, (signal) => acquireStream(uri, {
                isRemote,
                fetcher: internalConfig.fetcher,
                config: internalConfig,
                signal
            }));
        } catch (e) {
            if (e instanceof DeadlineExceededError) {
                throw getPdfRefsError(PdfRefsErrorType.READ_TIMEOUT, internalConfig, uri, e);
            }
            throw e;
        }

        const { backend, degraded } = await buildBackend(uri, acquired.stream, internalConfig);
        return new PdfRefDocument({
            uri,
            isRemote,
            displayName: acquired.displayName,
            stream: acquired.stream,
            backend,
            degraded,
            config: internalConfig
        });
    }
}
