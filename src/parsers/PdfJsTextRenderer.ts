/**
 * Page text rendering with PDF.js (pdfjs-dist).
 *
 * PDF.js is only loaded, and the document only opened, when the first page is rendered, so
 * annotation-only passes never pay for it.
 *
 * @module PdfJsTextRenderer
 * @see https://mozilla.github.io/pdf.js/ PDF.js documentation
 */

import { pathToFileURL } from 'url';
import { LogConfig } from '../types';
import { describeError, logDebug, logWarning } from '../utils/errorUtils';
import { DocumentSyntaxError, TextSink } from './DocumentParser';

/** A text content item. Marked content items carry no `str`. */
interface PdfJsTextItem {
    str?: string;
    hasEOL?: boolean;
}

interface PdfJsPage {
    getTextContent(): Promise<{ items: PdfJsTextItem[] }>;
    cleanup(): unknown;
}

interface PdfJsDocument {
    numPages: number;
    getPage(pageNumber: number): Promise<PdfJsPage>;
    destroy(): Promise<void>;
}

export interface PdfJsModule {
    getDocument(source: { data: Uint8Array; password?: string; verbosity?: number; isEvalSupported?: boolean }): {
        promise: Promise<PdfJsDocument>;
    };
    GlobalWorkerOptions: { workerSrc: string };
}

/** Imports a module by specifier */
export type PdfJsModuleLoader = (specifier: string) => Promise<PdfJsModule>;

export interface PdfJsTextRendererOptions {
    password: string;
    /** Worker script location, resolved from the installed package when empty */
    workerSrc: string;
    logConfig: LogConfig;
    /** Imports pdfjs-dist. Defaults to a native dynamic import. */
    loadModule?: PdfJsModuleLoader;
}

// Helper to bypass TS converting import() to require() when compiling to CJS; pdfjs-dist ships ES modules only
const dynamicImport = new Function('specifier', 'return import(specifier)');

const importModule: PdfJsModuleLoader = (specifier) => dynamicImport(specifier);

/** Text written after every page */
export const PAGE_SEPARATOR = '\n\f';

/**
 * Loads PDF.js and configures its worker.
 */
const loadPdfJs = async (loadModule: PdfJsModuleLoader, workerSrc: string, config: LogConfig): Promise<PdfJsModule> => {
    let pdfjs: PdfJsModule;
    try {
        // Use legacy build for Node.js
        pdfjs = await loadModule('pdfjs-dist/legacy/build/pdf.mjs');
    } catch (e) {
        logDebug(`Legacy pdfjs-dist build not found, using the standard build (${describeError(e)})`, config);
        pdfjs = await loadModule('pdfjs-dist');
    }

    if (workerSrc) {
        pdfjs.GlobalWorkerOptions.workerSrc = workerSrc;
    } else if (!pdfjs.GlobalWorkerOptions.workerSrc) {
        try {
            pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(require.resolve('pdfjs-dist/legacy/build/pdf.worker.mjs')).href;
        } catch (e) {
            logWarning('Could not auto-resolve local pdfjs worker path', config, e);
        }
    }
    return pdfjs;
};

/**
 * Renders the text of the pages of one document.
 */
export class PdfJsTextRenderer {
    private opening?: Promise<PdfJsDocument>;
    private document?: PdfJsDocument;

    constructor(private readonly bytes: Uint8Array, private readonly options: PdfJsTextRendererOptions) {}

    private open(): Promise<PdfJsDocument> {
        if (!this.opening) {
            this.opening = (async () => {
                const { loadModule = importModule, workerSrc, logConfig } = this.options;
                const pdfjs = await loadPdfJs(loadModule, workerSrc, logConfig);
                try {
                    // PDF.js takes ownership of the array it is given and refuses a Buffer
                    this.document = await pdfjs.getDocument({
                        data: new Uint8Array(this.bytes),
                        password: this.options.password || undefined,
                        verbosity: 0, // ERRORS only, suppresses warnings
                        isEvalSupported: false
                    }).promise;
                } catch (e) {
                    throw new DocumentSyntaxError(describeError(e), e);
                }
                return this.document;
            })();
        }
        return this.opening;
    }

    /**
     * Writes the text of a page into the sink, one line per text line, followed by a form feed.
     *
     * @param index - Zero-based page index
     */
    public async renderPage(index: number, sink: TextSink): Promise<void> {
        const document = await this.open();
        const page = await document.getPage(index + 1);
        const content = await page.getTextContent();
        for (const item of content.items) {
            if (item.str === undefined) continue;
            sink.write(item.str);
            if (item.hasEOL) sink.write('\n');
        }
        sink.write(PAGE_SEPARATOR);
        page.cleanup();
    }

    public async close(): Promise<void> {
        if (this.document) {
            await this.document.destroy();
            this.document = undefined;
        }
    }
}
