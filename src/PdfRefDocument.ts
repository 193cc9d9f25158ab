/**
 * Document handle returned by `PdfRefs.open`.
 *
 * @module PdfRefDocument
 */

import * as fs from 'fs';
import * as path from 'path';
import { ReaderBackend } from './backends/ReaderBackend';
import { downloadUrls } from './download/downloader';
import { Reference } from './references/Reference';
import {
    BackendKind,
    DownloadPdfsResult,
    MetadataRecord,
    PdfRefsSummary,
    ReferenceDict,
    ResolvedPdfRefsConfig
} from './types';
import { getPdfRefsError, logDebug, PdfRefsErrorType } from './utils/errorUtils';
import { SeekableByteStream } from './utils/SeekableByteStream';

export interface PdfRefDocumentInit {
    uri: string;
    isRemote: boolean;
    displayName: string;
    stream: SeekableByteStream;
    backend: ReaderBackend;
    degraded: boolean;
    config: ResolvedPdfRefsConfig;
}

/**
 * An opened document: its original bytes, the backend that read it, and the queries over its
 * metadata and references. The handle owns its byte stream.
 */
export class PdfRefDocument {
    /** Location the document was opened from */
    public readonly uri: string;
    public readonly isRemote: boolean;
    /** File name part of the location */
    public readonly displayName: string;
    /** True when text rendering timed out and only annotations were read */
    public readonly degraded: boolean;

    /** Owned byte stream of the original document */
    public readonly stream: SeekableByteStream;
    private readonly backend: ReaderBackend;
    private readonly config: ResolvedPdfRefsConfig;

    constructor(init: PdfRefDocumentInit) {
        this.uri = init.uri;
        this.isRemote = init.isRemote;
        this.displayName = init.displayName;
        this.stream = init.stream;
        this.backend = init.backend;
        this.degraded = init.degraded;
        this.config = init.config;
    }

    /** Which backend read the document */
    public get backendKind(): BackendKind {
        return this.backend.kind;
    }

    /** Rendered text of the processed pages. Empty for degraded documents. */
    public getText(): string {
        return this.backend.getText();
    }

    public getMetadata(): MetadataRecord {
        return this.backend.getMetadata();
    }

    /** All references, deduplicated by token, optionally sorted by token */
    public getReferences(sort = false): readonly Reference[] {
        return this.backend.getReferences(sort);
    }

    /** Tokens grouped by source (`annot`, `scrape`), optionally sorted */
    public getReferencesAsDict(sort = false): ReferenceDict {
        return this.backend.getReferencesAsDict(sort);
    }

    public getReferencesCount(): number {
        return this.backend.getReferencesCount();
    }

    /** The original bytes of the document */
    public readBytes(): Buffer {
        return this.stream.readAll();
    }

    public getSummary(): PdfRefsSummary {
        return {
            source: {
                type: this.isRemote ? 'url' : 'file',
                location: this.uri,
                filename: this.displayName
            },
            metadata: this.getMetadata(),
            references: this.getReferencesAsDict()
        };
    }

    /**
     * Saves the original document and its JSON summary to `targetDir`, then downloads every referenced
     * PDF into `<targetDir>/<name>-referenced-pdfs`.
     *
     * @throws {PdfRefsError} IMPROPER_ARGUMENTS if `targetDir` is empty or is a file
     */
    public async downloadPdfs(targetDir: string): Promise<DownloadPdfsResult> {
        if (!targetDir) {
            throw getPdfRefsError(PdfRefsErrorType.IMPROPER_ARGUMENTS, this.config, 'Need a download directory');
        }
        if (fs.existsSync(targetDir) && !fs.statSync(targetDir).isDirectory()) {
            throw getPdfRefsError(PdfRefsErrorType.IMPROPER_ARGUMENTS, this.config, `Download directory is a file: '${targetDir}'`);
        }
        await fs.promises.mkdir(targetDir, { recursive: true });

        const originalPath = path.join(targetDir, this.displayName);
        await fs.promises.writeFile(originalPath, this.readBytes());
        logDebug(`- Saved original pdf as '${originalPath}'`, this.config);

        const summaryPath = `${originalPath}.infos.json`;
        await fs.promises.writeFile(summaryPath, JSON.stringify(this.getSummary(), null, 2));
        logDebug(`- Saved metadata to '${summaryPath}'`, this.config);

        const urls = this.getReferences()
            .map((reference) => reference.token)
            .filter((token) => token.toLowerCase().endsWith('.pdf'));
        const downloads = await downloadUrls(urls, path.join(targetDir, `${this.displayName}-referenced-pdfs`), {
            fetcher: this.config.fetcher,
            concurrency: this.config.downloadConcurrency,
            config: this.config
        });
        return { originalPath, summaryPath, downloads };
    }
}
