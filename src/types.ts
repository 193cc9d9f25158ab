import type { Fetcher } from './acquisition/fetcher';
import type { DocumentParser } from './parsers/DocumentParser';

/**
 * Configuration options for PdfRefs.
 */
export interface PdfRefsConfig {
    /**
     * Deadline in seconds for acquiring the document bytes (reading the file or downloading the url).
     * Default is undefined. A value of zero or below disables the deadline instead of timing out immediately.
     */
    readTimeout?: number;
    /**
     * Deadline in seconds for parsing the document and rendering its text.
     * Default is undefined. A value of zero or below disables the deadline.
     */
    textTimeout?: number;
    /**
     * Flag, if set to true, will retry a document whose text rendering exceeded `textTimeout` in annotation-only mode
     * instead of failing. The resulting document reports `degraded = true` and carries no scraped references.
     * Default is true.
     */
    limit?: boolean;
    /**
     * Password for encrypted documents.
     * Default is ''.
     */
    password?: string;
    /**
     * Zero-based indexes of the pages to process. Default is [] which processes every page.
     */
    pageNumbers?: number[];
    /**
     * Maximum number of pages to process. Default is 0 which means no limit.
     */
    maxPages?: number;
    /**
     * Flag to read input that is not a PDF as plain text and scrape its references.
     * Default is false, in which case such input fails with INVALID_DOCUMENT.
     */
    textFallback?: boolean;
    /**
     * Flag to make the PDF object parser reject invalid objects instead of skipping them.
     * Default is false.
     */
    strict?: boolean;
    /**
     * Flag to show warnings and errors in the console irrespective of your own handling.
     * Default is false.
     */
    outputErrorToConsole?: boolean;
    /**
     * Flag to also show debug messages in the console. Only takes effect with `outputErrorToConsole`.
     * Default is false.
     */
    verbose?: boolean;
    /**
     * The path to the PDF.js worker script. Resolved from the installed pdfjs-dist package when omitted.
     */
    pdfWorkerSrc?: string;
    /**
     * Function used to download remote documents and referenced PDFs. Defaults to an axios based fetcher.
     */
    fetcher?: Fetcher;
    /**
     * The PDF parser. Defaults to the pdf-lib object parser with pdfjs-dist text rendering.
     */
    parser?: DocumentParser;
    /**
     * Number of referenced PDFs downloaded at the same time by `downloadPdfs`.
     * Default is 10.
     */
    downloadConcurrency?: number;
}

/** Configuration after defaults were applied. The deadlines stay optional. */
export type ResolvedPdfRefsConfig = Required<Omit<PdfRefsConfig, 'readTimeout' | 'textTimeout'>> &
    Pick<PdfRefsConfig, 'readTimeout' | 'textTimeout'>;

/** The part of the configuration the logging helpers look at. */
export type LogConfig = Pick<PdfRefsConfig, 'outputErrorToConsole' | 'verbose'>;

/**
 * A metadata value. Info dictionary entries are strings, embedded XMP metadata adds
 * arrays (rdf:Bag, rdf:Seq) and nested records (namespaces, rdf:Alt language maps).
 */
export type MetadataValue = string | number | boolean | null | undefined | MetadataValue[] | MetadataRecord;

/** A mapping of metadata keys to values. */
export interface MetadataRecord {
    [key: string]: MetadataValue;
}

/** Which backend answered a document. */
export type BackendKind = 'full' | 'annotationOnly' | 'text';

/**
 * References grouped by source. A key is left out when no reference came from that source.
 */
export interface ReferenceDict {
    /** Tokens recovered from link annotations */
    annot?: readonly string[];
    /** Tokens recovered by pattern matching the rendered text */
    scrape?: readonly string[];
}

/**
 * JSON summary of a document, as written next to a downloaded original.
 */
export interface PdfRefsSummary {
    source: {
        type: 'url' | 'file';
        location: string;
        filename: string;
    };
    metadata: MetadataRecord;
    references: ReferenceDict;
}

/** Outcome of downloading a single url. */
export interface DownloadResult {
    url: string;
    /** Where the body was written, when the download succeeded */
    path?: string;
    /** Message of the failure, when the download failed */
    error?: string;
}

/** Outcome of `PdfRefDocument.downloadPdfs`. */
export interface DownloadPdfsResult {
    /** Path of the copy of the original document */
    originalPath: string;
    /** Path of the JSON summary */
    summaryPath: string;
    /** One entry per referenced PDF */
    downloads: DownloadResult[];
}
