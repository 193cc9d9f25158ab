/**
 * pdfrefs - PDF Reference Extractor
 *
 * Reads local or remote PDF files and extracts their metadata together with the references they carry:
 * link annotation targets and the urls, DOIs and arXiv identifiers found in the rendered text.
 *
 * **Key Features:**
 * - Info dictionary and embedded XMP metadata, normalized
 * - Hyperlink annotations resolved through indirect objects
 * - Text scraping for urls and DOIs
 * - Read and text deadlines, with annotation-only fallback
 * - Download of the referenced PDFs
 *
 * **Quick Start:**
 * ```typescript
 * import { PdfRefs } from 'pdfrefs';
 *
 * const pdf = await PdfRefs.open('paper.pdf', { readTimeout: 10, textTimeout: 30 });
 *
 * console.log(pdf.getMetadata());            // { Title: '...', Pages: 12, ... }
 * console.log(pdf.getReferencesAsDict(true)); // { annot: [...], scrape: [...] }
 * console.log(pdf.degraded);                 // true when only annotations were read
 * ```
 *
 * **Main Exports:**
 * - `PdfRefs` - Entry point class
 * - `PdfRefDocument` - Opened document handle
 * - `Reference`, `ReferenceSet` - Reference value types
 * - `PdfRefsError`, `PdfRefsErrorType` - Error model
 * - All type definitions
 *
 * @packageDocumentation
 * @module pdfrefs
 */

import { PdfRefs } from './PdfRefs';

export { PdfRefs, resolveConfig } from './PdfRefs';
export { PdfRefDocument } from './PdfRefDocument';
export { Reference, ReferenceSet } from './references/Reference';
export { extractArxivIds, extractDois, extractUrls, isUrl } from './extractors/patterns';
export { normalizeMetadata } from './metadata/normalizeMetadata';
export { decodeXmp } from './metadata/xmpDecoder';
export { resolveAnnotations, PdfNodes } from './annotations';
export { DocumentSyntaxError } from './parsers/DocumentParser';
export { PdfLibParser } from './parsers/PdfLibParser';
export { fetchUrl } from './acquisition/fetcher';
export { downloadUrls } from './download/downloader';
export { PdfRefsError, PdfRefsErrorType, isPdfRefsError } from './utils/errorUtils';

export type { AnnotationResolution, PdfNode, PdfNodeKind, ResolvedNode } from './annotations';
export type { DocumentParser, ParsedDocument, ParsedPage, PageSelection, ParserOpenOptions, TextSink } from './parsers/DocumentParser';
export type { Fetcher } from './acquisition/fetcher';
export type {
    BackendKind,
    DownloadPdfsResult,
    DownloadResult,
    MetadataRecord,
    MetadataValue,
    PdfRefsConfig,
    PdfRefsSummary,
    ReferenceDict
} from './types';

const open = PdfRefs.open;

export { open };
export default PdfRefs;
