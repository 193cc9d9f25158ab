import { extractArxivIds, extractDois, extractUrls } from '../extractors/patterns';
import { normalizeMetadata } from '../metadata/normalizeMetadata';
import { Reference } from '../references/Reference';
import { BackendKind } from '../types';
import { SeekableByteStream } from '../utils/SeekableByteStream';
import { ReaderBackend } from './ReaderBackend';

/**
 * Backend for input that is not a PDF: the bytes are read as UTF-8 text and pattern matched for
 * urls, arXiv identifiers and DOIs. There are no pages, so references carry page 0.
 */
export class TextBackend extends ReaderBackend {
    public readonly kind: BackendKind = 'text';

    private constructor(text: string, scraped: Reference[]) {
        super(text, normalizeMetadata({ Pages: 0 }), [], scraped);
    }

    public static create(stream: SeekableByteStream): TextBackend {
        const text = stream.readAll().toString('utf8');
        const scraped: Reference[] = [];
        for (const url of extractUrls(text)) scraped.push(new Reference(url));
        for (const id of extractArxivIds(text)) scraped.push(new Reference(`arxiv:${id}`));
        for (const doi of extractDois(text)) scraped.push(new Reference(`doi:${doi}`));
        return new TextBackend(text, scraped);
    }
}
