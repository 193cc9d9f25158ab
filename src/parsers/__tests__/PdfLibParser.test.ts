import { describe, expect, it } from 'vitest';
import { resolveAnnotations } from '../../annotations/resolveAnnotations';
import { buildPdf } from '../../__tests__/helpers/buildPdf';
import { loadPdfJs } from '../../__tests__/helpers/loadPdfJs';
import { DocumentSyntaxError, isPageSelected, ParsedDocument, ParsedPage } from '../DocumentParser';
import { PdfLibParser } from '../PdfLibParser';

const XMP = '<x:xmpmeta xmlns:x="adobe:ns:meta/"><rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">' +
    '<rdf:Description rdf:about="" xmlns:pdf="http://ns.adobe.com/pdf/1.3/" pdf:Producer="TestProducer"/>' +
    '</rdf:RDF></x:xmpmeta>';

const collectPages = async (document: ParsedDocument, pageNumbers: number[] = [], maxPages = 0): Promise<ParsedPage[]> => {
    const pages: ParsedPage[] = [];
    for await (const page of document.pages({ pageNumbers, maxPages })) {
        pages.push(page);
    }
    return pages;
};

describe('PdfLibParser', () => {
    it('reads the info dictionary, page count and embedded metadata', async () => {
        const bytes = await buildPdf({ title: 'Test Paper', author: 'Test Author', pages: [[], []], xmp: XMP });
        const document = await new PdfLibParser().open(bytes, { password: '' });
        try {
            expect(document.pageCount).toBe(2);
            expect(document.info.Title).toBe('Test Paper');
            expect(document.info.Author).toBe('Test Author');
            expect(Buffer.from(document.embeddedMetadata ?? new Uint8Array()).toString('utf8')).toBe(XMP);
        } finally {
            await document.close();
        }
    });

    it('exposes the link annotations of each page', async () => {
        const bytes = await buildPdf({ pages: [['https://example.org/a.pdf', 'https://example.org/b'], []] });
        const document = await new PdfLibParser().open(bytes, { password: '' });
        try {
            const [first, second] = await collectPages(document);
            expect(first.index).toBe(0);
            expect(second.annotations).toBeUndefined();
            if (!first.annotations) throw new Error('page 1 has no annotations');
            const resolution = resolveAnnotations(first.annotations, 1);
            expect(resolution.kind).toBe('references');
            if (resolution.kind === 'references') {
                expect(resolution.references.map((reference) => reference.token)).toEqual(['https://example.org/a.pdf', 'https://example.org/b']);
            }
        } finally {
            await document.close();
        }
    });

    it('yields only the selected pages', async () => {
        const bytes = await buildPdf({ pages: [[], [], [], []] });
        const document = await new PdfLibParser().open(bytes, { password: '' });
        try {
            expect((await collectPages(document, [1, 3])).map((page) => page.index)).toEqual([1, 3]);
            expect((await collectPages(document, [], 2)).map((page) => page.index)).toEqual([0, 1]);
        } finally {
            await document.close();
        }
    });

    it('renders the text of the selected pages with PDF.js', async () => {
        const bytes = await buildPdf({ pages: [[], [], []], texts: ['First page', 'Second page', 'Third page'] });
        const document = await new PdfLibParser({ loadPdfJs }).open(bytes, { password: '' });
        const chunks: string[] = [];
        try {
            for (const page of await collectPages(document, [0, 2])) {
                await page.renderText({ write: (chunk) => { chunks.push(chunk); } });
            }
        } finally {
            await document.close();
        }
        expect(chunks.join('').split('\f').map((page) => page.trim())).toEqual(['First page', 'Third page', '']);
    });

    it('has no embedded metadata when the catalog has none', async () => {
        const document = await new PdfLibParser().open(await buildPdf({ pages: [[]] }), { password: '' });
        expect(document.embeddedMetadata).toBeUndefined();
        await document.close();
    });

    it('rejects bytes that are not a PDF', async () => {
        await expect(new PdfLibParser().open(Buffer.from('just some text'), { password: '' })).rejects.toThrow(DocumentSyntaxError);
    });
});

describe('isPageSelected', () => {
    it('selects every page by default', () => {
        expect(isPageSelected(5, 5, { pageNumbers: [], maxPages: 0 })).toBe(true);
    });

    it('stops at maxPages', () => {
        expect(isPageSelected(2, 2, { pageNumbers: [], maxPages: 2 })).toBe(false);
    });

    it('keeps listed pages only', () => {
        expect(isPageSelected(1, 0, { pageNumbers: [0, 2], maxPages: 0 })).toBe(false);
        expect(isPageSelected(2, 1, { pageNumbers: [0, 2], maxPages: 0 })).toBe(true);
    });
});
