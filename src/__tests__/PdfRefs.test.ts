import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { setTimeout as delay } from 'timers/promises';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { Fetcher } from '../acquisition/fetcher';
import { PdfLibParser } from '../parsers/PdfLibParser';
import { PdfRefs } from '../PdfRefs';
import { isPdfRefsError, PdfRefsErrorType } from '../utils/errorUtils';
import { buildPdf } from './helpers/buildPdf';
import { loadPdfJs } from './helpers/loadPdfJs';
import { PDF_LIKE_BYTES, referencesFixture, StubParser } from './helpers/stubParser';
import { startTestServer, TestServer } from './helpers/testServer';

const errorOf = (promise: Promise<unknown>): Promise<unknown> => promise.then(
    () => {
        throw new Error('expected a rejection');
    },
    (e: unknown) => e
);

describe('PdfRefs.open', () => {
    let dir: string;
    let pdfPath: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pdfrefs-open-'));
        pdfPath = path.join(dir, 'fixture.pdf');
        fs.writeFileSync(pdfPath, PDF_LIKE_BYTES);
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reports 28 annotation and 31 text references for the fixture', async () => {
        const pdf = await PdfRefs.open(pdfPath, { parser: new StubParser(referencesFixture()) });

        expect(pdf.backendKind).toBe('full');
        expect(pdf.degraded).toBe(false);
        expect(pdf.isRemote).toBe(false);
        expect(pdf.displayName).toBe('fixture.pdf');
        const dict = pdf.getReferencesAsDict();
        expect(dict.annot).toHaveLength(28);
        expect(dict.scrape).toHaveLength(31);
        expect(pdf.getMetadata()).toEqual({ Title: 'Reference Fixture', Author: 'Test Author', Pages: 4 });
    });

    it('returns sorted lists without duplicates and the same references either way', async () => {
        const pdf = await PdfRefs.open(pdfPath, { parser: new StubParser(referencesFixture()) });
        const sorted = pdf.getReferencesAsDict(true);
        for (const tokens of [sorted.annot ?? [], sorted.scrape ?? []]) {
            expect([...tokens]).toEqual([...tokens].sort());
            expect(new Set(tokens).size).toBe(tokens.length);
        }
        const unsortedTokens = pdf.getReferences().map((reference) => reference.token);
        const sortedTokens = pdf.getReferences(true).map((reference) => reference.token);
        expect(new Set(sortedTokens)).toEqual(new Set(unsortedTokens));
        expect(pdf.getReferencesCount()).toBe(59);
    });

    it('reads annotation and text references of a real PDF with the pdf-lib parser', async () => {
        const realPath = path.join(dir, 'real.pdf');
        fs.writeFileSync(realPath, await buildPdf({
            title: 'Real Paper',
            pages: [['https://annot.example.org/']],
            texts: ['See https://text.example.org/paper.pdf and doi:10.1234/abc']
        }));

        const pdf = await PdfRefs.open(realPath, { parser: new PdfLibParser({ loadPdfJs }) });

        expect(pdf.backendKind).toBe('full');
        expect(pdf.degraded).toBe(false);
        expect(pdf.getReferencesAsDict()).toEqual({
            annot: ['https://annot.example.org/'],
            scrape: ['https://text.example.org/paper.pdf', 'doi:10.1234/abc']
        });
        expect(pdf.getMetadata()).toMatchObject({ Title: 'Real Paper', Pages: 1 });
    });

    it('fails for a missing file', async () => {
        const error = await errorOf(PdfRefs.open(path.join(dir, 'missing.pdf')));
        expect(isPdfRefsError(error, PdfRefsErrorType.FILE_NOT_FOUND)).toBe(true);
    });

    it('fails for an empty location', async () => {
        const error = await errorOf(PdfRefs.open(''));
        expect(isPdfRefsError(error, PdfRefsErrorType.IMPROPER_ARGUMENTS)).toBe(true);
    });

    it('rejects bytes that are not a PDF', async () => {
        const textPath = path.join(dir, 'notes.txt');
        fs.writeFileSync(textPath, 'plain notes, see https://example.org/a.pdf');
        const error = await errorOf(PdfRefs.open(textPath));
        expect(isPdfRefsError(error, PdfRefsErrorType.INVALID_DOCUMENT)).toBe(true);
    });

    it('reads other input as text with textFallback', async () => {
        const textPath = path.join(dir, 'notes.txt');
        fs.writeFileSync(textPath, 'plain notes, see https://example.org/a.pdf');
        const pdf = await PdfRefs.open(textPath, { textFallback: true });
        expect(pdf.backendKind).toBe('text');
        expect(pdf.getReferencesAsDict()).toEqual({ scrape: ['https://example.org/a.pdf'] });
    });

    it('reports parser syntax errors as invalid documents', async () => {
        const error = await errorOf(PdfRefs.open(pdfPath, { parser: new StubParser({ pages: [], syntaxError: 'broken xref table' }) }));
        expect(isPdfRefsError(error, PdfRefsErrorType.INVALID_DOCUMENT)).toBe(true);
    });

    it('opens remote documents through the fetcher', async () => {
        const fetcher = vi.fn<Fetcher>(async () => PDF_LIKE_BYTES);
        const pdf = await PdfRefs.open('https://example.org/papers/remote.pdf', {
            fetcher,
            parser: new StubParser(referencesFixture())
        });
        expect(pdf.isRemote).toBe(true);
        expect(pdf.displayName).toBe('remote.pdf');
        expect(pdf.getSummary().source).toEqual({ type: 'url', location: 'https://example.org/papers/remote.pdf', filename: 'remote.pdf' });
    });

    describe('read deadline', () => {
        const slowFetcher: Fetcher = (_url, signal) => delay(100, PDF_LIKE_BYTES, { signal });

        it('is not enforced at zero or below', async () => {
            for (const readTimeout of [0, -1]) {
                const pdf = await PdfRefs.open('https://example.org/slow.pdf', {
                    readTimeout,
                    fetcher: slowFetcher,
                    parser: new StubParser(referencesFixture())
                });
                expect(pdf.getReferencesCount()).toBe(59);
            }
        });

        it('fails when acquisition takes too long', async () => {
            const error = await errorOf(PdfRefs.open('https://example.org/slow.pdf', {
                readTimeout: 0.02,
                fetcher: slowFetcher,
                parser: new StubParser(referencesFixture())
            }));
            expect(isPdfRefsError(error, PdfRefsErrorType.READ_TIMEOUT)).toBe(true);
            expect(error).toHaveProperty('message', "[pdfrefs]: Reading 'https://example.org/slow.pdf' timed out (Operation did not finish within 0.02s)");
        });
    });

    describe('text deadline', () => {
        it('falls back to annotation references when exceeded', async () => {
            const parser = new StubParser(referencesFixture(200));
            const pdf = await PdfRefs.open(pdfPath, { textTimeout: 0.05, parser });

            expect(pdf.degraded).toBe(true);
            expect(pdf.backendKind).toBe('annotationOnly');
            expect(pdf.getText()).toBe('');
            const dict = pdf.getReferencesAsDict();
            expect(dict.annot).toHaveLength(28);
            expect(dict.scrape).toBeUndefined();
            expect(parser.openCount).toBe(2);
        });

        it('fails when exceeded without limit', async () => {
            const error = await errorOf(PdfRefs.open(pdfPath, {
                textTimeout: 0.05,
                limit: false,
                parser: new StubParser(referencesFixture(200))
            }));
            expect(isPdfRefsError(error, PdfRefsErrorType.TEXT_TIMEOUT)).toBe(true);
        });

        it('keeps the full result when the pass finishes in time', async () => {
            const pdf = await PdfRefs.open(pdfPath, { textTimeout: 5, parser: new StubParser(referencesFixture(1)) });
            expect(pdf.degraded).toBe(false);
            expect(pdf.getReferencesAsDict().scrape).toHaveLength(31);
        });
    });

    describe('with the default fetcher', () => {
        let server: TestServer;

        beforeAll(async () => {
            server = await startTestServer({ '/paper.pdf': PDF_LIKE_BYTES });
        });

        afterAll(async () => {
            await server.close();
        });

        it('downloads remote documents', async () => {
            const pdf = await PdfRefs.open(`${server.url}/paper.pdf`, { parser: new StubParser(referencesFixture()) });
            expect(pdf.readBytes().equals(PDF_LIKE_BYTES)).toBe(true);
        });

        it('reports a 404 as a download failure', async () => {
            const error = await errorOf(PdfRefs.open(`${server.url}/missing.pdf`));
            expect(isPdfRefsError(error, PdfRefsErrorType.DOWNLOAD_FAILED)).toBe(true);
        });
    });
});
