import { PDFDocument, PDFName, PDFString, StandardFonts } from 'pdf-lib';

export interface PdfFixture {
    title?: string;
    author?: string;
    /** Link annotation targets, one list per page */
    pages: string[][];
    /** Text drawn on each page, by page index */
    texts?: string[];
    /** XMP packet stored as the catalog metadata stream */
    xmp?: string;
}

/**
 * Builds a PDF in memory with pdf-lib.
 */
export const buildPdf = async (fixture: PdfFixture): Promise<Buffer> => {
    const doc = await PDFDocument.create();
    if (fixture.title) doc.setTitle(fixture.title);
    if (fixture.author) doc.setAuthor(fixture.author);

    const font = fixture.texts ? await doc.embedFont(StandardFonts.Helvetica) : undefined;
    for (const [index, links] of fixture.pages.entries()) {
        const page = doc.addPage([300, 300]);
        const text = fixture.texts?.[index];
        if (text && font) page.drawText(text, { x: 10, y: 250, size: 6, font });
        if (links.length === 0) continue;
        const refs = links.map((url, i) => doc.context.register(doc.context.obj({
            Type: 'Annot',
            Subtype: 'Link',
            Rect: [10, 10 + i * 20, 200, 25 + i * 20],
            Border: [0, 0, 0],
            A: { Type: 'Action', S: 'URI', URI: PDFString.of(url) }
        })));
        page.node.set(PDFName.of('Annots'), doc.context.obj(refs));
    }

    if (fixture.xmp) {
        const stream = doc.context.stream(fixture.xmp, { Type: 'Metadata', Subtype: 'XML' });
        doc.catalog.set(PDFName.of('Metadata'), doc.context.register(stream));
    }

    // Unreferenced filler so file-type reads far enough to recognize the file
    doc.context.register(doc.context.stream('%'.repeat(2048)));

    return Buffer.from(await doc.save({ useObjectStreams: false }));
};
