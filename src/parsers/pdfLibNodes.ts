/**
 * Conversion of pdf-lib objects into PdfNode values.
 *
 * Only direct children are converted eagerly; indirect references are looked up when the
 * resolver dereferences them, so reference cycles in the file are never followed here.
 *
 * @module pdfLibNodes
 */

import {
    PDFArray,
    PDFContext,
    PDFDict,
    PDFHexString,
    PDFName,
    PDFNumber,
    PDFObject,
    PDFRef,
    PDFStream,
    PDFString
} from 'pdf-lib';
import { PdfNode } from '../annotations/PdfNode';

/**
 * Converts the entries of a dictionary, keyed by name without the leading slash.
 */
const convertEntries = (dict: PDFDict, context: PDFContext): Map<string, PdfNode> => {
    const entries = new Map<string, PdfNode>();
    for (const [key, value] of dict.entries()) {
        entries.set(key.decodeText(), toPdfNode(value, context));
    }
    return entries;
};

/**
 * Converts a pdf-lib object into a PdfNode.
 *
 * Strings keep their raw bytes, streams are represented by their dictionary,
 * and missing objects become a null scalar.
 */
export const toPdfNode = (object: PDFObject | undefined, context: PDFContext): PdfNode => {
    if (object instanceof PDFRef) {
        return { kind: 'ref', id: object.toString(), deref: () => toPdfNode(context.lookup(object), context) };
    }
    if (object instanceof PDFArray) {
        return { kind: 'container', items: object.asArray().map((item) => toPdfNode(item, context)) };
    }
    if (object instanceof PDFDict) {
        return { kind: 'dict', entries: convertEntries(object, context) };
    }
    if (object instanceof PDFStream) {
        return { kind: 'dict', entries: convertEntries(object.dict, context) };
    }
    if (object instanceof PDFString || object instanceof PDFHexString) {
        return { kind: 'primitive', value: object.asBytes() };
    }
    if (object instanceof PDFName) {
        return { kind: 'scalar', value: object.decodeText() };
    }
    if (object instanceof PDFNumber) {
        return { kind: 'scalar', value: object.asNumber() };
    }
    if (object === undefined) {
        return { kind: 'scalar', value: null };
    }
    // PDFBool and PDFNull
    const text = object.toString();
    return { kind: 'scalar', value: text === 'true' ? true : text === 'false' ? false : null };
};

/**
 * Decodes a text-like value of the info dictionary, or returns undefined for other objects.
 */
export const decodeInfoValue = (object: PDFObject | undefined, context: PDFContext): string | undefined => {
    const value = object instanceof PDFRef ? context.lookup(object) : object;
    if (value instanceof PDFString || value instanceof PDFHexString || value instanceof PDFName) {
        return value.decodeText();
    }
    return undefined;
};
