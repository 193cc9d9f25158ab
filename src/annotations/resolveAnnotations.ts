/**
 * Annotation Resolver
 *
 * Recovers hyperlink targets from the `/Annots` entry of a page by walking the object graph:
 *
 * 1. Arrays are resolved element by element.
 * 2. Indirect references are dereferenced. At the top level only arrays and indirect references are accepted.
 * 3. Byte strings lose one trailing NUL byte and are decoded as UTF-8, or Latin-1 when that fails.
 * 4. Text becomes a Reference bound to the page.
 * 5. Dictionaries with a `URI` entry are resolved through that entry,
 * 6. otherwise through their `A` (action) entry.
 * 7. Anything else has no target and resolves to null.
 *
 * @module resolveAnnotations
 */

import { Reference } from '../references/Reference';
import { PdfNode, PdfNodeKind } from './PdfNode';

/** Result of resolving one node: a reference, nothing, or the results of an array */
export type ResolvedNode = Reference | null | ResolvedNode[];

/** Result of resolving the annotations of a page */
export type AnnotationResolution =
    | { kind: 'references'; references: Reference[] }
    | { kind: 'invalidRoot'; nodeKind: PdfNodeKind };

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decodes the bytes of a PDF string object.
 */
export const decodePdfBytes = (bytes: Uint8Array): string => {
    const content = bytes.length > 0 && bytes[bytes.length - 1] === 0 ? bytes.subarray(0, bytes.length - 1) : bytes;
    try {
        return utf8Decoder.decode(content);
    } catch {
        return Buffer.from(content).toString('latin1');
    }
};

/**
 * Resolves an already dereferenced value.
 */
const resolveValue = (value: PdfNode, page: number): ResolvedNode => {
    switch (value.kind) {
        case 'container':
            return value.items.map((item) => resolveNode(item, true, page));
        case 'ref':
            return resolveNode(value, true, page);
        case 'primitive':
            return new Reference(typeof value.value === 'string' ? value.value : decodePdfBytes(value.value), page);
        case 'dict': {
            const uri = value.entries.get('URI');
            if (uri) return resolveNode(uri, true, page);
            const action = value.entries.get('A');
            if (action) return resolveNode(action, true, page);
            return null;
        }
        case 'scalar':
            return null;
    }
};

/**
 * Resolves one node of the annotation graph.
 *
 * @param node - An indirect reference, an array, or (for nested calls) any dereferenced value
 * @param isNestedCall - false for the `/Annots` value itself, true below it
 * @param page - One-based page number the references are bound to
 * @returns null for a top-level node that is neither an indirect reference nor an array;
 *          `resolveAnnotations` reports that case explicitly
 */
export const resolveNode = (node: PdfNode, isNestedCall: boolean, page: number): ResolvedNode => {
    if (node.kind === 'container') {
        return node.items.map((item) => resolveNode(item, true, page));
    }
    if (node.kind === 'ref') {
        return resolveValue(node.deref(), page);
    }
    if (!isNestedCall) {
        return null;
    }
    return resolveValue(node, page);
};

/**
 * Flattens a resolved tree into its references, dropping nulls.
 */
export const flattenResolved = (resolved: ResolvedNode): Reference[] => {
    if (resolved === null) return [];
    if (Array.isArray(resolved)) return resolved.flatMap(flattenResolved);
    return [resolved];
};

/**
 * Resolves the `/Annots` value of a page into references.
 *
 * Exceptions raised while dereferencing propagate to the caller.
 *
 * @param root - The `/Annots` value
 * @param page - One-based page number the references are bound to
 */
export const resolveAnnotations = (root: PdfNode, page: number): AnnotationResolution => {
    if (root.kind !== 'container' && root.kind !== 'ref') {
        return { kind: 'invalidRoot', nodeKind: root.kind };
    }
    return { kind: 'references', references: flattenResolved(resolveNode(root, false, page)) };
};
