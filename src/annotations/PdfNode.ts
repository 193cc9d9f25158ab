/**
 * Tagged model of the PDF object graph walked by the annotation resolver.
 *
 * Parsers convert their own object types into these nodes, so the resolver branches on `kind`
 * instead of inspecting parser classes.
 *
 * @module PdfNode
 */

/** A string object: raw bytes as stored in the file, or already decoded text */
export interface PdfPrimitiveNode {
    kind: 'primitive';
    value: string | Uint8Array;
}

/** An array object */
export interface PdfContainerNode {
    kind: 'container';
    items: readonly PdfNode[];
}

/** A dictionary object, keyed by name without the leading slash */
export interface PdfDictNode {
    kind: 'dict';
    entries: ReadonlyMap<string, PdfNode>;
}

/** An indirect reference. `deref` looks the object up when called. */
export interface PdfRefNode {
    kind: 'ref';
    /** Object id, e.g. "12 0 R" */
    id: string;
    deref: () => PdfNode;
}

/** Names, numbers, booleans and null */
export interface PdfScalarNode {
    kind: 'scalar';
    value: string | number | boolean | null;
}

export type PdfNode = PdfPrimitiveNode | PdfContainerNode | PdfDictNode | PdfRefNode | PdfScalarNode;

export type PdfNodeKind = PdfNode['kind'];

/**
 * Constructors for PdfNode values.
 *
 * @example
 * ```typescript
 * const action = PdfNodes.dict({ S: PdfNodes.scalar('URI'), URI: PdfNodes.primitive('https://example.org') });
 * const annots = PdfNodes.container([PdfNodes.ref('4 0 R', () => PdfNodes.dict({ A: action }))]);
 * ```
 */
export const PdfNodes = {
    primitive: (value: string | Uint8Array): PdfPrimitiveNode => ({ kind: 'primitive', value }),
    container: (items: readonly PdfNode[]): PdfContainerNode => ({ kind: 'container', items }),
    dict: (entries: Record<string, PdfNode>): PdfDictNode => ({ kind: 'dict', entries: new Map(Object.entries(entries)) }),
    ref: (id: string, deref: () => PdfNode): PdfRefNode => ({ kind: 'ref', id, deref }),
    scalar: (value: string | number | boolean | null): PdfScalarNode => ({ kind: 'scalar', value })
};
