/**
 * XMP Metadata Decoder
 *
 * PDF documents may embed an XMP packet (an RDF/XML document) as the `/Metadata` stream of their catalog.
 * This module turns that packet into a plain record grouped by namespace prefix, so it can be merged
 * with the info dictionary before normalization.
 *
 * **Value mapping:**
 * - Simple properties (attributes or elements with text) → string
 * - `rdf:Bag` and `rdf:Seq` containers → array of the `rdf:li` texts
 * - `rdf:Alt` containers → record keyed by `xml:lang` (`x-default` when missing)
 *
 * @example
 * ```typescript
 * decodeXmp(packet);
 * // { dc: { title: { 'x-default': 'Paper' }, creator: ['Ada'] }, pdf: { Producer: 'TeX' } }
 * ```
 *
 * @module xmpDecoder
 * @see https://www.adobe.com/devnet/xmp.html XMP specification
 */

import { LogConfig, MetadataRecord, MetadataValue } from '../types';
import { logDebug } from '../utils/errorUtils';
import { getChildElements, getElementsByTagNameNS, parseXmlString } from '../utils/xmlUtils';

const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
const XML_NS = 'http://www.w3.org/XML/1998/namespace';
const XMLNS_NS = 'http://www.w3.org/2000/xmlns/';

/** Raised when the XMP packet is not well-formed XML */
export class XmpDecodeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'XmpDecodeError';
    }
}

/**
 * Key a property is grouped under: its prefix, or its namespace when it has none.
 */
const groupKey = (node: Element | Attr): string => node.prefix || node.namespaceURI || '';

/**
 * Decodes the value of a property element.
 */
const decodePropertyValue = (property: Element): MetadataValue => {
    const [container] = getChildElements(property, RDF_NS);
    if (!container) {
        return property.textContent ?? '';
    }

    const items = getChildElements(container, RDF_NS, 'li');
    if (container.localName === 'Alt') {
        const alternatives: MetadataRecord = {};
        for (const item of items) {
            const lang = item.getAttributeNS(XML_NS, 'lang') || 'x-default';
            alternatives[lang] = item.textContent ?? '';
        }
        return alternatives;
    }
    if (container.localName === 'Bag' || container.localName === 'Seq') {
        return items.map((item) => item.textContent ?? '');
    }
    return container.textContent ?? '';
};

const assign = (result: Record<string, MetadataRecord>, group: string, name: string, value: MetadataValue): void => {
    const target = result[group] ?? (result[group] = {});
    target[name] = value;
};

/**
 * Decodes an XMP packet into `{ [prefix]: { [property]: value } }`.
 *
 * @param xml - The packet as text
 * @param config - Logging configuration for parser warnings
 * @throws {XmpDecodeError} If the packet is not well-formed
 */
export const decodeXmp = (xml: string, config: LogConfig = {}): MetadataRecord => {
    const fail = (message: string): never => {
        throw new XmpDecodeError(message);
    };
    const doc = parseXmlString(xml, {
        warning: (message) => logDebug(`XMP warning: ${message}`, config),
        error: fail,
        fatalError: fail
    });

    const result: Record<string, MetadataRecord> = {};
    for (const description of getElementsByTagNameNS(doc, RDF_NS, 'Description')) {
        for (let i = 0; i < description.attributes.length; i++) {
            const attribute = description.attributes[i];
            if (attribute.namespaceURI === RDF_NS || attribute.namespaceURI === XMLNS_NS || attribute.name.startsWith('xmlns')) {
                continue;
            }
            assign(result, groupKey(attribute), attribute.localName, attribute.value);
        }
        for (const property of getChildElements(description)) {
            assign(result, groupKey(property), property.localName, decodePropertyValue(property));
        }
    }
    return result;
};
