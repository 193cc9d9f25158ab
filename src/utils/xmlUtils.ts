/**
 * XML Parsing Utilities
 *
 * Provides helper functions for parsing and navigating XML documents.
 * Used by the XMP decoder to read the metadata packet embedded in PDF documents.
 *
 * @module xmlUtils
 */

import { DOMParser } from '@xmldom/xmldom';

/** DOM nodeType of elements */
const ELEMENT_NODE = 1;

/**
 * Receives the problems the XML parser reports.
 */
export interface XmlErrorHandler {
    warning: (message: string) => void;
    error: (message: string) => void;
    fatalError: (message: string) => void;
}

/**
 * Parses an XML string into a DOM Document object.
 *
 * Uses the @xmldom/xmldom library to parse XML strings in a Node.js environment.
 * This is necessary because Node.js doesn't have a built-in DOM parser like browsers do.
 *
 * @param xml - The XML content as a string
 * @param errorHandler - Receives parser warnings and errors. When omitted xmldom reports them on the console.
 * @returns A Document object that can be queried using standard DOM methods
 * @example
 * ```typescript
 * const doc = parseXmlString('<root><item>Hello</item></root>');
 * console.log(doc.getElementsByTagName('item')[0].textContent); // "Hello"
 * ```
 */
export const parseXmlString = (xml: string, errorHandler?: XmlErrorHandler): Document => {
    const parser = new DOMParser(errorHandler ? { errorHandler } : {});
    return parser.parseFromString(xml, "text/xml");
};

/**
 * Tells whether a DOM node is an element.
 */
export const isElement = (node: Node): node is Element => node.nodeType === ELEMENT_NODE;

/**
 * Gets all elements with a namespace and local name, at any depth, as an array.
 *
 * @param element - The element or document to search within
 * @param namespace - The namespace URI (e.g., the RDF namespace)
 * @param localName - The local name without prefix (e.g., 'Description')
 */
export const getElementsByTagNameNS = (element: Element | Document, namespace: string, localName: string): Element[] => {
    return Array.from(element.getElementsByTagNameNS(namespace, localName));
};

/**
 * Gets the direct child elements of an element.
 * Unlike getElementsByTagName, this does not search recursively.
 *
 * @param parent - The parent element
 * @param namespace - Only keep children in this namespace
 * @param localName - Only keep children with this local name
 */
export const getChildElements = (parent: Element, namespace?: string, localName?: string): Element[] => {
    const result: Element[] = [];
    if (!parent.childNodes) return result;

    for (let i = 0; i < parent.childNodes.length; i++) {
        const child = parent.childNodes[i];
        if (!isElement(child)) continue;
        if (namespace !== undefined && child.namespaceURI !== namespace) continue;
        if (localName !== undefined && child.localName !== localName) continue;
        result.push(child);
    }
    return result;
};
