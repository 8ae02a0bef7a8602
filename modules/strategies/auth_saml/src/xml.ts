/**
 * SAML Strategy - XML Utilities
 *
 * DOM helpers over @xmldom/xmldom. Lookups are namespace-qualified and
 * walk direct children unless stated otherwise, so an element injected
 * elsewhere in the document is never mistaken for the one the schema
 * places at that position.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';

const ELEMENT_NODE = 1;

/** Attribute names treated as XML IDs when resolving signature references */
const ID_ATTRIBUTES = ['ID', 'Id', 'id'] as const;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse an XML document.
 *
 * DOCTYPE declarations are refused outright: SAML messages never carry
 * one, and refusing them rules out entity expansion.
 *
 * @throws Error on DOCTYPE, parse errors, or an empty document
 */
export function parseXml(xml: string): Document {
    if (/<!DOCTYPE/i.test(xml)) {
        throw new Error('XML must not contain a DOCTYPE declaration');
    }

    const fail = (msg: string): never => {
        throw new Error(`XML parse error: ${msg}`);
    };

    const parser = new DOMParser({
        errorHandler: {
            warning: () => undefined,
            error: fail,
            fatalError: fail,
        },
    });

    const doc = parser.parseFromString(xml, 'text/xml');
    if (!doc || !doc.documentElement) {
        throw new Error('XML parse error: no document element');
    }

    return doc;
}

export function serializeXml(node: Node): string {
    return new XMLSerializer().serializeToString(node);
}

// =============================================================================
// Traversal
// =============================================================================

export function isElement(node: Node): node is Element {
    return node.nodeType === ELEMENT_NODE;
}

/**
 * Direct element children, optionally filtered by namespace and local name.
 */
export function childElements(parent: Node, namespace?: string, localName?: string): Element[] {
    return Array.from(parent.childNodes)
        .filter(isElement)
        .filter(el =>
            (namespace === undefined || el.namespaceURI === namespace) &&
            (localName === undefined || el.localName === localName)
        );
}

/**
 * First direct child with the given name, or null.
 */
export function firstChild(parent: Node, namespace: string, localName: string): Element | null {
    return childElements(parent, namespace, localName)[0] ?? null;
}

/**
 * All descendants with the given name.
 */
export function descendants(parent: Document | Element, namespace: string, localName: string): Element[] {
    return Array.from(parent.getElementsByTagNameNS(namespace, localName));
}

/**
 * Trimmed text content, or undefined when empty.
 */
export function textOf(element: Element | null): string | undefined {
    const text = element?.textContent?.trim();
    return text ? text : undefined;
}

/**
 * Attribute value, or undefined when absent or empty.
 */
export function attr(element: Element, name: string): string | undefined {
    const value = element.getAttribute(name);
    return value ? value : undefined;
}

// =============================================================================
// ID Resolution
// =============================================================================

/**
 * The element's XML ID, read from ID, Id or id.
 */
export function getElementId(element: Element): string | undefined {
    for (const name of ID_ATTRIBUTES) {
        const value = attr(element, name);
        if (value !== undefined) {
            return value;
        }
    }
    return undefined;
}

/**
 * Every element in the document carrying `id` in any ID attribute.
 * More than one result means the document is ambiguous and must be refused.
 */
export function findElementsById(doc: Document, id: string): Element[] {
    const results: Element[] = [];

    const visit = (node: Node): void => {
        if (isElement(node) && ID_ATTRIBUTES.some(name => node.getAttribute(name) === id)) {
            results.push(node);
        }
        // Only elements are walked: text and comment nodes have null childNodes
        for (const child of Array.from(node.childNodes)) {
            if (isElement(child)) {
                visit(child);
            }
        }
    };

    visit(doc);
    return results;
}

// =============================================================================
// Serialization Helpers
// =============================================================================

/**
 * Escape special XML characters for attribute values and text.
 */
export function escapeXml(str: string): string {
    return str
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

/**
 * SAML timestamps: UTC, second precision.
 *
 * @example
 * ```typescript
 * toSamlInstant(new Date('2026-01-15T10:30:00.123Z')); // '2026-01-15T10:30:00Z'
 * ```
 */
export function toSamlInstant(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Parse an xs:dateTime into epoch milliseconds.
 *
 * @throws Error if the value is not a timestamp
 */
export function parseInstant(value: string): number {
    const ms = Date.parse(value);
    if (Number.isNaN(ms)) {
        throw new Error(`Invalid timestamp: ${value}`);
    }
    return ms;
}
