/**
 * Markup I/O: moves attributes between an AttributeStore and a DOM element.
 * Runs on any W3C DOM; in Node that is @xmldom/xmldom.
 */

import { DOMImplementation, XMLSerializer } from "@xmldom/xmldom";
import { attributeText } from "../attributes/store";
import type { AttributeStore, AttributeValue } from "../attributes/store";
import { Style } from "../attributes/style";
import { TransformList } from "../attributes/transformList";
import type { SvgElement } from "./element";

export const SVG_NAMESPACE = "http://www.w3.org/2000/svg";
export const XLINK_NAMESPACE = "http://www.w3.org/1999/xlink";
export const XMLNS_NAMESPACE = "http://www.w3.org/2000/xmlns/";

const XLINK_PREFIX = "xlink:";

/**
 * copy every attribute of `node` into the store under its qualified name;
 * style and transform are parsed on the way in
 */
export function readAttributes(store: AttributeStore, node: Element) {
    let atts = node.attributes;
    for (let i = 0; i < atts.length; i++) {
        let att = atts.item(i);
        if (!att) {
            continue;
        }
        if (att.name === "style") {
            store.set("style", Style.fromText(att.value));
        } else if (att.name === "transform") {
            store.set("transform", TransformList.fromText(att.value));
        } else {
            store.set(att.name, att.value);
        }
    }
}

/**
 * set every non-null store entry as an attribute of `node`
 */
export function writeAttributes(store: AttributeStore, node: Element) {
    for (let [name, value] of store.entries()) {
        if (value === null) {
            continue;
        }
        if (name === "style") {
            node.setAttribute("style", styleText(value));
        } else if (name === "transform") {
            node.setAttribute("transform", attributeText(value));
        } else if (name.startsWith(XLINK_PREFIX)) {
            // local name in the xlink namespace, never a literal "xlink:href"
            let localName = name.substring(XLINK_PREFIX.length);
            if (!localName) {
                console.warn(`Attribute "${name}" has no local name, skipping it.`);
                continue;
            }
            node.setAttributeNS(XLINK_NAMESPACE, XLINK_PREFIX + localName, attributeText(value));
        } else if (name === "xmlns" || name.startsWith("xmlns:")) {
            // declarations, so the serializer does not emit them twice
            node.setAttributeNS(XMLNS_NAMESPACE, name, attributeText(value));
        } else {
            // the xml: prefix is always bound
            if (name.includes(":") && !name.startsWith("xml:")) {
                console.warn(`Attribute "${name}" has an unbound prefix, writing it without a namespace.`);
            }
            node.setAttribute(name, attributeText(value));
        }
    }
}

function styleText(value: AttributeValue) {
    return value instanceof Style ? value.toString() : attributeText(value);
}

/**
 * write `root` and its children into a fresh XML document
 * and return the document text
 */
export function serializeElement(root: SvgElement) {
    let doc = new DOMImplementation().createDocument(null, null, null);
    root.writeMarkup(doc, null);
    return new XMLSerializer().serializeToString(doc);
}
