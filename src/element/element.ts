import { AttributeStore, TYPED_ATTRIBUTE_COERCIONS } from "../attributes/store";
import type { AttributeValue, TypedAttributeMap, TypedAttributeName } from "../attributes/store";
import type { Style } from "../attributes/style";
import type { TransformList } from "../attributes/transformList";
import { ElementTreeError } from "../errors";
import { readAttributes, SVG_NAMESPACE, writeAttributes } from "./markup";

export type SvgElementOptions = {
    id: string;
    namespace: string;
};

/**
 * An element of the in-memory document: a tag name, its attributes
 * and the child elements it owns. Style and transform attributes can be
 * read as typed values; reading one that was never set creates it.
 */
export class SvgElement {
    readonly name: string;
    readonly namespace: string;
    readonly attributes = new AttributeStore();

    private readonly childList: SvgElement[] = [];
    private parentElement: SvgElement | null = null;

    constructor(name: string, options: Partial<SvgElementOptions> = {}) {
        let { id, namespace } = {
            ...{ namespace: SVG_NAMESPACE },
            ...options,
        };
        this.name = name;
        this.namespace = namespace;
        if (id !== undefined) {
            this.attributes.set("id", id);
        }
    }

    get id() {
        let id = this.attributes.get("id");
        return id === undefined || id === null ? undefined : String(id);
    }

    set id(value: string | undefined) {
        if (value === undefined) {
            this.attributes.delete("id");
        } else {
            this.attributes.set("id", value);
        }
    }

    get parent() {
        return this.parentElement;
    }

    get children(): readonly SvgElement[] {
        return this.childList;
    }

    getAttribute(name: string) {
        return this.attributes.get(name);
    }

    setAttribute(name: string, value: AttributeValue | null) {
        this.attributes.set(name, value);
        return this;
    }

    getTypedAttribute<K extends TypedAttributeName>(name: K): TypedAttributeMap[K] {
        return this.attributes.getTyped<TypedAttributeMap[K]>(name, TYPED_ATTRIBUTE_COERCIONS[name]);
    }

    get style(): Style {
        return this.getTypedAttribute("style");
    }

    set style(value: Style) {
        this.attributes.set("style", value);
    }

    get transform(): TransformList {
        return this.getTypedAttribute("transform");
    }

    set transform(value: TransformList) {
        this.attributes.set("transform", value);
    }

    /**
     * append `child` as the last child, detaching it from any previous parent
     */
    appendChild<T extends SvgElement>(child: T): T {
        for (let el: SvgElement | null = this; el; el = el.parentElement) {
            if (el === child) {
                throw new ElementTreeError(`Cannot append <${child.name}> inside itself`);
            }
        }
        child.parentElement?.removeChild(child);
        this.childList.push(child);
        child.parentElement = this;
        return child;
    }

    removeChild<T extends SvgElement>(child: T): T {
        let index = this.childList.indexOf(child);
        if (index === -1) {
            throw new ElementTreeError(`<${child.name}> is not a child of <${this.name}>`);
        }
        this.childList.splice(index, 1);
        child.parentElement = null;
        return child;
    }

    /**
     * read this element's attributes from a markup node;
     * child nodes are left to the document loader
     */
    readMarkup(node: Element) {
        readAttributes(this.attributes, node);
    }

    /**
     * Create the markup node for this element and its subtree, then append it
     * under `parent`, or as the document root when `parent` is null.
     */
    writeMarkup(doc: Document, parent: Node | null): Element {
        let me = doc.createElementNS(this.namespace, this.name);
        writeAttributes(this.attributes, me);

        for (let el of this.childList) {
            el.writeMarkup(doc, me);
        }

        (parent ?? doc).appendChild(me);
        return me;
    }
}
