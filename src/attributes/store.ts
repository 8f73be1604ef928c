import { SvgPath } from "../path";
import { Style } from "./style";
import { TransformList } from "./transformList";

/** values that have been coerced out of attribute text */
export type TypedAttribute = Style | TransformList | SvgPath;

/** raw attribute text, a plain number, or a coerced value */
export type AttributeValue = string | number | TypedAttribute;

/**
 * how a typed attribute is recognised, read from text,
 * and created when the attribute is missing
 */
export interface AttributeCoercion<T extends TypedAttribute> {
    is(value: AttributeValue): value is T;
    fromText(text: string): T;
    create(): T;
}

export const styleCoercion: AttributeCoercion<Style> = {
    is: (value): value is Style => value instanceof Style,
    fromText: (text) => Style.fromText(text),
    create: () => new Style(),
};

export const transformCoercion: AttributeCoercion<TransformList> = {
    is: (value): value is TransformList => value instanceof TransformList,
    fromText: (text) => TransformList.fromText(text),
    create: () => new TransformList(),
};

export const pathCoercion: AttributeCoercion<SvgPath> = {
    is: (value): value is SvgPath => value instanceof SvgPath,
    fromText: (text) => SvgPath.fromText(text),
    create: () => SvgPath.empty(),
};

/** attribute names that have a typed representation */
export type TypedAttributeMap = {
    style: Style;
    transform: TransformList;
    d: SvgPath;
};

export type TypedAttributeName = keyof TypedAttributeMap;

export const TYPED_ATTRIBUTE_COERCIONS: {
    readonly [K in TypedAttributeName]: AttributeCoercion<TypedAttributeMap[K]>;
} = {
    style: styleCoercion,
    transform: transformCoercion,
    d: pathCoercion,
};

/** text form of any stored value */
export function attributeText(value: AttributeValue) {
    return typeof value === "string" ? value : value.toString();
}

/**
 * Attributes of one element, in insertion order.
 * Names may carry a namespace prefix ("xlink:href").
 */
export class AttributeStore {
    private readonly values = new Map<string, AttributeValue | null>();

    get size() {
        return this.values.size;
    }

    get(name: string) {
        return this.values.get(name);
    }

    set(name: string, value: AttributeValue | null) {
        this.values.set(name, value);
        return this;
    }

    has(name: string) {
        return this.values.has(name);
    }

    delete(name: string) {
        return this.values.delete(name);
    }

    // snapshots, safe to iterate while the store changes
    keys() {
        return [...this.values.keys()];
    }

    entries() {
        return [...this.values.entries()];
    }

    /**
     * Read an attribute as a typed value. Raw text is coerced and the result
     * replaces it in the store; a missing attribute is created from the
     * coercion's default, never by parsing empty text.
     */
    getTyped<T extends TypedAttribute>(name: string, coercion: AttributeCoercion<T>): T {
        let stored = this.values.get(name);
        if (stored !== undefined && stored !== null && coercion.is(stored)) {
            return stored;
        }
        let typed = stored === undefined || stored === null
            ? coercion.create()
            : coercion.fromText(attributeText(stored));
        this.values.set(name, typed);
        return typed;
    }
}
