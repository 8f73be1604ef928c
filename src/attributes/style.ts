import { StyleParseError } from "../errors";

/**
 * inline css declarations of a style attribute,
 * kept in the order they were written
 */
export class Style {
    private readonly properties = new Map<string, string>();

    /**
     * "fill:red; stroke: blue" => fill, stroke;
     * values are split on the first colon so url(data:...) survives
     */
    static fromText(text: string) {
        let style = new Style();
        for (let declaration of text.split(";")) {
            if (!declaration.trim()) {
                continue;
            }
            let colon = declaration.indexOf(":");
            if (colon === -1) {
                throw new StyleParseError(`Missing ":" in style declaration "${declaration.trim()}"`, text);
            }
            let name = declaration.substring(0, colon).trim();
            if (!name) {
                throw new StyleParseError(`Empty property name in style declaration "${declaration.trim()}"`, text);
            }
            style.set(name, declaration.substring(colon + 1).trim());
        }
        return style;
    }

    get size() {
        return this.properties.size;
    }

    get(name: string) {
        return this.properties.get(name);
    }

    set(name: string, value: string) {
        this.properties.set(name, value);
        return this;
    }

    has(name: string) {
        return this.properties.has(name);
    }

    delete(name: string) {
        return this.properties.delete(name);
    }

    keys() {
        return [...this.properties.keys()];
    }

    toString() {
        return [...this.properties].map(([name, value]) => `${name}:${value}`).join(";");
    }
}
