/**
 * path data that could not be tokenized into segments
 */
export class MalformedPathError extends Error {
    readonly source: string;
    readonly token?: string;

    constructor(message: string, source: string, token?: string) {
        super(token === undefined ? message : `${message}: "${token}"`);
        this.name = "MalformedPathError";
        this.source = source;
        this.token = token;
    }
}

export class StyleParseError extends Error {
    readonly source: string;

    constructor(message: string, source: string) {
        super(message);
        this.name = "StyleParseError";
        this.source = source;
    }
}

export class TransformParseError extends Error {
    readonly source: string;

    constructor(message: string, source: string) {
        super(message);
        this.name = "TransformParseError";
        this.source = source;
    }
}

// appending an element under itself, removing a stranger
export class ElementTreeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ElementTreeError";
    }
}
