import { TransformParseError } from "../errors";
import { formatNumber, parseNumberToken } from "../helper";
import type { Matrix, Point } from "../type";

export type TransformType = "matrix" | "translate" | "scale" | "rotate" | "skewX" | "skewY";

export type Transform = Readonly<{
    type: TransformType;
    values: readonly number[];
}>;

// accepted argument counts per transform function
const TRANSFORM_ARITIES: Readonly<Record<TransformType, readonly number[]>> = {
    matrix: [6],
    translate: [1, 2],
    scale: [1, 2],
    rotate: [1, 3],
    skewX: [1],
    skewY: [1],
};

const IDENTITY: Matrix = { a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 };

const TRANSFORM_ITEM = /\s*([A-Za-z]+)\s*\(([^)]*)\)\s*,?/y;

function isTransformType(name: string): name is TransformType {
    return Object.prototype.hasOwnProperty.call(TRANSFORM_ARITIES, name);
}

/**
 * the transform attribute: an ordered list of
 * matrix/translate/scale/rotate/skewX/skewY functions
 */
export class TransformList {
    readonly items: readonly Transform[];

    constructor(items: readonly Transform[] = []) {
        this.items = Object.freeze([...items]);
    }

    static fromText(text: string) {
        let items: Transform[] = [];
        let source = text.trim();
        TRANSFORM_ITEM.lastIndex = 0;

        while (TRANSFORM_ITEM.lastIndex < source.length) {
            let start = TRANSFORM_ITEM.lastIndex;
            let match = TRANSFORM_ITEM.exec(source);
            if (!match) {
                throw new TransformParseError(`Unexpected text "${source.substring(start)}" in transform list`, text);
            }
            let [, name, args] = match;
            if (!isTransformType(name)) {
                throw new TransformParseError(`Unknown transform "${name}"`, text);
            }

            let values: number[] = [];
            for (let token of args.split(/[\s,]+/).filter(Boolean)) {
                let value = parseNumberToken(token);
                if (value === null) {
                    throw new TransformParseError(`Invalid number "${token}" in ${name}()`, text);
                }
                values.push(value);
            }
            if (!TRANSFORM_ARITIES[name].includes(values.length)) {
                throw new TransformParseError(`${name}() does not take ${values.length} arguments`, text);
            }
            items.push(Object.freeze({ type: name, values: Object.freeze(values) }));
        }
        return new TransformList(items);
    }

    get count() {
        return this.items.length;
    }

    /**
     * compose every item, left to right, into one matrix
     */
    toMatrix(): Matrix {
        return this.items.reduce((matrix, item) => multiply(matrix, transformToMatrix(item)), IDENTITY);
    }

    apply(pt: Point): Point {
        return transformPoint(pt, this.toMatrix());
    }

    toString() {
        return this.items
            .map((item) => `${item.type}(${item.values.map((val) => formatNumber(val)).join(",")})`)
            .join(" ");
    }
}

function transformToMatrix(item: Transform): Matrix {
    let v = item.values;
    switch (item.type) {
        case "matrix":
            return { a: v[0], b: v[1], c: v[2], d: v[3], e: v[4], f: v[5] };

        case "translate":
            return { ...IDENTITY, e: v[0], f: v[1] ?? 0 };

        case "scale":
            return { ...IDENTITY, a: v[0], d: v[1] ?? v[0] };

        case "rotate": {
            let rad = (v[0] * Math.PI) / 180;
            let cos = Math.cos(rad);
            let sin = Math.sin(rad);
            let rotation = { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 };
            if (v.length < 3) {
                return rotation;
            }
            // rotate about (cx, cy)
            let [, cx, cy] = v;
            return multiply(
                multiply({ ...IDENTITY, e: cx, f: cy }, rotation),
                { ...IDENTITY, e: -cx, f: -cy }
            );
        }

        case "skewX":
            return { ...IDENTITY, c: Math.tan((v[0] * Math.PI) / 180) };

        case "skewY":
            return { ...IDENTITY, b: Math.tan((v[0] * Math.PI) / 180) };
    }
}

// m × n: n is applied first
function multiply(m: Matrix, n: Matrix): Matrix {
    return {
        a: m.a * n.a + m.c * n.b,
        b: m.b * n.a + m.d * n.b,
        c: m.a * n.c + m.c * n.d,
        d: m.b * n.c + m.d * n.d,
        e: m.a * n.e + m.c * n.f + m.e,
        f: m.b * n.e + m.d * n.f + m.f,
    };
}

// transform point by 2d matrix
function transformPoint(pt: Point, matrix: Matrix) {
    let { a, b, c, d, e, f } = matrix;
    let { x, y } = pt;
    return { x: a * x + c * y + e, y: b * x + d * y + f };
}
