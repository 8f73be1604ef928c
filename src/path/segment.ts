import { MalformedPathError } from "../errors";
import type { PathSegment, PathSegmentType } from "../type";

export type PathCommand = {
    type: PathSegmentType;
    arity: number;
};

// command letters (lowercase) and their operand counts
export const PATH_COMMANDS: Readonly<Record<string, PathCommand>> = {
    m: { type: "MoveTo", arity: 2 },
    z: { type: "ClosePath", arity: 0 },
    l: { type: "LineTo", arity: 2 },
    h: { type: "HLineTo", arity: 1 },
    v: { type: "VLineTo", arity: 1 },
    c: { type: "CurveTo", arity: 6 },
    s: { type: "SmoothCurveTo", arity: 4 },
    q: { type: "QuadraticBezierTo", arity: 4 },
    t: { type: "SmoothQuadraticBezierTo", arity: 2 },
    a: { type: "ArcTo", arity: 7 },
};

const SEGMENT_LETTERS: Readonly<Record<PathSegmentType, string>> = {
    MoveTo: "m",
    ClosePath: "z",
    LineTo: "l",
    HLineTo: "h",
    VLineTo: "v",
    CurveTo: "c",
    SmoothCurveTo: "s",
    QuadraticBezierTo: "q",
    SmoothQuadraticBezierTo: "t",
    ArcTo: "a",
};

export function lookupCommand(letter: string): PathCommand | undefined {
    let key = letter.toLowerCase();
    return Object.prototype.hasOwnProperty.call(PATH_COMMANDS, key) ? PATH_COMMANDS[key] : undefined;
}

export function segmentArity(type: PathSegmentType) {
    return PATH_COMMANDS[SEGMENT_LETTERS[type]].arity;
}

/**
 * uppercase for absolute, lowercase for relative
 */
export function commandLetter(segment: PathSegment) {
    let letter = SEGMENT_LETTERS[segment.type];
    return segment.absolute ? letter.toUpperCase() : letter;
}

/**
 * build a frozen segment, checking the operand count
 */
export function createSegment(type: PathSegmentType, absolute: boolean, values: readonly number[]): PathSegment {
    let arity = segmentArity(type);
    if (values.length !== arity) {
        throw new MalformedPathError(
            `${type} takes ${arity} operands, got ${values.length}`,
            values.join(" ")
        );
    }
    return Object.freeze({ type, absolute, values: Object.freeze([...values]) });
}
