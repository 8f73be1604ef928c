export type PathSegmentType =
    | "MoveTo"
    | "LineTo"
    | "HLineTo"
    | "VLineTo"
    | "CurveTo"
    | "SmoothCurveTo"
    | "QuadraticBezierTo"
    | "SmoothQuadraticBezierTo"
    | "ArcTo"
    | "ClosePath";

export type PathSegment = Readonly<{
    type: PathSegmentType;
    absolute: boolean;
    values: readonly number[];
}>;

export type PathData = readonly PathSegment[];

export type Point = {
    x: number;
    y: number;
}

export type Matrix = {
    a: number;
    b: number;
    c: number;
    d: number;
    e: number;
    f: number;
}
