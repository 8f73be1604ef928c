import { parsePathData } from "../parser";
import { serializePathData } from "../serialize";
import type { PathData, PathSegment } from "../type";
import { createSegment } from "./segment";

/**
 * A path, composed of segments, as described in SVG 1.1 section 8.3.
 * Segments are frozen; build a new path to change one.
 */
export class SvgPath implements Iterable<PathSegment> {
    readonly segments: PathData;

    private constructor(segments: PathData) {
        this.segments = Object.freeze([...segments]);
    }

    static fromText(d: string) {
        return new SvgPath(parsePathData(d));
    }

    static fromSegments(segments: Iterable<PathSegment>) {
        let checked: PathSegment[] = [];
        for (let seg of segments) {
            checked.push(createSegment(seg.type, seg.absolute, seg.values));
        }
        return new SvgPath(checked);
    }

    static empty() {
        return new SvgPath([]);
    }

    get count() {
        return this.segments.length;
    }

    at(index: number): PathSegment | undefined {
        return this.segments[index];
    }

    // copies through text rather than structurally
    clone() {
        return SvgPath.fromText(this.toString());
    }

    toString(decimals = -1) {
        return serializePathData(this.segments, decimals);
    }

    [Symbol.iterator]() {
        return this.segments[Symbol.iterator]();
    }
}
