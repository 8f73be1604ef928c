export { parsePathData } from "./parser";
export { serializePathData } from "./serialize";
export { SvgPath } from "./path";
export { createSegment, commandLetter, segmentArity, PATH_COMMANDS } from "./path/segment";
export type { PathCommand } from "./path/segment";
export type { PathSegment, PathSegmentType, PathData, Point, Matrix } from "./type";

export { Style } from "./attributes/style";
export { TransformList } from "./attributes/transformList";
export type { Transform, TransformType } from "./attributes/transformList";
export {
    AttributeStore,
    attributeText,
    styleCoercion,
    transformCoercion,
    pathCoercion,
    TYPED_ATTRIBUTE_COERCIONS,
} from "./attributes/store";
export type { AttributeCoercion, AttributeValue, TypedAttribute, TypedAttributeMap, TypedAttributeName } from "./attributes/store";

export { SvgElement } from "./element/element";
export type { SvgElementOptions } from "./element/element";
export { SvgPathElement } from "./element/pathElement";
export {
    readAttributes,
    writeAttributes,
    serializeElement,
    SVG_NAMESPACE,
    XLINK_NAMESPACE,
    XMLNS_NAMESPACE,
} from "./element/markup";

export { MalformedPathError, StyleParseError, TransformParseError, ElementTreeError } from "./errors";
