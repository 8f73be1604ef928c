import { formatNumber } from "./helper";
import { commandLetter } from "./path/segment";
import type { PathData, PathSegment } from "./type";

/**
 * serialize pathData array to
 * d attribute string
 *
 * consecutive segments of one kind share a single command letter,
 * and linetos right after a moveto stay implicit
 */
export function serializePathData(pathData: PathData, decimals = -1) {
    let d = "";
    let com0: PathSegment | undefined;

    for (let com of pathData) {
        if (needsCommandLetter(com0, com)) {
            d += `${commandLetter(com)} `;
        }
        for (let val of com.values) {
            d += `${formatNumber(val, decimals)} `;
        }
        com0 = com;
    }
    return d;
}

function needsCommandLetter(com0: PathSegment | undefined, com: PathSegment) {
    if (!com0 || com0.absolute !== com.absolute) {
        return true;
    }
    if (com0.type === com.type) {
        return false;
    }
    return !(com0.type === "MoveTo" && com.type === "LineTo");
}
