import type { SvgPath } from "../path";
import { SvgElement } from "./element";
import type { SvgElementOptions } from "./element";

/** <path>, with its d attribute readable as segments */
export class SvgPathElement extends SvgElement {
    constructor(options: Partial<SvgElementOptions> = {}) {
        super("path", options);
    }

    get d(): SvgPath {
        return this.getTypedAttribute("d");
    }

    set d(value: SvgPath) {
        this.attributes.set("d", value);
    }
}
