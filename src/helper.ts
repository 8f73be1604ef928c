// svg number grammar: sign, integer and/or fraction, optional exponent
const NUMBER_TOKEN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isNumberToken(token: string) {
    return NUMBER_TOKEN.test(token);
}

/**
 * parse a single numeric token, locale-independent;
 * returns null for anything that is not a finite svg number
 */
export function parseNumberToken(token: string): number | null {
    if (!isNumberToken(token)) {
        return null;
    }
    let value = Number(token);
    return Number.isFinite(value) ? value : null;
}

/**
 * shortest decimal text that reads back to the same number,
 * or rounded to `decimals` places when decimals > -1
 */
export function formatNumber(value: number, decimals = -1) {
    let rounded = decimals > -1 ? +value.toFixed(decimals) : value;
    // no "-0" in output
    return String(Object.is(rounded, -0) ? 0 : rounded);
}
