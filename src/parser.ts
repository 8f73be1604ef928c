/**
 * Standalone pathData parser
 * reads the d attribute grammar of SVG 1.1 section 8.3
 * into an ordered list of fixed-arity segments
 * https://www.w3.org/TR/SVG11/paths.html#PathData
 *
 * Tokens must be separated by whitespace or commas:
 * "M10,20 L30 40" works, packed numbers like "M10-20" do not.
 */

import { MalformedPathError } from "./errors";
import { parseNumberToken } from "./helper";
import { createSegment, lookupCommand, PATH_COMMANDS } from "./path/segment";
import type { PathCommand } from "./path/segment";
import type { PathData, PathSegment } from "./type";

const SEPARATORS = /[ \t\r\n,]/;
const LEADING_LETTER = /^\p{L}/u;

export function parsePathData(d: string): PathData {
    // drop empty tokens left by adjacent separators
    let tokens = d.split(SEPARATORS).filter(Boolean);

    let pathData: PathSegment[] = [];
    let command: PathCommand | null = null;
    let absolute = false;
    let i = 0;

    while (i < tokens.length) {
        let token = tokens[i];

        if (LEADING_LETTER.test(token)) {
            let letter = token.substring(0, 1);
            let next = lookupCommand(letter);
            if (!next) {
                throw new MalformedPathError("Unknown path command", d, letter);
            }
            command = next;
            absolute = letter !== letter.toLowerCase();

            // strip off the command letter, "M10" keeps "10" as first operand
            let rest = token.substring(1);
            if (rest.length === 0) {
                i++;
            } else {
                tokens[i] = rest;
            }
        } else if (command === null) {
            throw new MalformedPathError("Path data must start with a command", d, token);
        } else if (command.type === "MoveTo") {
            // implicit lineto after moveto, SVG 1.1 section 8.3.2
            command = PATH_COMMANDS.l;
        } else if (command.arity === 0) {
            throw new MalformedPathError("ClosePath takes no operands", d, token);
        }

        let values: number[] = [];
        for (let j = 0; j < command.arity; j++) {
            let operand = tokens[i + j];
            if (operand === undefined) {
                throw new MalformedPathError(
                    `${command.type} expects ${command.arity} operands, found ${j}`,
                    d
                );
            }
            let value = parseNumberToken(operand);
            if (value === null) {
                throw new MalformedPathError("Invalid number in path data", d, operand);
            }
            values.push(value);
        }

        pathData.push(createSegment(command.type, absolute, values));
        i += command.arity;
    }

    return pathData;
}
