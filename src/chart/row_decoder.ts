import { Status, StatusWith } from "../status.js";
import type { DecodedRows, Value } from "./types.js";

export type ParsedField =
    { kind: "int", value: number } |
    { kind: "float", value: number } |
    { kind: "string", value: string }

// Optional sign, then digits with an optional fraction, or a bare fraction.
// Exponents, separators and anything after the number are not accepted.
const NUMERIC_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export function parse_field(literal: string): ParsedField {
    const candidate = literal.trim();
    if (!NUMERIC_LITERAL.test(candidate)) {
        return { kind: "string", value: literal };
    }
    if (candidate.includes(".")) {
        return { kind: "float", value: parseFloat(candidate) };
    }
    const value = parseInt(candidate, 10);
    // Integers a number can't hold exactly keep their digits as text
    if (!Number.isSafeInteger(value)) {
        return { kind: "string", value: literal };
    }
    return { kind: "int", value };
}

export function coerce_field(literal: string): Value {
    return parse_field(literal).value;
}

// 'first_line' is the 1-based number of lines[0] in the source file, used in
// error messages only.
export function decode_rows(
    lines: string[], column_count: number, delimiter: string, first_line: number = 1
): StatusWith<DecodedRows> {
    const expected = column_count + 1;
    const result: DecodedRows = { x: [], rows: [] };

    for (const [idx, line] of lines.entries()) {
        const stripped = line.trim();
        if (stripped == "") {
            continue;
        }

        const fields = stripped.split(delimiter);
        if (fields.length != expected) {
            return StatusWith.fail_with(
                `line ${first_line + idx}: expected ${expected} fields, got ${fields.length}`);
        }

        const [x, ...values] = fields.map(coerce_field);
        result.x.push(x);
        result.rows.push(values);
    }
    return Status.ok().with(result);
}
