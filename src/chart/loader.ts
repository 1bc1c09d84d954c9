import fs from "fs";
import { Status, StatusWith } from "../status.js";
import type { Journal } from "../journal.js";
import { return_exception, return_fail, split_lines } from "../utils.js";
import { HEADER_LINES, check_header } from "./header_validator.js";
import { parse_directives } from "./directive_parser.js";
import { decode_rows } from "./row_decoder.js";
import { assemble_series } from "./series_assembler.js";
import { build_chart_spec } from "./chart_spec_builder.js";
import { DEFAULT_MARKERS } from "./types.js";
import type { ChartSpec, Dialect, Markers } from "./types.js";

// Runs the whole pipeline over already read file content
export function parse_spec(
    content: string, dialect: Dialect, journal?: Journal): StatusWith<ChartSpec>
{
    const lines = split_lines(content);
    const header = lines.slice(0, HEADER_LINES).map(line => line.trim());

    const header_status = check_header(header, dialect.comment);
    if (!header_status.done()) {
        return header_status.wrap("malformed header").with<ChartSpec>(undefined);
    }

    const directives = parse_directives(header, dialect, journal);
    if (!directives.done() || !directives.value) {
        return directives.wrap("invalid directives").with<ChartSpec>(undefined);
    }

    const rows = decode_rows(
        lines.slice(HEADER_LINES), directives.value.columns.length, dialect.delimiter,
        HEADER_LINES + 1);
    if (!rows.done() || !rows.value) {
        return rows.wrap("invalid data rows").with<ChartSpec>(undefined);
    }

    const series = assemble_series(directives.value, rows.value);
    if (!series.done() || !series.value) {
        return series.wrap("can't assemble series").with<ChartSpec>(undefined);
    }

    return Status.ok().with(build_chart_spec(directives.value, series.value));
}

export function load_spec(
    file_path: string,
    delimiter: string,
    journal?: Journal,
    markers: Partial<Markers> = {}
): StatusWith<ChartSpec> {
    const dialect: Dialect = { ...DEFAULT_MARKERS, ...markers, delimiter };

    let content: string;
    try {
        content = fs.readFileSync(file_path, "utf-8");
    } catch (error) {
        return return_exception(error, journal, `can't read ${file_path}`);
    }

    const result = parse_spec(content, dialect, journal);
    if (!result.done()) {
        return return_fail(`can't load ${file_path}`, journal, result);
    }
    journal?.log().debug(`loaded ${file_path}: ${result.value?.series.length} series`);
    return result;
}
