import lodash from "lodash";
import { Status, StatusWith } from "../status.js";
import type { DecodedRows, Directives, Series, Value } from "./types.js";

// Column-major view of the rows: one sequence per data column
export function transpose(rows: Value[][], column_count: number): Value[][] {
    if (rows.length == 0) {
        return Array.from({ length: column_count }, () => []);
    }
    return lodash.unzip(rows);
}

export function assemble_series(
    directives: Directives, decoded: DecodedRows): StatusWith<Series[]>
{
    const { chart_types, columns, axes } = directives;
    if (chart_types.length != columns.length) {
        return StatusWith.fail_with(
            `${chart_types.length} chart types for ${columns.length} columns`);
    }

    const values = transpose(decoded.rows, columns.length);
    const x = Object.freeze([...decoded.x]);
    const series: Series[] = [];

    for (const [idx, column] of columns.entries()) {
        if (column.name == "") {
            return StatusWith.fail_with(`column ${idx + 1} has an empty title`);
        }
        if (column.route_to_secondary && axes.y.secondary == undefined) {
            return StatusWith.fail_with(
                `column '${column.name}' is routed to the secondary y-axis, ` +
                `but secondary y-axis title is not specified`);
        }

        const entry: Series = {
            title: column.name,
            axis: column.route_to_secondary ? "secondary" : "primary",
            type: chart_types[idx],
            x,
            y: Object.freeze(values[idx]),
        };
        series.push(Object.freeze(entry));
    }
    return Status.ok().with(series);
}
