import { Status, StatusWith } from "../status.js";
import type { Journal } from "../journal.js";
import { ChartType } from "./types.js";
import type { AxisSpec, ColumnSpec, Dialect, Directives, XAxisSpec, YAxisSpec } from "./types.js";

const RANGE_SLIDER = "rangeslider";

const CHART_TYPES: Record<string, ChartType> = {
    "lines"  : ChartType.Lines,
    "bar"    : ChartType.Bar,
    "scatter": ChartType.Scatter
};

// Chart type line is either a single type, that applies to every column, or an
// explicit list of types, one per column.
export type ChartTypeDirective =
    { kind: "broadcast", type: ChartType } |
    { kind: "explicit", types: ChartType[] }

export function parse_chart_type(tag: string): ChartType | undefined {
    const key = tag.trim().toLowerCase();
    return Object.prototype.hasOwnProperty.call(CHART_TYPES, key) ? CHART_TYPES[key] : undefined;
}

function strip_marker(line: string, comment_marker: string): string {
    return line.slice(comment_marker.length).trim();
}

export function parse_x_axis(directive: string): XAxisSpec {
    if (directive.includes(":")) {
        const parts = directive.split(":");
        if (parts.length == 2 && parts[1].trim() == RANGE_SLIDER) {
            return { title: parts[0].trim(), range_slider: true };
        }
    }
    return { title: directive, range_slider: false };
}

export function parse_y_axis(directive: string, delimiter: string, journal?: Journal): YAxisSpec {
    const [primary, secondary, ...rest] = directive.split(delimiter).map(t => t.trim());
    if (rest.length > 0) {
        journal?.log().warn(`y-axis titles beyond the second are ignored: ${rest.join(delimiter)}`);
    }
    if (secondary) {
        return { primary, secondary };
    }
    return { primary };
}

export function parse_chart_types(
    directive: string, dialect: Dialect): StatusWith<ChartTypeDirective>
{
    const tokens = directive.split(dialect.delimiter).map(t => t.trim().toLowerCase());

    if (tokens.length == 1) {
        const type = parse_chart_type(tokens[0]);
        if (type == undefined) {
            return StatusWith.fail_with(`unknown chart type '${tokens[0]}'`);
        }
        return Status.ok().with<ChartTypeDirective>({ kind: "broadcast", type });
    }

    const [leading, ...tags] = tokens;
    if (leading != dialect.placeholder.toLowerCase()) {
        return StatusWith.fail_with(
            `several chart types MUST be preceded by '${dialect.placeholder}'`);
    }

    const types: ChartType[] = [];
    for (const tag of tags) {
        const type = parse_chart_type(tag);
        if (type == undefined) {
            return StatusWith.fail_with(`unknown chart type '${tag}'`);
        }
        types.push(type);
    }
    return Status.ok().with<ChartTypeDirective>({ kind: "explicit", types });
}

export function parse_column(token: string, secondary_marker: string): StatusWith<ColumnSpec> {
    if (token == secondary_marker) {
        return StatusWith.fail_with(`column title can't be just '${secondary_marker}'`);
    }
    if (token.startsWith(secondary_marker)) {
        const name = token.slice(secondary_marker.length).trim();
        return Status.ok().with({ name, route_to_secondary: true });
    }
    return Status.ok().with({ name: token, route_to_secondary: false });
}

export function parse_columns(
    directive: string, dialect: Dialect): StatusWith<{ x_column: string, columns: ColumnSpec[] }>
{
    const tokens = directive.split(dialect.delimiter).map(t => t.trim());
    if (tokens.length < 2) {
        return StatusWith.fail_with("at least x column and one data column MUST be specified");
    }

    const [x_column, ...titles] = tokens;
    const columns: ColumnSpec[] = [];
    for (const [idx, title] of titles.entries()) {
        const status = parse_column(title, dialect.secondary);
        if (!status.done() || !status.value) {
            return status.wrap(`column ${idx + 2}`).with<{ x_column: string, columns: ColumnSpec[] }>(undefined);
        }
        columns.push(status.value);
    }
    return Status.ok().with({ x_column, columns });
}

// Fits chart types to the number of data columns: a single type is repeated
// for every column, several types MUST match the columns one to one.
export function reconcile_chart_types(
    directive: ChartTypeDirective, column_count: number): StatusWith<ChartType[]>
{
    if (directive.kind == "broadcast") {
        return Status.ok().with(new Array<ChartType>(column_count).fill(directive.type));
    }

    const types = directive.types;
    if (types.length > column_count || (types.length > 1 && types.length != column_count)) {
        return StatusWith.fail_with(
            `${types.length} chart types specified for ${column_count} columns`);
    }
    const padded = [...types];
    while (padded.length < column_count) {
        padded.push(types[0]);
    }
    return Status.ok().with(padded);
}

// Expects lines that have already passed 'check_header()'
export function parse_directives(
    lines: string[], dialect: Dialect, journal?: Journal): StatusWith<Directives>
{
    const [title, x_axis, y_axis, chart_types, columns] =
        lines.slice(0, 5).map(line => strip_marker(line, dialect.comment));

    const axes: AxisSpec = {
        x: parse_x_axis(x_axis),
        y: parse_y_axis(y_axis, dialect.delimiter, journal),
    };

    const types_status = parse_chart_types(chart_types, dialect);
    if (!types_status.done() || !types_status.value) {
        return types_status.wrap("invalid chart type line").with<Directives>(undefined);
    }

    const columns_status = parse_columns(columns, dialect);
    if (!columns_status.done() || !columns_status.value) {
        return columns_status.wrap("invalid column title line").with<Directives>(undefined);
    }
    const { x_column, columns: column_specs } = columns_status.value;

    const reconciled = reconcile_chart_types(types_status.value, column_specs.length);
    if (!reconciled.done() || !reconciled.value) {
        return reconciled.wrap("chart types don't match columns").with<Directives>(undefined);
    }

    return Status.ok().with({
        title,
        axes,
        x_column,
        chart_types: reconciled.value,
        columns: column_specs,
    });
}
