export enum ChartType {
    Lines   = "lines",
    Bar     = "bar",
    Scatter = "scatter"
}

export type Axis = "primary" | "secondary";

export type Value = number | string;

// Characters of the directive header grammar. The field delimiter is chosen
// per load and so lives outside of this set.
export type Markers = {
    comment: string;
    placeholder: string;
    secondary: string;
}

export const DEFAULT_MARKERS: Readonly<Markers> = Object.freeze({
    comment: "#",
    placeholder: "_",
    secondary: "%",
});

export const DEFAULT_DELIMITER = ",";

export type Dialect = Markers & { delimiter: string };

export type XAxisSpec = {
    readonly title: string;
    readonly range_slider: boolean;
}

export type YAxisSpec = {
    readonly primary: string;
    readonly secondary?: string;
}

export type AxisSpec = {
    readonly x: XAxisSpec;
    readonly y: YAxisSpec;
}

export type ColumnSpec = {
    readonly name: string;
    readonly route_to_secondary: boolean;
}

export type Directives = {
    title: string;
    axes: AxisSpec;
    x_column: string;
    // Already reconciled: one entry per column
    chart_types: ChartType[];
    columns: ColumnSpec[];
}

export type DecodedRows = {
    x: Value[];
    // Data values of every row, without the leading x value
    rows: Value[][];
}

export type Series = {
    readonly title: string;
    readonly axis: Axis;
    readonly type: ChartType;
    readonly x: readonly Value[];
    readonly y: readonly Value[];
}

export type SecondaryAxis = {
    readonly title: string;
    readonly overlaying: "y";
    readonly side: "right";
}

export type ChartSpec = {
    readonly title: string;
    readonly axes: {
        readonly x: XAxisSpec;
        readonly y: {
            readonly title: string;
            readonly secondary?: SecondaryAxis;
        };
    };
    readonly series: readonly Series[];
}
