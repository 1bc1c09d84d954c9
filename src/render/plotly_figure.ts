import type { Layout, LayoutAxis, PlotData } from "plotly.js";
import { ChartType } from "../chart/types.js";
import type { ChartSpec, Series } from "../chart/types.js";

export type Trace = Partial<PlotData>;

export type Figure = {
    data: Trace[];
    layout: Partial<Layout>;
}

export function trace_primitive(type: ChartType): Pick<Trace, "type" | "mode"> {
    switch (type) {
        case ChartType.Lines:
            return { type: "scatter", mode: "lines" };
        case ChartType.Scatter:
            return { type: "scatter", mode: "markers" };
        case ChartType.Bar:
            return { type: "bar" };
    }
}

export function to_trace(series: Series): Trace {
    const trace: Trace = {
        ...trace_primitive(series.type),
        name: series.title,
        x: [...series.x],
        y: [...series.y],
    };
    if (series.axis == "secondary") {
        trace.yaxis = "y2";
    }
    return trace;
}

export function to_figure(spec: ChartSpec): Figure {
    const { x, y } = spec.axes;

    const xaxis: Partial<LayoutAxis> = { title: { text: x.title } };
    if (x.range_slider) {
        xaxis.rangeslider = { visible: true };
    }

    const layout: Partial<Layout> = {
        title: { text: spec.title },
        xaxis,
        yaxis: { title: { text: y.title } },
    };
    if (y.secondary) {
        layout.yaxis2 = {
            title: { text: y.secondary.title },
            overlaying: y.secondary.overlaying,
            side: y.secondary.side,
        };
    }
    if (spec.series.some(s => s.type == ChartType.Bar)) {
        layout.barmode = "group";
    }

    return { data: spec.series.map(to_trace), layout };
}
