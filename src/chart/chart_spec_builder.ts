import type { ChartSpec, Directives, Series } from "./types.js";

export function build_chart_spec(directives: Directives, series: Series[]): ChartSpec {
    const { title, axes } = directives;
    const uses_secondary = series.some(s => s.axis == "secondary");

    const y = uses_secondary && axes.y.secondary != undefined
        ? {
            title: axes.y.primary,
            secondary: Object.freeze({
                title: axes.y.secondary,
                overlaying: "y",
                side: "right",
            } as const),
        }
        : { title: axes.y.primary };

    return Object.freeze({
        title,
        axes: Object.freeze({
            x: Object.freeze({ title: axes.x.title, range_slider: axes.x.range_slider }),
            y: Object.freeze(y),
        }),
        series: Object.freeze([...series]),
    });
}
