import { describe, expect, it } from "vitest";
import {
    parse_chart_types,
    parse_column,
    parse_columns,
    parse_directives,
    parse_x_axis,
    parse_y_axis,
    reconcile_chart_types,
} from "../../src/chart/directive_parser.js";
import { ChartType, DEFAULT_MARKERS, type Dialect } from "../../src/chart/types.js";

const DIALECT: Dialect = { ...DEFAULT_MARKERS, delimiter: "," };

describe("parse_x_axis", () => {
    it("recognises the range slider sub-directive", () => {
        expect(parse_x_axis("time:rangeslider")).toEqual({ title: "time", range_slider: true });
    });

    it("keeps the whole directive when the right part is not 'rangeslider'", () => {
        expect(parse_x_axis("time:foo")).toEqual({ title: "time:foo", range_slider: false });
    });

    it("keeps the whole directive when there are several separators", () => {
        expect(parse_x_axis("a:b:rangeslider")).toEqual({ title: "a:b:rangeslider", range_slider: false });
    });

    it("takes a plain title", () => {
        expect(parse_x_axis("minute")).toEqual({ title: "minute", range_slider: false });
    });
});

describe("parse_y_axis", () => {
    it("takes a single title as primary", () => {
        expect(parse_y_axis("ms", ",")).toEqual({ primary: "ms" });
    });

    it("takes the second title as secondary", () => {
        expect(parse_y_axis("ms, s", ",")).toEqual({ primary: "ms", secondary: "s" });
    });

    it("ignores titles beyond the second", () => {
        expect(parse_y_axis("ms,s,min", ",")).toEqual({ primary: "ms", secondary: "s" });
    });

    it("treats an empty second title as absent", () => {
        expect(parse_y_axis("ms,", ",")).toEqual({ primary: "ms" });
    });
});

describe("parse_chart_types", () => {
    it("reads a single type as broadcast", () => {
        expect(parse_chart_types("Bar", DIALECT).value).toEqual({ kind: "broadcast", type: ChartType.Bar });
    });

    it("reads an explicit list after the placeholder", () => {
        expect(parse_chart_types("_, lines ,SCATTER", DIALECT).value).toEqual({
            kind: "explicit",
            types: [ChartType.Lines, ChartType.Scatter],
        });
    });

    it("rejects several types without the placeholder", () => {
        const status = parse_chart_types("bar,lines", DIALECT);
        expect(status.done()).toBe(false);
        expect(status.what()).toBe("several chart types MUST be preceded by '_'");
    });

    it("rejects an unknown type", () => {
        expect(parse_chart_types("pie", DIALECT).what()).toBe("unknown chart type 'pie'");
        expect(parse_chart_types("_,bar,area", DIALECT).what()).toBe("unknown chart type 'area'");
    });

    it("rejects the bare placeholder", () => {
        expect(parse_chart_types("_", DIALECT).done()).toBe(false);
    });
});

describe("reconcile_chart_types", () => {
    it("broadcasts a single type", () => {
        const status = reconcile_chart_types({ kind: "broadcast", type: ChartType.Bar }, 3);
        expect(status.value).toEqual([ChartType.Bar, ChartType.Bar, ChartType.Bar]);
    });

    it("pads a single explicit type", () => {
        const status = reconcile_chart_types({ kind: "explicit", types: [ChartType.Bar] }, 3);
        expect(status.value).toEqual([ChartType.Bar, ChartType.Bar, ChartType.Bar]);
    });

    it("fails when there are more types than columns", () => {
        const status = reconcile_chart_types(
            { kind: "explicit", types: [ChartType.Bar, ChartType.Scatter, ChartType.Lines] }, 2);
        expect(status.done()).toBe(false);
        expect(status.what()).toBe("3 chart types specified for 2 columns");
    });

    it("fails when several types don't cover every column", () => {
        const status = reconcile_chart_types(
            { kind: "explicit", types: [ChartType.Bar, ChartType.Scatter] }, 3);
        expect(status.done()).toBe(false);
    });
});

describe("parse_column", () => {
    it("routes a marked column to the secondary axis", () => {
        expect(parse_column("%latency", "%").value).toEqual({ name: "latency", route_to_secondary: true });
    });

    it("keeps an unmarked column on the primary axis", () => {
        expect(parse_column("req", "%").value).toEqual({ name: "req", route_to_secondary: false });
    });

    it("rejects the bare marker", () => {
        expect(parse_column("%", "%").what()).toBe("column title can't be just '%'");
    });
});

describe("parse_columns", () => {
    it("separates the x column", () => {
        expect(parse_columns("min, req ,%err", DIALECT).value).toEqual({
            x_column: "min",
            columns: [
                { name: "req", route_to_secondary: false },
                { name: "err", route_to_secondary: true },
            ],
        });
    });

    it("requires at least one data column", () => {
        expect(parse_columns("min", DIALECT).what())
            .toBe("at least x column and one data column MUST be specified");
    });

    it("reports the position of an invalid column", () => {
        expect(parse_columns("min,req,%", DIALECT).what())
            .toBe("column 3: column title can't be just '%'");
    });
});

describe("parse_directives", () => {
    it("decodes a whole header", () => {
        const status = parse_directives(
            ["#Requests", "#time:rangeslider", "#ms,s", "#_,bar,lines", "#t,a,%b"], DIALECT);
        expect(status.ok()).toBe(true);
        expect(status.value).toEqual({
            title: "Requests",
            axes: {
                x: { title: "time", range_slider: true },
                y: { primary: "ms", secondary: "s" },
            },
            x_column: "t",
            chart_types: [ChartType.Bar, ChartType.Lines],
            columns: [
                { name: "a", route_to_secondary: false },
                { name: "b", route_to_secondary: true },
            ],
        });
    });

    it("broadcasts '_,bar' over three columns", () => {
        const status = parse_directives(["#T", "#x", "#y", "#_,bar", "#x,a,b,c"], DIALECT);
        expect(status.value?.chart_types).toEqual([ChartType.Bar, ChartType.Bar, ChartType.Bar]);
    });

    it("broadcasts 'bar' over three columns", () => {
        const status = parse_directives(["#T", "#x", "#y", "#bar", "#x,a,b,c"], DIALECT);
        expect(status.value?.chart_types).toEqual([ChartType.Bar, ChartType.Bar, ChartType.Bar]);
    });

    it("fails when types outnumber columns", () => {
        const status = parse_directives(["#T", "#x", "#y", "#_,bar,scatter,lines", "#x,a,b"], DIALECT);
        expect(status.done()).toBe(false);
        expect(status.value).toBeUndefined();
        expect(status.what())
            .toBe("chart types don't match columns: 3 chart types specified for 2 columns");
    });

    it("uses the configured delimiter", () => {
        const status = parse_directives(
            ["#T", "#x", "#ms;s", "#_;lines;bar", "#x;a;%b"], { ...DIALECT, delimiter: ";" });
        expect(status.value?.axes.y).toEqual({ primary: "ms", secondary: "s" });
        expect(status.value?.chart_types).toEqual([ChartType.Lines, ChartType.Bar]);
    });
});
