import { describe, expect, it, vi } from "vitest";
import { return_exception, return_fail, seconds_between, split_lines } from "../src/utils.js";
import { Journal } from "../src/journal.js";
import { Status } from "../src/status.js";

describe("return_fail", () => {
    it("logs the failure and returns it without a value", () => {
        const journal = Journal.Root("silent");
        const error = vi.spyOn(journal.log(), "error");
        const status = return_fail<number>("can't load a.csv", journal, Status.fail("line 7"));
        expect(status.done()).toBe(false);
        expect(status.value).toBeUndefined();
        expect(status.what()).toBe("can't load a.csv: line 7");
        expect(error).toHaveBeenCalledWith("can't load a.csv: line 7");
    });

    it("works without a journal", () => {
        expect(return_fail("nope").what()).toBe("nope");
    });
});

describe("return_exception", () => {
    it("wraps a caught error", () => {
        const journal = Journal.Root("silent");
        const error = vi.spyOn(journal.log(), "error");
        const status = return_exception(new Error("ENOENT"), journal, "can't read a.csv");
        expect(status.what()).toBe("can't read a.csv: ENOENT");
        expect(error).toHaveBeenCalledTimes(1);
    });

    it("keeps the error message when there is nothing to wrap with", () => {
        expect(return_exception(new Error("boom")).what()).toBe("boom");
    });
});

describe("helpers", () => {
    it("measures seconds between dates", () => {
        expect(seconds_between(new Date("2024-01-01T00:00:00Z"), new Date("2024-01-01T00:01:30Z"))).toBe(90);
    });

    it("splits LF and CRLF lines", () => {
        expect(split_lines("a\r\nb\nc")).toEqual(["a", "b", "c"]);
    });
});
