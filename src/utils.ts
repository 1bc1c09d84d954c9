import { Status, StatusWith } from "./status.js";
import type { Journal } from "./journal.js";

export function seconds_between(earlier: Date, later: Date): number {
    return (later.getTime() - earlier.getTime()) / 1000;
}

export function split_lines(text: string): string[] {
    return text.split(/\r?\n/);
}

// Logs the failure and returns it as a typed status without a value
export function return_fail<T>(what: string, journal?: Journal, nested?: Status): StatusWith<T> {
    const status = Status.fail(what, nested);
    journal?.log().error(status.what());
    return status.with<T>(undefined);
}

export function return_exception<T>(error: unknown, journal?: Journal, wrap?: string): StatusWith<T> {
    if (wrap) {
        return return_fail<T>(wrap, journal, Status.exception(error));
    }
    return return_fail<T>(Status.exception(error).what(), journal);
}
