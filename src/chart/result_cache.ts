import { Status, StatusWith } from "../status.js";
import { seconds_between } from "../utils.js";
import type { ChartSpec } from "./types.js";

export type SpecLoader = (file_path: string, delimiter: string) => StatusWith<ChartSpec>;

type Entry = {
    last_built_at: Date;
    spec: ChartSpec;
}

// Keeps the last built spec of every source for a limited time.
// Rebuilds are synchronous: no other rebuild of the same key may start between
// the staleness check and the entry update.
export class ResultCache {
    private entries: Map<string, Entry> = new Map();

    constructor(
        private readonly loader: SpecLoader,
        private readonly now: () => Date = () => new Date())
    {}

    build_cached(
        key: string, file_path: string, delimiter: string, ttl_sec: number): StatusWith<ChartSpec>
    {
        const now = this.now();
        const entry = this.entries.get(key);
        if (entry && seconds_between(entry.last_built_at, now) <= ttl_sec) {
            return Status.ok().with(entry.spec);
        }

        const status = this.loader(file_path, delimiter);
        if (!status.done() || !status.value) {
            this.entries.delete(key);
            return status.wrap(`can't build '${key}'`).with<ChartSpec>(undefined);
        }
        this.entries.set(key, { last_built_at: now, spec: status.value });
        return status;
    }

    drop(key: string): boolean {
        return this.entries.delete(key);
    }

    clear(): void {
        this.entries.clear();
    }

    size(): number {
        return this.entries.size;
    }
}
