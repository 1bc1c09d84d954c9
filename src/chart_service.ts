import { Status, StatusWith } from "./status.js";
import { return_fail } from "./utils.js";
import type { Journal } from "./journal.js";
import { ResultCache } from "./chart/result_cache.js";
import { load_spec } from "./chart/loader.js";
import type { Markers } from "./chart/types.js";
import { type MenuItem, list_datasets, resolve_dataset } from "./catalog/datasets.js";
import { type Figure, to_figure } from "./render/plotly_figure.js";

export type ChartServiceOptions = {
    directory: string;
    delimiter: string;
    ttl_sec: number;
    markers?: Partial<Markers>;
}

// Entry point for the presentation layer: one instance per process, shared
// by every request.
export class ChartService {
    private readonly cache: ResultCache;

    constructor(
        private readonly options: ChartServiceOptions,
        private readonly journal: Journal,
        cache?: ResultCache)
    {
        const loader_journal = journal.child("loader");
        this.cache = cache ?? new ResultCache(
            (file_path, delimiter) => load_spec(file_path, delimiter, loader_journal, options.markers));
    }

    menu(): StatusWith<MenuItem[]> {
        const status = list_datasets(this.options.directory);
        if (!status.done()) {
            this.journal.log().error(status.what());
        }
        return status;
    }

    figure(key: string): StatusWith<Figure> {
        const path = resolve_dataset(this.options.directory, key);
        if (!path.done() || !path.value) {
            return return_fail(path.what(), this.journal);
        }

        const { delimiter, ttl_sec } = this.options;
        const spec = this.cache.build_cached(key, path.value, delimiter, ttl_sec);
        if (!spec.done() || !spec.value) {
            return spec.wrap("nothing to render").with<Figure>(undefined);
        }
        this.journal.log().info(`rendering '${key}': ${spec.value.series.length} series`);
        return Status.ok().with(to_figure(spec.value));
    }
}
