import fs from "fs";
import { Config } from "./config.js";
import { Journal } from "./journal.js";
import { ChartService } from "./chart_service.js";

export type Output = {
    log(line: string): void;
    error(line: string): void;
}

function is_directory(path: string | undefined): path is string {
    return path != undefined && fs.existsSync(path) && fs.statSync(path).isDirectory();
}

// Usage: csvchart <dataset_directory> [dataset]
// Returns the process exit code.
export function main(
    argv: string[], out: Output, env: Record<string, string | undefined> = {}): number
{
    const [directory, dataset] = argv;

    if (!is_directory(directory)) {
        out.error("specify dataset directory");
        return 1;
    }

    const config_file = env.CSVCHART_CONFIG;
    if (config_file) {
        const status = Config.Load(config_file);
        if (!status.done()) {
            out.error(`Failed to load configuration: ${status.what()}`);
            return 1;
        }
        if (status.has_warnings()) {
            out.error(status.what());
        }
    }

    const journal = Journal.Root(Config.LogLevel());
    const service = new ChartService({
        directory,
        delimiter: Config.Delimiter(),
        ttl_sec: Config.CacheTtlSec(),
        markers: Config.Markers(),
    }, journal.child("service"));

    if (!dataset) {
        const menu = service.menu();
        if (!menu.done() || !menu.value) {
            out.error(`Failed to list datasets: ${menu.what()}`);
            return 1;
        }
        menu.value.forEach(item => out.log(item.label));
        return 0;
    }

    const figure = service.figure(dataset);
    if (!figure.done() || !figure.value) {
        out.error(`Failed to build '${dataset}': ${figure.what()}`);
        return 1;
    }
    out.log(JSON.stringify(figure.value, null, 2));
    return 0;
}
