import fs from "fs"
import { Status, StatusWith } from "./status.js";
import type { LogLevel } from "./journal.js";
import { DEFAULT_DELIMITER, DEFAULT_MARKERS, type Markers } from "./chart/types.js";

export type ConfigData = {
    delimiter: string;
    cache_ttl_sec: number;
    log_level: LogLevel;
    markers: Markers;
}

const LOG_LEVELS: LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

const DEFAULTS: ConfigData = {
    delimiter: DEFAULT_DELIMITER,
    cache_ttl_sec: 60,
    log_level: "info",
    markers: { ...DEFAULT_MARKERS },
};

function is_record(value: unknown): value is Record<string, unknown> {
    return typeof value == "object" && value != null && !Array.isArray(value);
}

function is_log_level(value: unknown): value is LogLevel {
    return LOG_LEVELS.some(level => level == value);
}

function is_single_char(value: unknown): value is string {
    return typeof value == "string" && value.length == 1;
}

export class Config {

    public static data: ConfigData = { ...DEFAULTS, markers: { ...DEFAULTS.markers } };

    static defaults(): ConfigData {
        return { ...DEFAULTS, markers: { ...DEFAULTS.markers } };
    }

    static Defaults(): void {
        Config.data = Config.defaults();
    }

    static Load(path: string): Status {
        try {
            const raw: unknown = JSON.parse(fs.readFileSync(path, 'utf-8'));
            const status = Config.verify(raw);
            if (!status.done() || !status.value) {
                return status;
            }
            Config.data = status.value;
            return status;
        } catch (error) {
            return Status.exception(error).wrap(`can't load configuration from ${path}`);
        }
    }

    static Delimiter(): string {
        return this.data.delimiter;
    }

    static CacheTtlSec(): number {
        return this.data.cache_ttl_sec;
    }

    static LogLevel(): LogLevel {
        return this.data.log_level;
    }

    static Markers(): Markers {
        return this.data.markers;
    }

    // Fields that are not specified take default values
    static verify(raw: unknown): StatusWith<ConfigData> {
        if (!is_record(raw)) {
            return StatusWith.fail_with("configuration MUST be a JSON object");
        }

        const result = Config.defaults();

        const { delimiter, cache_ttl_sec, log_level, markers } = raw;

        if (delimiter != undefined) {
            if (!is_single_char(delimiter)) {
                return StatusWith.fail_with("'delimiter' MUST be a single character");
            }
            result.delimiter = delimiter;
        }

        if (cache_ttl_sec != undefined) {
            if (typeof cache_ttl_sec != "number" || cache_ttl_sec < 0) {
                return StatusWith.fail_with("'cache_ttl_sec' MUST be a non-negative number");
            }
            result.cache_ttl_sec = cache_ttl_sec;
        }

        if (log_level != undefined) {
            if (!is_log_level(log_level)) {
                return StatusWith.fail_with(`'log_level' MUST be one of: ${LOG_LEVELS.join(", ")}`);
            }
            result.log_level = log_level;
        }

        if (markers != undefined) {
            if (!is_record(markers)) {
                return StatusWith.fail_with("'markers' MUST be an object");
            }
            for (const name of ["comment", "placeholder", "secondary"] as const) {
                const marker = markers[name];
                if (marker == undefined) {
                    continue;
                }
                // Placeholder is a token, the other markers are single characters
                if (name == "placeholder") {
                    if (typeof marker != "string" || marker.length == 0) {
                        return StatusWith.fail_with(`'markers.${name}' MUST be a non-empty string`);
                    }
                } else if (!is_single_char(marker)) {
                    return StatusWith.fail_with(`'markers.${name}' MUST be a single character`);
                }
                result.markers[name] = marker;
            }
        }

        const all_markers = Object.values(result.markers);
        if (all_markers.includes(result.delimiter)) {
            return StatusWith.fail_with("'delimiter' MUST differ from markers");
        }
        if (new Set(all_markers).size != all_markers.length) {
            return StatusWith.fail_with("'markers' MUST be distinct");
        }

        const warnings: Status[] = [];
        if (result.cache_ttl_sec == 0) {
            warnings.push(Status.warning("'cache_ttl_sec' is 0, every request will rebuild the chart"));
        }
        return Status.ok_and_warnings("verification", warnings).with(result);
    }
}
